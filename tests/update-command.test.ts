import { describe, it, expect, vi } from 'vitest';
import type { Row } from '../src/types/sheet.js';
import { updateCommand } from '../src/commands/update.js';
import { JamaClient } from '../src/core/jama-client.js';
import { logger } from '../src/utils/logger.js';

vi.mock('../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    dim: vi.fn(),
  },
}));

vi.mock('../src/commands/context.js', () => ({
  startLogging: vi.fn(),
  loadRunConfig: vi.fn(async () => ({ performance: { progress_interval: 10 } })),
}));

const { untouched } = vi.hoisted(() => {
  const row: Row = {
    jamaId: '5',
    note: '',
    sequence: '1.1',
    pathSegments: ['Root', 'Braking'],
    itemType: 'Requirement',
    fields: { assignee: '', status: 'Draft', tags: '', reason: '', preconditions: '', target_system: '' },
    currentDescription: '',
    updateFlag: 'しない',
    descriptionRef: '',
  };
  return { untouched: row };
});

vi.mock('../src/core/workbook.js', () => ({
  readWorkbook: vi.fn(async () => ({
    rows: [{ rowNumber: 2, row: untouched }],
    descriptionTables: new Map(),
  })),
}));

vi.mock('../src/core/jama-client.js', () => ({
  JamaClient: vi.fn(),
}));

describe('updateCommand', () => {
  it('should print the result summary when nothing is pending', async () => {
    await updateCommand({ input: 'edited.xlsx', yes: true });

    const lines = vi.mocked(logger.info).mock.calls.map(call => call[0]);
    expect(lines).toContain('Nothing to apply.');
    expect(lines).toContain('--- Update Results ---');
    expect(lines).toContain('Skip:      1');
    expect(lines).toContain('Succeeded: 0');
    expect(JamaClient).not.toHaveBeenCalled();
  });
});
