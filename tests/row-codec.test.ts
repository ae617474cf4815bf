import { describe, it, expect } from 'vitest';
import type { RemoteItem } from '../src/types/jama.js';
import type { DescriptionEntry } from '../src/types/sheet.js';
import {
  decodeRow,
  encodeRow,
  fitPath,
  itemKindOf,
  rowFromCells,
  rowToCells,
} from '../src/core/row-codec.js';
import { encodeDescriptionTable, renderDescriptionHtml } from '../src/core/description-table.js';
import { FormatError } from '../src/utils/errors.js';

function makeItem(overrides: Partial<RemoteItem> = {}): RemoteItem {
  return {
    id: 5,
    itemType: 'Requirement',
    name: 'Child',
    sequence: '1.2',
    pathSegments: ['Root', 'Child'],
    fields: { assignee: 'Alice', status: 'Draft' },
    ...overrides,
  };
}

const fullFields = {
  assignee: 'Alice',
  status: 'Approved',
  tags: 'a,b',
  reason: 'Regulation',
  preconditions: 'Engine on',
  target_system: 'ECU',
};

describe('itemKindOf', () => {
  it('should detect SYSP by name or item type', () => {
    expect(itemKindOf('SYSP lane assist')).toBe('SYSP');
    expect(itemKindOf('Lane assist', 'SYSP')).toBe('SYSP');
    expect(itemKindOf('Lane assist', 'Requirement')).toBe('Requirement');
  });
});

describe('fitPath', () => {
  it('should pad short paths to 11 columns', () => {
    expect(fitPath(['a', 'b'])).toEqual(['a', 'b', '', '', '', '', '', '', '', '', '']);
  });

  it('should keep the first 10 ancestors and the name of a deeper path', () => {
    const segments = Array.from({ length: 13 }, (_, i) => `L${i + 1}`);
    const fitted = fitPath(segments);

    expect(fitted).toHaveLength(11);
    expect(fitted[9]).toBe('L10');
    expect(fitted[10]).toBe('L13');
  });
});

describe('encodeRow', () => {
  it('should lay out a remote item as a sheet row', () => {
    const row = encodeRow(makeItem(), ['Root']);

    expect(row.jamaId).toBe('5');
    expect(row.note).toBe('');
    expect(row.sequence).toBe('1.2');
    expect(row.pathSegments).toEqual(['Root', 'Child', '', '', '', '', '', '', '', '', '']);
    expect(row.itemType).toBe('Requirement');
    expect(row.fields).toEqual({
      assignee: 'Alice',
      status: 'Draft',
      tags: '',
      reason: '',
      preconditions: '',
      target_system: '',
    });
    expect(row.updateFlag).toBe('しない');
    expect(row.descriptionRef).toBe('');
  });

  it('should preview the current description', () => {
    const row = encodeRow(makeItem({ fields: { description: '<p>Plain text</p>' } }), ['Root']);
    expect(row.currentDescription).toBe('Plain text');
  });
});

describe('decodeRow', () => {
  it('should reconstruct all populated editable fields', () => {
    const item = makeItem({ fields: fullFields });

    const decoded = decodeRow(encodeRow(item, ['Root']), 2);

    expect(decoded.rowNumber).toBe(2);
    expect(decoded.item.id).toBe(5);
    expect(decoded.item.name).toBe('Child');
    expect(decoded.item.pathSegments).toEqual(['Root', 'Child']);
    expect(decoded.item.fields).toEqual(fullFields);
    expect(decoded.updateFlag).toBe(false);
  });

  it('should decode blank cells to no value', () => {
    const decoded = decodeRow(encodeRow(makeItem(), ['Root']), 2);

    expect(decoded.item.fields).toEqual({ assignee: 'Alice', status: 'Draft' });
    expect('tags' in decoded.item.fields).toBe(false);
  });

  it('should re-encode an unmodified row to the same row', () => {
    const row = encodeRow(makeItem({ fields: fullFields }), ['Root']);
    const decoded = decodeRow(row, 2);

    expect(encodeRow(decoded.item, decoded.item.pathSegments.slice(0, -1))).toEqual(row);
  });

  it('should recognize the update token only, after trimming', () => {
    const row = encodeRow(makeItem(), ['Root']);

    expect(decodeRow({ ...row, updateFlag: ' する ' }, 2).updateFlag).toBe(true);
    expect(decodeRow({ ...row, updateFlag: 'しない' }, 2).updateFlag).toBe(false);
    expect(decodeRow({ ...row, updateFlag: 'yes' }, 2).updateFlag).toBe(false);
  });

  it('should keep the note verbatim', () => {
    const row = encodeRow(makeItem(), ['Root']);
    expect(decodeRow({ ...row, note: '削除 ' }, 2).note).toBe('削除 ');
  });

  it('should reject a JAMA_ID that is not a positive integer', () => {
    const row = encodeRow(makeItem(), ['Root']);

    expect(() => decodeRow({ ...row, jamaId: 'abc' }, 7)).toThrow(FormatError);
    expect(() => decodeRow({ ...row, jamaId: '0' }, 7)).toThrow('Row 7: JAMA_ID "0" is not a positive integer');
    expect(decodeRow({ ...row, jamaId: ' 12 ' }, 7).item.id).toBe(12);
    expect(decodeRow({ ...row, jamaId: '' }, 7).item.id).toBeUndefined();
  });

  it('should rebuild the description from a linked table', () => {
    const entries: DescriptionEntry[] = [
      { ioType: 'IN', category: 'trigger_action', dataName: 'Switch', dataLabel: 'SW', dataValue: 'ON' },
    ];
    const row = { ...encodeRow(makeItem({ name: 'SYSP assist' }), ['Root']), descriptionRef: '#1' };
    const tables = new Map([['#1', encodeDescriptionTable(entries).table]]);

    const decoded = decodeRow(row, 3, tables);

    expect(decoded.item.itemType).toBe('SYSP');
    expect(decoded.item.fields.description).toBe(renderDescriptionHtml(entries));
  });

  it('should leave the description out when the linked table is empty', () => {
    const row = { ...encodeRow(makeItem({ name: 'SYSP assist' }), ['Root']), descriptionRef: '#1' };
    const tables = new Map([['#1', encodeDescriptionTable([]).table]]);

    expect(decodeRow(row, 3, tables).item.fields.description).toBeUndefined();
  });
});

describe('rowToCells / rowFromCells', () => {
  it('should use the 24 sheet columns and read them back', () => {
    const row = { ...encodeRow(makeItem({ fields: fullFields }), ['Root']), note: 'memo', descriptionRef: '#2' };

    const cells = rowToCells(row);

    expect(cells).toHaveLength(24);
    expect(cells[0]).toBe('5');
    expect(cells[2]).toBe('1.2');
    expect(cells[3]).toBe('Root');
    expect(cells[14]).toBe('Requirement');
    expect(cells[15]).toBe('Alice');
    expect(cells[20]).toBe('ECU');
    expect(cells[22]).toBe('しない');
    expect(cells[23]).toBe('#2');
    expect(rowFromCells(cells)).toEqual(row);
  });

  it('should treat missing trailing cells as empty', () => {
    const row = rowFromCells(['9', '', '3']);

    expect(row.jamaId).toBe('9');
    expect(row.pathSegments).toEqual(Array(11).fill(''));
    expect(row.updateFlag).toBe('');
  });
});
