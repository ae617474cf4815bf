import { describe, it, expect, vi } from 'vitest';
import type { ProgressEvent } from '../src/types/sync.js';
import { ProgressTracker, defaultProgressInterval, formatProgress } from '../src/utils/progress.js';

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

function recorder(): { events: ProgressEvent[]; report: (event: ProgressEvent) => void } {
  const events: ProgressEvent[] = [];
  return { events, report: event => events.push(event) };
}

describe('defaultProgressInterval', () => {
  it('should report about every tenth of the total', () => {
    expect(defaultProgressInterval(5)).toBe(1);
    expect(defaultProgressInterval(95)).toBe(10);
    expect(defaultProgressInterval(100_000)).toBe(1000);
  });

  it('should use 50 for an unknown total', () => {
    expect(defaultProgressInterval()).toBe(50);
  });
});

describe('formatProgress', () => {
  it('should show count, total and percentage', () => {
    expect(formatProgress({ phase: 'fetch', done: 5, total: 10 })).toBe('Fetching items: 5/10 (50.0%)');
    expect(formatProgress({ phase: 'apply', done: 1, total: 3 })).toBe('Applying changes: 1/3 (33.3%)');
  });

  it('should show unknown when there is no total', () => {
    expect(formatProgress({ phase: 'fetch', done: 3 })).toBe('Fetching items: 3/unknown');
  });
});

describe('ProgressTracker', () => {
  it('should emit every N items and at the total', () => {
    const reporter = recorder();
    const tracker = new ProgressTracker(reporter, 'classify', 5, 2);

    for (let i = 0; i < 5; i++) tracker.tick();
    tracker.finish();

    expect(reporter.events.map(event => event.done)).toEqual([2, 4, 5]);
  });

  it('should emit the final count on finish when no total is known', () => {
    const reporter = recorder();
    const tracker = new ProgressTracker(reporter, 'fetch');

    for (let i = 0; i < 3; i++) tracker.tick();
    tracker.finish();

    expect(reporter.events).toEqual([{ phase: 'fetch', done: 3, total: undefined }]);
    expect(tracker.done).toBe(3);
  });

  it('should work without a reporter', () => {
    const tracker = new ProgressTracker(undefined, 'apply', 2);
    tracker.tick();
    tracker.finish();
    expect(tracker.done).toBe(1);
  });
});
