import type { ProgressEvent, ProgressPhase, ProgressReporter } from '../types/sync.js';
import { logger } from './logger.js';

const PHASE_LABELS: Record<ProgressPhase, string> = {
  fetch: 'Fetching items',
  encode: 'Building rows',
  classify: 'Classifying rows',
  apply: 'Applying changes',
};

/**
 * Report every ~10% of a known total, or every 50 items when the total is unknown.
 */
export function defaultProgressInterval(total?: number): number {
  if (total === undefined) return 50;
  return Math.min(1000, Math.max(1, Math.ceil(total / 10)));
}

export function formatProgress(event: ProgressEvent): string {
  const label = PHASE_LABELS[event.phase];
  if (event.total === undefined || event.total === 0) {
    return `${label}: ${event.done}/unknown`;
  }
  const pct = ((event.done / event.total) * 100).toFixed(1);
  return `${label}: ${event.done}/${event.total} (${pct}%)`;
}

export function createLoggerProgress(): ProgressReporter {
  return {
    report(event) {
      logger.info(formatProgress(event));
    },
  };
}

/**
 * Counts processed items for one phase and forwards an event every `every`
 * items, on reaching the total, and once more on finish.
 */
export class ProgressTracker {
  private count = 0;
  private lastReported = -1;
  private readonly every: number;

  constructor(
    private readonly reporter: ProgressReporter | undefined,
    private readonly phase: ProgressPhase,
    private total?: number,
    every?: number,
  ) {
    this.every = every ?? defaultProgressInterval(total);
  }

  get done(): number {
    return this.count;
  }

  setTotal(total: number): void {
    this.total = total;
  }

  tick(): void {
    this.count++;
    if (this.count % this.every === 0 || this.count === this.total) {
      this.emit();
    }
  }

  finish(): void {
    if (this.lastReported !== this.count) {
      this.emit();
    }
  }

  private emit(): void {
    this.lastReported = this.count;
    this.reporter?.report({ phase: this.phase, done: this.count, total: this.total });
  }
}
