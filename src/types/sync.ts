import type { DecodedRow, DescriptionBlock, Row } from './sheet.js';
import type { CanonicalField } from './jama.js';
import type { ValidationWarning } from '../utils/errors.js';

export type Action = 'create' | 'update' | 'delete' | 'skip';

export interface ActionRecord {
  row: DecodedRow;
  action: Action;
  changedFields: CanonicalField[];
}

export type ProgressPhase = 'fetch' | 'encode' | 'classify' | 'apply';

export interface ProgressEvent {
  phase: ProgressPhase;
  done: number;
  total?: number;
}

export interface ProgressReporter {
  report(event: ProgressEvent): void;
}

export interface FetchResult {
  rows: Row[];
  descriptionBlocks: DescriptionBlock[];
  warnings: ValidationWarning[];
}

export interface ActionCounts {
  create: number;
  update: number;
  delete: number;
  skip: number;
}

export interface ApplyFailure {
  rowNumber: number;
  jamaId?: number;
  name: string;
  action: Action;
  error: string;
}

export interface UpdateResult {
  dryRun: boolean;
  records: ActionRecord[];
  counts: ActionCounts;
  succeeded: number;
  failed: number;
  skipped: number;
  alreadyDeleted: number;
  createdIds: Array<{ rowNumber: number; id: number }>;
  failures: ApplyFailure[];
}
