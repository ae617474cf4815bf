import { MAX_HIERARCHY_DEPTH } from '../constants.js';
import type { CanonicalField, JamaTransport, RemoteItem } from '../types/jama.js';
import type { DescriptionBlock, DescriptionTable, NumberedRow, Row } from '../types/sheet.js';
import type {
  ActionCounts,
  ActionRecord,
  FetchResult,
  ProgressReporter,
  UpdateResult,
} from '../types/sync.js';
import { fetchHierarchy, type FetchedItem, type FetchHierarchyOptions } from './hierarchy-fetcher.js';
import { decodeRow, encodeRow } from './row-codec.js';
import { describePreview, encodeDescriptionTable, parseDescriptionHtml } from './description-table.js';
import { classifyRow } from './action-classifier.js';
import type { FieldValues, RemoteWriter } from './remote-writer.js';
import { FormatError, NotFoundError, TransportError, ValidationWarning, errorMessage } from '../utils/errors.js';
import { ProgressTracker } from '../utils/progress.js';
import { logger } from '../utils/logger.js';

export type FetchOptions = FetchHierarchyOptions;

/**
 * Read the hierarchy and lay it out as sheet rows. Every SYSP item also gets
 * a description block, referenced from its row as `#n`.
 */
export async function runFetch(transport: JamaTransport, options: FetchOptions = {}): Promise<FetchResult> {
  const fetched: FetchedItem[] = [];
  const unrecognized = new Set<string>();
  for await (const entry of fetchHierarchy(transport, options)) {
    fetched.push(entry);
    for (const key of entry.unrecognizedFields) unrecognized.add(key);
  }
  if (unrecognized.size > 0) {
    logger.debug(`Fields outside the sheet layout: ${[...unrecognized].sort().join(', ')}`);
  }

  const rows: Row[] = [];
  const descriptionBlocks: DescriptionBlock[] = [];
  const warnings: ValidationWarning[] = [];
  const tracker = new ProgressTracker(options.progress, 'encode', fetched.length, options.progressEvery);

  for (const { item, ancestorPath } of fetched) {
    const context = { itemId: item.id, sequence: item.sequence };
    if (ancestorPath.length + 1 > MAX_HIERARCHY_DEPTH) {
      warnings.push(new ValidationWarning(
        `Path of "${item.name}" has ${ancestorPath.length + 1} levels; only ${MAX_HIERARCHY_DEPTH} columns are written`,
        context,
      ));
    }

    let descriptionRef = '';
    if (item.itemType === 'SYSP') {
      descriptionRef = `#${descriptionBlocks.length + 1}`;
      const html = item.fields.description ?? '';
      const entries = parseDescriptionHtml(html);
      if (html.trim() !== '' && entries === undefined) {
        warnings.push(new ValidationWarning(`Description of "${item.name}" has no description table; block left empty`, context));
      }
      const { table, overflow, mismatched } = encodeDescriptionTable(entries ?? []);
      if (overflow.length > 0) {
        const categories = [...new Set(overflow.map(entry => entry.category))].join(', ');
        warnings.push(new ValidationWarning(
          `${overflow.length} description entries of "${item.name}" exceed the slots of ${categories} and were dropped`,
          context,
        ));
      }
      for (const entry of mismatched) {
        warnings.push(new ValidationWarning(
          `Description entry "${entry.dataName}" of "${item.name}" is ${entry.ioType} but ${entry.category} holds ${entry.ioType === 'IN' ? 'OUT' : 'IN'} data`,
          context,
        ));
      }
      descriptionBlocks.push({
        ref: descriptionRef,
        jamaId: item.id !== undefined ? String(item.id) : '',
        rowNumber: rows.length + 2,
        table,
        currentPreview: describePreview(html),
      });
    }

    rows.push(encodeRow(item, ancestorPath, { descriptionRef }));
    tracker.tick();
  }
  tracker.finish();

  for (const warning of warnings) logger.warn(warning.toString());
  return { rows, descriptionBlocks, warnings };
}

export interface UpdateOptions {
  dryRun?: boolean;
  progress?: ProgressReporter;
  progressEvery?: number;
}

export function countActions(records: ActionRecord[]): ActionCounts {
  const counts: ActionCounts = { create: 0, update: 0, delete: 0, skip: 0 };
  for (const record of records) counts[record.action]++;
  return counts;
}

function validateCreates(records: ActionRecord[]): void {
  const problems = records
    .filter(record => record.action === 'create' && record.row.item.name.trim() === '')
    .map(record => `Row ${record.row.rowNumber}: a new item needs a name in its last Level column`);
  if (problems.length > 0) {
    throw new FormatError(`${problems.length} new item(s) cannot be created`, problems);
  }
}

/**
 * Decode and classify every row in sheet order. New items without a name
 * fail the whole plan with a FormatError.
 */
export function planUpdate(
  rows: NumberedRow[],
  descriptionTables: ReadonlyMap<string, DescriptionTable>,
  options: UpdateOptions = {},
): ActionRecord[] {
  const tracker = new ProgressTracker(options.progress, 'classify', rows.length, options.progressEvery);
  const records = rows.map(({ rowNumber, row }) => {
    const record = classifyRow(decodeRow(row, rowNumber, descriptionTables));
    tracker.tick();
    return record;
  });
  tracker.finish();
  validateCreates(records);
  return records;
}

/**
 * Result skeleton for a plan: counts filled in, nothing applied yet
 */
export function summarizePlan(records: ActionRecord[], dryRun: boolean): UpdateResult {
  const counts = countActions(records);
  return {
    dryRun,
    records,
    counts,
    succeeded: 0,
    failed: 0,
    skipped: counts.skip,
    alreadyDeleted: 0,
    createdIds: [],
    failures: [],
  };
}

function parentSequence(sequence: string): string | undefined {
  const cut = sequence.lastIndexOf('.');
  return cut > 0 ? sequence.slice(0, cut) : undefined;
}

function pickFields(item: RemoteItem, fields: CanonicalField[]): FieldValues {
  const picked: FieldValues = {};
  for (const field of fields) picked[field] = item.fields[field];
  return picked;
}

function targetId(record: ActionRecord): number {
  const { id } = record.row.item;
  if (id === undefined) {
    throw new Error(`Row ${record.row.rowNumber}: ${record.action} needs a JAMA_ID`);
  }
  return id;
}

/**
 * Apply every non-skip record in row order. A failed row is recorded and the
 * run moves on. A TransportError aborts the run only while no row has been
 * applied or recorded as failed.
 */
export async function applyPlan(
  records: ActionRecord[],
  writer: RemoteWriter,
  options: UpdateOptions = {},
): Promise<UpdateResult> {
  const result = summarizePlan(records, false);
  const pending = records.filter(record => record.action !== 'skip');
  const tracker = new ProgressTracker(options.progress, 'apply', pending.length, options.progressEvery);

  const idsBySequence = new Map<string, number>();
  for (const { row } of records) {
    if (row.item.id !== undefined && row.item.sequence) idsBySequence.set(row.item.sequence, row.item.id);
  }

  // rows applied or recorded as failed
  let applied = 0;

  for (const record of pending) {
    const { item, rowNumber } = record.row;
    try {
      switch (record.action) {
        case 'create': {
          const parent = parentSequence(item.sequence);
          const parentId = parent !== undefined ? idsBySequence.get(parent) : undefined;
          const id = await writer.create({
            name: item.name,
            fields: pickFields(item, record.changedFields),
            parentId,
          });
          applied++;
          if (item.sequence) idsBySequence.set(item.sequence, id);
          result.createdIds.push({ rowNumber, id });
          result.succeeded++;
          logger.success(`Created: ${item.name} (ID=${id})`);
          break;
        }
        case 'update': {
          const id = targetId(record);
          if (record.changedFields.length === 0) {
            result.skipped++;
            logger.info(`Row ${rowNumber}: nothing to update for ID=${id}`);
            break;
          }
          await writer.update(id, pickFields(item, record.changedFields));
          applied++;
          result.succeeded++;
          logger.success(`Updated: ${item.name} (ID=${id}) [${record.changedFields.join(', ')}]`);
          break;
        }
        case 'delete': {
          const id = targetId(record);
          try {
            await writer.delete(id);
            applied++;
            logger.success(`Deleted: ${item.name} (ID=${id})`);
          } catch (err) {
            if (!(err instanceof NotFoundError)) throw err;
            applied++;
            result.alreadyDeleted++;
            logger.info(`Already deleted: ${item.name} (ID=${id})`);
          }
          result.succeeded++;
          break;
        }
        case 'skip':
          break;
      }
    } catch (err) {
      if (err instanceof TransportError && applied === 0) throw err;
      applied++;
      const message = errorMessage(err);
      result.failed++;
      result.failures.push({ rowNumber, jamaId: item.id, name: item.name, action: record.action, error: message });
      logger.error(`Row ${rowNumber} (${record.action} ${item.id ?? item.name}): ${message}`);
    }
    tracker.tick();
  }
  tracker.finish();

  return result;
}

/**
 * Plan and, unless dry-run, apply. A dry run returns every record with its
 * action and never touches the writer.
 */
export async function runUpdate(
  rows: NumberedRow[],
  descriptionTables: ReadonlyMap<string, DescriptionTable>,
  writer: RemoteWriter,
  options: UpdateOptions = {},
): Promise<UpdateResult> {
  const records = planUpdate(rows, descriptionTables, options);
  if (options.dryRun) return summarizePlan(records, true);
  return applyPlan(records, writer, options);
}
