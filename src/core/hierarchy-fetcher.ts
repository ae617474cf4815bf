import { DEBUG_FIELD_DUMP_LIMIT, PAGE_SIZE } from '../constants.js';
import type { JamaItem, JamaTransport, RemoteItem } from '../types/jama.js';
import type { ProgressReporter } from '../types/sync.js';
import { fieldValueToText, normalizeFields } from './field-mapper.js';
import { itemKindOf } from './row-codec.js';
import { ProgressTracker } from '../utils/progress.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';
import { logger } from '../utils/logger.js';

export interface FetchHierarchyOptions {
  /** Start at the item with exactly this sequence */
  sequence?: string;
  /** Start at the first item with exactly this name */
  name?: string;
  /** Levels below the start node (absolute depth without one) */
  maxDepth?: number;
  /** Stop after this many items */
  maxCount?: number;
  pageSize?: number;
  progress?: ProgressReporter;
  progressEvery?: number;
  dumpFields?: boolean;
  retry?: RetryOptions;
}

export interface FetchedItem {
  item: RemoteItem;
  ancestorPath: string[];
  unrecognizedFields: string[];
}

export function sequenceDepth(sequence: string): number {
  return sequence ? sequence.split('.').length : 0;
}

/**
 * Canonicalize one API item. Ancestor names come from `namesBySequence`;
 * an ancestor not seen yet leaves an empty segment.
 */
export function toRemoteItem(raw: JamaItem, namesBySequence: ReadonlyMap<string, string>): FetchedItem {
  const sequence = raw.location?.sequence ?? '';
  const name = fieldValueToText(raw.fields.name);
  const { fields, unrecognized } = normalizeFields(raw.fields);

  const segments = sequence ? sequence.split('.') : [];
  const ancestorPath: string[] = [];
  for (let i = 1; i < segments.length; i++) {
    ancestorPath.push(namesBySequence.get(segments.slice(0, i).join('.')) ?? '');
  }

  return {
    item: {
      id: raw.id,
      itemType: itemKindOf(name),
      name,
      sequence,
      pathSegments: [...ancestorPath, name],
      fields,
    },
    ancestorPath,
    unrecognizedFields: unrecognized.filter(key => key !== 'name'),
  };
}

/**
 * Page through the project's items in the store's native order and yield
 * the ones under the start node. Pagination stops as soon as `maxCount`
 * items were yielded. A start node that matches nothing yields nothing.
 */
export async function* fetchHierarchy(
  transport: JamaTransport,
  options: FetchHierarchyOptions = {},
): AsyncGenerator<FetchedItem> {
  const pageSize = options.pageSize ?? PAGE_SIZE;
  const filtered = options.sequence !== undefined || options.name !== undefined;
  const namesBySequence = new Map<string, string>();
  const tracker = new ProgressTracker(options.progress, 'fetch', undefined, options.progressEvery);

  if (options.maxCount !== undefined && options.maxCount <= 0) return;

  let rootSequence: string | undefined;
  let startAt = 0;
  let dumped = 0;

  while (true) {
    const page = await withRetry(
      () => transport.listItems(startAt, pageSize),
      `Fetch items from ${startAt}`,
      options.retry,
    );

    if (!filtered) {
      const total = page.pageInfo.totalResults;
      tracker.setTotal(options.maxCount !== undefined ? Math.min(options.maxCount, total) : total);
    }
    if (page.data.length === 0) break;

    for (const raw of page.data) {
      if (options.dumpFields && dumped < DEBUG_FIELD_DUMP_LIMIT) {
        dumped++;
        logger.debug(`Item ${raw.id} fields: ${Object.keys(raw.fields).join(', ')}`);
      }

      const fetched = toRemoteItem(raw, namesBySequence);
      const { item } = fetched;
      namesBySequence.set(item.sequence, item.name);

      if (filtered) {
        if (rootSequence === undefined) {
          const isRoot = (options.sequence !== undefined && item.sequence === options.sequence)
            || (options.name !== undefined && item.name === options.name);
          if (!isRoot) continue;
          rootSequence = item.sequence;
          logger.debug(`Start node found: ${item.name} (${item.sequence})`);
        } else if (!item.sequence.startsWith(`${rootSequence}.`)) {
          continue;
        }
      }

      if (options.maxDepth !== undefined) {
        const depth = sequenceDepth(item.sequence) - (rootSequence !== undefined ? sequenceDepth(rootSequence) : 0);
        if (depth > options.maxDepth) continue;
      }

      yield fetched;
      tracker.tick();

      if (options.maxCount !== undefined && tracker.done >= options.maxCount) {
        tracker.finish();
        return;
      }
    }

    startAt += page.data.length;
    if (startAt >= page.pageInfo.totalResults) break;
  }

  tracker.finish();
}
