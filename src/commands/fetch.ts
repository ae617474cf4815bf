import { DEFAULT_SAMPLE_COUNT } from '../constants.js';
import { JamaClient } from '../core/jama-client.js';
import { retryOptionsFromConfig } from '../core/config.js';
import { runFetch } from '../core/sync-engine.js';
import { writeWorkbook } from '../core/workbook.js';
import { createLoggerProgress } from '../utils/progress.js';
import { resolveWorkbookPath } from '../utils/paths.js';
import { isDebugEnabled, logger } from '../utils/logger.js';
import { loadRunConfig, startLogging } from './context.js';

export interface FetchCommandOptions {
  output: string;
  sequence?: string;
  name?: string;
  depth?: number;
  count?: number;
  sampleMode?: boolean;
  sampleCount?: number;
  debug?: boolean;
  config?: string;
}

/**
 * Item cap and field dump for a run. Sample mode caps the run at the sample
 * count unless `--count` is given, and always dumps field keys.
 */
export function fetchLimits(
  options: Pick<FetchCommandOptions, 'count' | 'sampleMode' | 'sampleCount'>,
  debug: boolean,
): { maxCount?: number; dumpFields: boolean } {
  if (!options.sampleMode) return { maxCount: options.count, dumpFields: debug };
  return { maxCount: options.count ?? options.sampleCount ?? DEFAULT_SAMPLE_COUNT, dumpFields: true };
}

export async function fetchCommand(options: FetchCommandOptions): Promise<void> {
  startLogging(options.debug);
  const config = await loadRunConfig(options);
  const outputPath = resolveWorkbookPath(options.output);

  const client = new JamaClient(config);
  const project = await client.getProject();
  logger.info(`Project: ${project.name} (ID=${project.id})`);

  if (options.sequence) logger.info(`Start sequence: ${options.sequence}`);
  if (options.name) logger.info(`Start item: ${options.name}`);
  const { maxCount, dumpFields } = fetchLimits(options, isDebugEnabled());
  if (options.sampleMode) logger.info('Sample mode: raw field keys of the first items are dumped');
  if (options.depth !== undefined) logger.info(`Max depth: ${options.depth}`);
  if (maxCount !== undefined) logger.info(`Max items: ${maxCount}`);

  const result = await runFetch(client, {
    sequence: options.sequence,
    name: options.name,
    maxDepth: options.depth,
    maxCount,
    progress: createLoggerProgress(),
    progressEvery: config.performance.progress_interval,
    dumpFields,
    retry: retryOptionsFromConfig(config),
  });

  if (result.rows.length === 0) {
    const filter = options.sequence ?? options.name;
    logger.warn(filter ? `No items found under "${filter}".` : 'No items found in the project.');
  }

  await writeWorkbook(outputPath, result, {
    columnWidthCheckRows: config.performance.column_width_check_rows,
  });

  logger.success(
    `Wrote ${result.rows.length} row(s) and ${result.descriptionBlocks.length} description block(s) to ${outputPath}`,
  );
  if (result.warnings.length > 0) {
    logger.warn(`${result.warnings.length} warning(s) during fetch`);
  }
}
