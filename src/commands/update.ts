import { JamaClient } from '../core/jama-client.js';
import { RemoteWriter, writerOptionsFromConfig } from '../core/remote-writer.js';
import { applyPlan, planUpdate, summarizePlan } from '../core/sync-engine.js';
import { readWorkbook } from '../core/workbook.js';
import { describeRecord, summaryLines } from '../core/report.js';
import type { UpdateResult } from '../types/sync.js';
import { createLoggerProgress } from '../utils/progress.js';
import { resolveWorkbookPath } from '../utils/paths.js';
import { confirm } from '../utils/prompt.js';
import { logger } from '../utils/logger.js';
import { loadRunConfig, startLogging } from './context.js';

export interface UpdateCommandOptions {
  input: string;
  dryRun?: boolean;
  yes?: boolean;
  debug?: boolean;
  config?: string;
}

function printResult(result: UpdateResult): void {
  for (const line of summaryLines(result)) logger.info(line);
  if (result.failures.length > 0) {
    logger.warn(`Errors:    ${result.failures.length}`);
    for (const failure of result.failures) {
      logger.error(`  Row ${failure.rowNumber} (${failure.action} ${failure.jamaId ?? failure.name}): ${failure.error}`);
    }
  }
}

export async function updateCommand(options: UpdateCommandOptions): Promise<void> {
  startLogging(options.debug);
  if (options.dryRun) {
    logger.info('Dry run mode - no changes will be made.');
  }

  // a dry run makes no remote calls and needs no credentials
  const config = options.dryRun ? undefined : await loadRunConfig(options);
  const inputPath = resolveWorkbookPath(options.input);
  const { rows, descriptionTables } = await readWorkbook(inputPath);
  logger.info(`Read ${rows.length} row(s) from ${inputPath}`);

  const progress = createLoggerProgress();
  const progressEvery = config?.performance.progress_interval;
  const records = planUpdate(rows, descriptionTables, { progress, progressEvery });

  for (const record of records) {
    const line = describeRecord(record);
    if (record.action === 'skip') {
      logger.dim(options.dryRun ? `[dry-run] ${line}` : line);
    } else {
      logger.info(options.dryRun ? `[dry-run] ${line}` : line);
    }
  }

  if (!config) {
    printResult(summarizePlan(records, true));
    return;
  }

  const pending = records.filter(record => record.action !== 'skip').length;
  if (pending === 0) {
    logger.info('Nothing to apply.');
    printResult(summarizePlan(records, false));
    return;
  }

  if (!options.yes) {
    const ok = await confirm(`Apply ${pending} change(s) to Jama?`);
    if (!ok) {
      logger.info('Aborted.');
      return;
    }
  }

  const writer = new RemoteWriter(new JamaClient(config), writerOptionsFromConfig(config));
  const result = await applyPlan(records, writer, { progress, progressEvery });
  printResult(result);
}
