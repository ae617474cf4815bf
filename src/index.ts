import { Command, InvalidArgumentError } from 'commander';
import { config as loadEnv } from 'dotenv';
import { fetchCommand, type FetchCommandOptions } from './commands/fetch.js';
import { updateCommand } from './commands/update.js';
import { templateCommand } from './commands/template.js';
import { FormatError, describeError } from './utils/errors.js';
import { logger } from './utils/logger.js';

export { runFetch, runUpdate, planUpdate, applyPlan } from './core/sync-engine.js';
export { fetchHierarchy } from './core/hierarchy-fetcher.js';
export { RemoteWriter } from './core/remote-writer.js';
export { JamaClient } from './core/jama-client.js';
export { classifyRow } from './core/action-classifier.js';
export { encodeRow, decodeRow } from './core/row-codec.js';
export { encodeDescriptionTable, decodeDescriptionTable } from './core/description-table.js';
export { readWorkbook, writeWorkbook } from './core/workbook.js';
export { loadConfig, parseConfig } from './core/config.js';

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

function fail(err: unknown): never {
  logger.error(describeError(err));
  if (err instanceof FormatError) {
    for (const detail of err.details) logger.error(`  ${detail}`);
  }
  process.exit(1);
}

const program = new Command();

program
  .name('jamasync')
  .description('Round-trip Jama requirement hierarchies through an Excel workbook')
  .version('0.1.0');

program
  .command('fetch')
  .description('Export the requirement hierarchy to a workbook')
  .requiredOption('-o, --output <file>', 'Workbook to write (.xlsx is added when no extension is given)')
  .option('-s, --sequence <sequence>', 'Start at the item with this sequence (e.g. 6.1.5)')
  .option('-n, --name <name>', 'Start at the item with this exact name')
  .option('-d, --depth <levels>', 'Max levels below the start item', parseCount)
  .option('--count <n>', 'Stop after this many items', parseCount)
  .option('--sample-mode', 'Fetch a few items and dump their raw field keys to inspect the structure')
  .option('--sample-count <n>', 'Items to fetch in sample mode (default: 100)', parseCount)
  .option('--debug', 'Print debug output and dump raw field keys')
  .option('-c, --config <file>', 'Config file (default: config.json)')
  .action(async (opts: FetchCommandOptions) => {
    await fetchCommand(opts).catch(fail);
  });

program
  .command('update')
  .description('Apply the edits in a workbook to Jama')
  .requiredOption('-i, --input <file>', 'Edited workbook')
  .option('--dry-run', 'Show what would change without making changes')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .option('--debug', 'Print debug output')
  .option('-c, --config <file>', 'Config file (default: config.json)')
  .action(async (opts: { input: string; dryRun?: boolean; yes?: boolean; debug?: boolean; config?: string }) => {
    await updateCommand(opts).catch(fail);
  });

program
  .command('template')
  .description('Write a sample workbook without contacting Jama')
  .requiredOption('-o, --output <file>', 'Workbook to write')
  .action(async (opts: { output: string }) => {
    await templateCommand(opts).catch(fail);
  });

export async function main(argv: string[] = process.argv): Promise<void> {
  loadEnv();
  await program.parseAsync(argv);
}
