import { buildTemplate } from '../core/template.js';
import { writeWorkbook } from '../core/workbook.js';
import { resolveWorkbookPath } from '../utils/paths.js';
import { logger } from '../utils/logger.js';

export async function templateCommand(options: { output: string }): Promise<void> {
  const outputPath = resolveWorkbookPath(options.output);
  await writeWorkbook(outputPath, buildTemplate());
  logger.success(`Template written to ${outputPath}`);
}
