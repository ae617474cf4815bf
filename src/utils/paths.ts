import { extname, join, resolve } from 'node:path';
import { DEFAULT_CONFIG_FILE, LOG_FILE } from '../constants.js';

/**
 * Resolve a workbook path against the working directory. A path without an
 * extension gets `.xlsx`.
 */
export function resolveWorkbookPath(path: string): string {
  const withExt = extname(path) === '' ? `${path}.xlsx` : path;
  return resolve(process.cwd(), withExt);
}

export function getConfigPath(path?: string): string {
  return resolve(process.cwd(), path ?? DEFAULT_CONFIG_FILE);
}

export function getLogFilePath(): string {
  return join(process.cwd(), LOG_FILE);
}
