import { loadConfig, type SyncConfig } from '../core/config.js';
import { getConfigPath, getLogFilePath } from '../utils/paths.js';
import { logger, setDebug, setLogFile } from '../utils/logger.js';

/**
 * Turn on file logging and debug output for a command run.
 */
export function startLogging(debug?: boolean): void {
  setLogFile(getLogFilePath());
  setDebug(Boolean(debug));
}

export async function loadRunConfig(options: { config?: string; debug?: boolean }): Promise<SyncConfig> {
  const config = await loadConfig(getConfigPath(options.config));
  if (config.debug && !options.debug) {
    setDebug(true);
    logger.debug('Debug output enabled by config');
  }
  return config;
}
