import { appendFileSync } from 'node:fs';
import chalk from 'chalk';

let debugEnabled = false;
let logFilePath: string | undefined;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

/**
 * Mirror every log line into a file. Pass undefined to stop.
 */
export function setLogFile(path: string | undefined): void {
  logFilePath = path;
}

function writeToFile(level: string, message: string): void {
  if (!logFilePath) return;
  try {
    appendFileSync(logFilePath, `${new Date().toISOString()} ${level.padEnd(7)} ${message}\n`, 'utf-8');
  } catch (err) {
    const path = logFilePath;
    logFilePath = undefined;
    console.error(chalk.red(`Could not write log file ${path}: ${err instanceof Error ? err.message : String(err)}`));
  }
}

export const logger = {
  info(message: string): void {
    console.log(message);
    writeToFile('INFO', message);
  },
  success(message: string): void {
    console.log(chalk.green(`✔ ${message}`));
    writeToFile('INFO', message);
  },
  warn(message: string): void {
    console.warn(chalk.yellow(`⚠ ${message}`));
    writeToFile('WARN', message);
  },
  error(message: string): void {
    console.error(chalk.red(`✖ ${message}`));
    writeToFile('ERROR', message);
  },
  debug(message: string): void {
    if (!debugEnabled) return;
    console.log(chalk.gray(`[debug] ${message}`));
    writeToFile('DEBUG', message);
  },
  dim(message: string): void {
    console.log(chalk.dim(message));
  },
};
