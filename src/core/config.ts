import { readFile, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { z } from 'zod';
import {
  CANONICAL_FIELDS,
  MAX_RETRIES,
  BASE_RETRY_DELAY_MS,
  REQUEST_TIMEOUT_MS,
  DEFAULT_COLUMN_WIDTH_CHECK_ROWS,
} from '../constants.js';
import { ConfigError } from '../utils/errors.js';
import type { RetryOptions } from '../utils/retry.js';
import { logger } from '../utils/logger.js';

export const configSchema = z.object({
  base_url: z.string().url(),
  project_id: z.number().int().positive(),
  api_id: z.string().min(1, 'api_id is not set'),
  api_secret: z.string().min(1, 'api_secret is not set'),
  proxies: z
    .object({
      http: z.string().url().optional(),
      https: z.string().url().optional(),
    })
    .optional(),
  debug: z.boolean().default(false),
  performance: z
    .object({
      column_width_check_rows: z.number().int().positive().default(DEFAULT_COLUMN_WIDTH_CHECK_ROWS),
      progress_interval: z.number().int().positive().optional(),
    })
    .default({}),
  // canonical field name -> remote field key (e.g. "assignee$89")
  fields: z.record(z.enum(CANONICAL_FIELDS), z.string().min(1)).default({}),
  item_types: z
    .object({
      default: z.number().int().positive().default(1),
      child: z.number().int().positive().default(1),
    })
    .default({}),
  retry: z
    .object({
      max_retries: z.number().int().min(0).default(MAX_RETRIES),
      base_delay_ms: z.number().int().min(0).default(BASE_RETRY_DELAY_MS),
    })
    .default({}),
  request_timeout_ms: z.number().int().positive().default(REQUEST_TIMEOUT_MS),
});

export type SyncConfig = Readonly<z.infer<typeof configSchema>>;

const SAMPLE_CONFIG = {
  base_url: 'https://example.jamacloud.com',
  project_id: 1,
  api_id: 'YOUR_API_ID_HERE',
  api_secret: 'YOUR_API_SECRET_HERE',
  proxies: {
    http: 'http://proxy.example.com:8080',
    https: 'http://proxy.example.com:8080',
  },
  performance: {
    column_width_check_rows: DEFAULT_COLUMN_WIDTH_CHECK_ROWS,
  },
  fields: {
    assignee: 'assignee',
    target_system: 'target_system',
  },
  debug: false,
};

/**
 * Environment variables take precedence over the file for connection settings.
 */
function applyEnvOverrides(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const merged = { ...raw };
  if (env.JAMA_BASE_URL) merged.base_url = env.JAMA_BASE_URL;
  if (env.JAMA_PROJECT_ID) merged.project_id = Number(env.JAMA_PROJECT_ID);
  if (env.JAMA_API_ID) merged.api_id = env.JAMA_API_ID;
  if (env.JAMA_API_SECRET) merged.api_secret = env.JAMA_API_SECRET;
  return merged;
}

export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = {}): SyncConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError('Config must be a JSON object');
  }
  const result = configSchema.safeParse(applyEnvOverrides({ ...raw }, env));
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`);
  }
  return Object.freeze(result.data);
}

/**
 * Load and validate the config file. When it does not exist a sample is
 * written next to it and a ConfigError is raised.
 */
export async function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Promise<SyncConfig> {
  if (!existsSync(configPath)) {
    const samplePath = `${configPath}.sample`;
    await writeFile(samplePath, JSON.stringify(SAMPLE_CONFIG, null, 2) + '\n', 'utf-8');
    logger.info(`Sample config written to ${samplePath}`);
    throw new ConfigError(`Config file not found: ${configPath}. Copy ${samplePath} and fill in your credentials.`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to read config file: ${configPath}`, { cause: err });
  }

  const config = parseConfig(raw, env);
  logger.debug(`Config loaded from ${configPath}`);
  return config;
}

export function retryOptionsFromConfig(config: SyncConfig): RetryOptions {
  return { maxRetries: config.retry.max_retries, baseDelayMs: config.retry.base_delay_ms };
}
