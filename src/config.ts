/**
 * wafscope — Configuration
 *
 * 環境変数を zod スキーマで検証し、凍結した AppConfig を返す。
 */

import { z } from 'zod';
import { isLogLevel } from './logger.js';
import type { LevelWithSilent } from 'pino';

export const DEFAULT_GEO_ENDPOINT = 'http://ip-api.com/json';

/** Invalid environment configuration. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((v) => ['true', 'false', '1', '0', 'yes', 'no'].includes(v), {
    message: 'expected true/false',
  })
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

const EnvSchema = z.object({
  WAFSCOPE_LOG_PATH: z.string().trim().min(1).optional(),
  WAFSCOPE_GEO_ENABLED: booleanFlag.default('true'),
  WAFSCOPE_GEO_ENDPOINT: z.string().trim().url().default(DEFAULT_GEO_ENDPOINT),
  WAFSCOPE_GEO_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  WAFSCOPE_LOG_LEVEL: z
    .string()
    .trim()
    .toLowerCase()
    .refine(isLogLevel, { message: 'unknown log level' })
    .default('info'),
});

export interface AppConfig {
  /** Audit log loaded at startup and used by ingest_log when no path is given */
  logPath?: string;
  geo: {
    enabled: boolean;
    endpoint: string;
    timeoutMs: number;
  };
  logLevel: LevelWithSilent;
}

/**
 * Read configuration from environment variables.
 * Empty strings count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''),
  );
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }

  const values = parsed.data;
  return Object.freeze({
    logPath: values.WAFSCOPE_LOG_PATH,
    geo: Object.freeze({
      enabled: values.WAFSCOPE_GEO_ENABLED,
      endpoint: values.WAFSCOPE_GEO_ENDPOINT,
      timeoutMs: values.WAFSCOPE_GEO_TIMEOUT_MS,
    }),
    logLevel: values.WAFSCOPE_LOG_LEVEL,
  });
}
