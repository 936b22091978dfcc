/**
 * Runtime configuration from environment variables, validated with zod.
 */
import { tmpdir } from 'node:os';
import path from 'node:path';
import { z } from 'zod';

export const DEFAULT_TIMEOUT_SEC = 60;
export const DEFAULT_MAX_DOWNLOAD_BYTES = 100 * 1024 * 1024;
export const DEFAULT_MAX_REDIRECTS = 10;
export const DEFAULT_TTL_HOURS = 24;

const DEFAULT_ROOT = path.join(tmpdir(), 'pdf-fetch-cache');

const positiveInt = z.coerce.number().int().positive();

export const ConfigSchema = z.object({
  downloadDir: z.string().min(1).default(path.join(DEFAULT_ROOT, 'downloads')),
  contentCacheDir: z.string().min(1).default(DEFAULT_ROOT),
  timeoutSec: z.coerce.number().positive().default(DEFAULT_TIMEOUT_SEC),
  maxDownloadBytes: positiveInt.default(DEFAULT_MAX_DOWNLOAD_BYTES),
  // Counts requests, so 1 means "no redirects followed"
  maxRedirects: positiveInt.default(DEFAULT_MAX_REDIRECTS),
  ttlHours: z.coerce.number().positive().default(DEFAULT_TTL_HOURS),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Environment variable backing each config field. */
export const ENV_KEYS = {
  downloadDir: 'PDF_CACHE_DIR',
  contentCacheDir: 'PDF_CONTENT_CACHE_DIR',
  timeoutSec: 'PDF_HTTP_TIMEOUT',
  maxDownloadBytes: 'PDF_MAX_DOWNLOAD_BYTES',
  maxRedirects: 'PDF_MAX_REDIRECTS',
  ttlHours: 'PDF_CACHE_TTL_HOURS',
} as const satisfies Record<keyof Config, string>;

type ConfigField = keyof typeof ENV_KEYS;

function isConfigField(value: unknown): value is ConfigField {
  return typeof value === 'string' && Object.hasOwn(ENV_KEYS, value);
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Build the config from the environment. Empty variables count as unset.
 * Throws ConfigError naming the offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw: Partial<Record<ConfigField, string>> = {};
  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey]?.trim();
    if (value && isConfigField(field)) raw[field] = value;
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path[0];
    const envKey = isConfigField(field) ? ENV_KEYS[field] : 'config';
    throw new ConfigError(`Invalid ${envKey}: ${issue?.message ?? 'invalid value'}`);
  }
  return result.data;
}
