// =============================================================================
// Configuration — environment (loaded by dotenv in index.ts) and export options
// =============================================================================

import { z } from 'zod';
import { ValidationError } from './errors.js';
import { LOG_LEVELS } from './logger.js';
import { assertTimeZone, isValidTimeZone } from './timezone.js';
import { BACKGROUNDS, ORIENTATIONS, type ExportOptions } from './types.js';

const EnvSchema = z.object({
  FLIGHTRADAR_API_KEY: z.string().trim().optional(),
  FR24_BASE_URL: z.string().url().default('https://fr24api.flightradar24.com'),
  API_PORT: z.coerce.number().int().positive().default(3001),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  EXPORT_ROOT: z.string().min(1).default('exports'),
  TILE_CACHE_PATH: z.string().default('.tile-cache.db'),
  TILE_CACHE_TTL_HOURS: z.coerce.number().positive().default(168),
  MAX_RATE_LIMIT_RETRIES: z.coerce.number().int().min(0).default(5),
  MAX_SERVER_RETRIES: z.coerce.number().int().min(0).default(2),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  SUMMARY_PAGE_SIZE: z.coerce.number().int().positive().default(100),
  SUMMARY_MAX_PAGES: z.coerce.number().int().positive().default(10),
  CORS_ORIGINS: z
    .string()
    .default('')
    .transform(v => v.split(',').map(o => o.trim()).filter(o => o.length > 0))
    .pipe(z.array(z.string().url())),
});

export type AppConfig = {
  apiToken: string | null;
  baseUrl: string;
  port: number;
  logLevel: (typeof LOG_LEVELS)[number];
  exportRoot: string;
  tileCachePath: string | null;
  tileCacheTtlMs: number;
  maxRateLimitRetries: number;
  maxServerRetries: number;
  retryBaseDelayMs: number;
  summaryPageSize: number;
  summaryMaxPages: number;
  /** Browser origins allowed by CORS; empty means same-origin only. */
  corsOrigins: string[];
};

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || 'value'}: ${issue.message}`)
    .join('; ');
}

/** Empty strings in the environment mean "unset" so defaults apply. */
function dropEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') out[key] = value;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(dropEmpty(env));
  if (!parsed.success) {
    throw new ValidationError(`Invalid configuration: ${describeIssues(parsed.error)}`);
  }
  const e = parsed.data;
  return {
    apiToken: e.FLIGHTRADAR_API_KEY || null,
    baseUrl: e.FR24_BASE_URL.replace(/\/+$/, ''),
    port: e.API_PORT,
    logLevel: e.LOG_LEVEL,
    exportRoot: e.EXPORT_ROOT,
    // TILE_CACHE_PATH="" in the environment disables the cache
    tileCachePath: env.TILE_CACHE_PATH === '' ? null : e.TILE_CACHE_PATH,
    tileCacheTtlMs: e.TILE_CACHE_TTL_HOURS * 60 * 60 * 1000,
    maxRateLimitRetries: e.MAX_RATE_LIMIT_RETRIES,
    maxServerRetries: e.MAX_SERVER_RETRIES,
    retryBaseDelayMs: e.RETRY_BASE_DELAY_MS,
    summaryPageSize: e.SUMMARY_PAGE_SIZE,
    summaryMaxPages: e.SUMMARY_MAX_PAGES,
    corsOrigins: e.CORS_ORIGINS,
  };
}

export function requireToken(config: AppConfig): string {
  if (!config.apiToken) {
    throw new ValidationError('No API token provided. Set FLIGHTRADAR_API_KEY.');
  }
  return config.apiToken;
}

// =============================================================================
// Export options
// =============================================================================

export const ExportOptionsSchema = z.object({
  background: z.enum(BACKGROUNDS).default('cartodb-positron'),
  orientation: z.enum(ORIENTATIONS).default('auto'),
  timezone: z
    .string()
    .trim()
    .nullish()
    .transform(v => (v ? v : null))
    .refine(v => v === null || isValidTimeZone(v), { message: 'Unknown IANA timezone' }),
  outputDir: z.string().trim().min(1).optional(),
});

export function parseExportOptions(input: unknown): ExportOptions {
  const parsed = ExportOptionsSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ValidationError(`Invalid export options: ${describeIssues(parsed.error)}`);
  }
  const { background, orientation, timezone, outputDir } = parsed.data;
  return {
    background,
    orientation,
    timezone: timezone === null ? null : assertTimeZone(timezone),
    ...(outputDir ? { outputDir } : {}),
  };
}
