import { config } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { AppConfig, RateLimitTable } from '../types/index.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { RateLimitTableSchema } from '../utils/validation.js';

config();

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  DOWNLOAD_ROOT: z.string().default('./download/'),
  DOWNLOAD_WORKERS: z.string().default('8').transform(Number).pipe(z.number().int().min(1)),
  DOWNLOAD_GROUP_DELAY_MS: z.string().default('3000').transform(Number).pipe(z.number().int().min(0)),
  BATCH_POLL_INTERVAL_MS: z.string().default('1000').transform(Number).pipe(z.number().int().min(1)),
  FETCH_TIMEOUT_MS: z.string().default('30000').transform(Number).pipe(z.number().int().min(1)),
  ADMISSION_TIMEOUT_MS: z.string().default('300000').transform(Number).pipe(z.number().int().min(0)),
  HTTP_PROXY_URL: z.string().url().optional(),
  USER_AGENT: z.string().default(DEFAULT_USER_AGENT),

  RATE_LIMIT_DEFAULT_CONCURRENCY: z.string().default('2').transform(Number).pipe(z.number().int().min(1)),
  RATE_LIMIT_DEFAULT_INTERVAL_MS: z.string().default('500').transform(Number).pipe(z.number().int().min(0)),
  RATE_LIMIT_FILE: z.string().default('./rate-limits.json'),
});

/**
 * Reads the per-origin rate limit table. A missing file is an empty table,
 * anything unreadable or malformed is a configuration error.
 */
export function loadRateLimitTable(filePath: string): RateLimitTable {
  const resolved = path.resolve(filePath);
  if (!existsSync(resolved)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolved, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not read rate limit file ${resolved}: ${errorMessage(error)}`, { cause: error });
  }

  const result = RateLimitTableSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid rate limit file ${resolved}: ${issues}`);
  }
  return result.data;
}

export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  const env = result.data;

  return {
    environment: env.NODE_ENV,
    download: {
      rootDir: env.DOWNLOAD_ROOT,
      workerCount: env.DOWNLOAD_WORKERS,
      groupDelayMs: env.DOWNLOAD_GROUP_DELAY_MS,
      batchPollIntervalMs: env.BATCH_POLL_INTERVAL_MS,
      fetchTimeoutMs: env.FETCH_TIMEOUT_MS,
      proxyUrl: env.HTTP_PROXY_URL,
      defaultHeaders: {
        'User-Agent': env.USER_AGENT,
      },
    },
    rateLimit: {
      defaultLimit: {
        concurrency: env.RATE_LIMIT_DEFAULT_CONCURRENCY,
        minIntervalMs: env.RATE_LIMIT_DEFAULT_INTERVAL_MS,
      },
      origins: loadRateLimitTable(env.RATE_LIMIT_FILE),
      admissionTimeoutMs: env.ADMISSION_TIMEOUT_MS,
      sourceFile: env.RATE_LIMIT_FILE,
    },
    observability: {
      logLevel: env.LOG_LEVEL,
    },
  };
}

export const appConfig: AppConfig = loadConfig();

export default appConfig;
