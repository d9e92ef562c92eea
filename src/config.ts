import { readFileSync } from 'node:fs';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError, describeError } from './errors.js';
import type { LogFormat, LogThreshold } from './logger.js';

export const DEFAULT_RESULT_HEADER = ['Date', 'Location', 'Status'] as const;

export interface BrowserConfig {
  executablePath?: string;
  channel?: string;
  headless: boolean;
  sandbox: boolean;
  args: string[];
  launchTimeoutMs: number;
  navigationTimeoutMs: number;
  actionTimeoutMs: number;
}

export interface ServiceConfig {
  host: string;
  port: number;
  logLevel: LogThreshold;
  logFormat: LogFormat;
  carrierProfilesPath: string;
  carrierUrl?: string;
  browser: BrowserConfig;
  resultTimeoutMs: number;
  maxSessions: number;
  queueTimeoutMs: number;
  scrapeAttempts: number;
  retryDelayMs: number;
  resultHeader: readonly [string, string, string];
}

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
    .optional()
    .transform((value) => (value === undefined ? fallback : ['true', '1', 'yes'].includes(value)));

const milliseconds = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  NODE_ENV: z.string().optional(),
  HOST: z.string().trim().min(1).default('127.0.0.1'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  LOG_FORMAT: z.enum(['pretty', 'json']).optional(),
  CARRIER_PROFILES: z.string().trim().min(1).default('config/carriers.json'),
  CARRIER_URL: z.string().trim().url().optional(),
  BROWSER_EXECUTABLE_PATH: optionalString,
  BROWSER_CHANNEL: optionalString,
  BROWSER_HEADLESS: booleanFlag(true),
  BROWSER_SANDBOX: booleanFlag(false),
  BROWSER_ARGS: z
    .string()
    .optional()
    .transform((value) =>
      (value ?? '')
        .split(',')
        .map((arg) => arg.trim())
        .filter(Boolean)
    ),
  BROWSER_LAUNCH_TIMEOUT_MS: milliseconds(30_000),
  NAVIGATION_TIMEOUT_MS: milliseconds(30_000),
  ACTION_TIMEOUT_MS: milliseconds(5_000),
  RESULT_TIMEOUT_MS: milliseconds(15_000),
  MAX_SESSIONS: z.coerce.number().int().min(1).max(64).default(2),
  QUEUE_TIMEOUT_MS: milliseconds(10_000),
  SCRAPE_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),
  RETRY_DELAY_MS: milliseconds(500),
  RESULT_HEADER: z
    .string()
    .optional()
    .transform((value) => (value ?? DEFAULT_RESULT_HEADER.join(',')).split(',').map((label) => label.trim()))
    .pipe(z.tuple([z.string().min(1), z.string().min(1), z.string().min(1)])),
});

/**
 * Merge variables from a .env file into `env`. Variables already set win;
 * a missing file is not an error.
 */
export function loadEnvFile(path = '.env', env: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  let source: string;
  try {
    source = readFileSync(path, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) return env;
    throw new ConfigError([`${path}: ${describeError(err)}`]);
  }

  for (const [key, value] of Object.entries(dotenv.parse(source))) {
    if (env[key] === undefined) env[key] = value;
  }
  return env;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Parse and validate service configuration from environment variables.
 * Throws a ConfigError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const e = parsed.data;
  return Object.freeze({
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    logFormat: e.LOG_FORMAT ?? (e.NODE_ENV === 'production' ? 'json' : 'pretty'),
    carrierProfilesPath: e.CARRIER_PROFILES,
    carrierUrl: e.CARRIER_URL,
    browser: Object.freeze({
      executablePath: e.BROWSER_EXECUTABLE_PATH,
      channel: e.BROWSER_CHANNEL,
      headless: e.BROWSER_HEADLESS,
      sandbox: e.BROWSER_SANDBOX,
      args: e.BROWSER_ARGS,
      launchTimeoutMs: e.BROWSER_LAUNCH_TIMEOUT_MS,
      navigationTimeoutMs: e.NAVIGATION_TIMEOUT_MS,
      actionTimeoutMs: e.ACTION_TIMEOUT_MS,
    }),
    resultTimeoutMs: e.RESULT_TIMEOUT_MS,
    maxSessions: e.MAX_SESSIONS,
    queueTimeoutMs: e.QUEUE_TIMEOUT_MS,
    scrapeAttempts: e.SCRAPE_ATTEMPTS,
    retryDelayMs: e.RETRY_DELAY_MS,
    resultHeader: e.RESULT_HEADER,
  });
}
