import { z } from 'zod';
import { ConfigError } from '../domain/index.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/** Integer env var with a default; empty string counts as unset. */
function intVar(fallback: number, min: number, max: number) {
  return z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === '' ? String(fallback) : v.trim()))
    .pipe(z.coerce.number().int().min(min).max(max));
}

/**
 * Environment schema.
 *
 * DATABASE_URL is the only required variable. `memory://` selects the
 * in-memory store.
 */
const envSchema = z.object({
  APP_ENV: z.string().min(3).default('development'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: intVar(8080, 1, 65535),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  DATABASE_URL: z
    .string({ required_error: 'DATABASE_URL environment variable not set' })
    .refine(
      (url) => /^(postgres|postgresql|memory):\/\//.test(url),
      'must start with postgres://, postgresql:// or memory://',
    ),
  DATABASE_POOL_MAX: intVar(10, 1, 100),
  BODY_LIMIT: intVar(4096, 256, 1024 * 1024),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  appEnv: string;
  host: string;
  port: number;
  logLevel: LogLevel;
  databaseUrl: string;
  databasePoolMax: number;
  bodyLimit: number;
}

/**
 * Loads and validates process configuration from environment variables.
 *
 * Throws `ConfigError` naming every offending variable.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((i) => String(i.path[0] ?? 'env')))];
    const details = parsed.error.issues
      .map((i) => `${String(i.path[0] ?? 'env')}: ${i.message}`)
      .join('; ');
    throw new ConfigError(variables, `Invalid configuration: ${details}`);
  }

  const cfg = parsed.data;
  return {
    appEnv: cfg.APP_ENV,
    host: cfg.HOST,
    port: cfg.PORT,
    logLevel: cfg.LOG_LEVEL,
    databaseUrl: cfg.DATABASE_URL,
    databasePoolMax: cfg.DATABASE_POOL_MAX,
    bodyLimit: cfg.BODY_LIMIT,
  };
}

/** Connection string with the password masked, for logging. */
export function redactDatabaseUrl(url: string): string {
  return url.replace(/^([a-z]+:\/\/[^:/@]+:)[^@]*@/i, '$1***@');
}
