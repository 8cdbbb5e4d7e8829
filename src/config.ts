import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  APP_NAME: z.string().min(1).default('Task Manager API'),
  ENVIRONMENT: z.string().min(1).default('development'),
  DEBUG: booleanFlag,

  SECRET_KEY: z.string().min(1).default('change-me-in-production'),
  ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(60),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(31).default(10),

  DB_PATH: z.string().min(1).default('taskmanager.db'),

  CORS_ORIGINS: z.string().default('*'),

  // Stored only; nothing throttles requests.
  RATE_LIMIT_REQUESTS: z.coerce.number().int().positive().default(100),
  RATE_LIMIT_WINDOW: z.coerce.number().int().positive().default(60),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  HOST: z.string().default('127.0.0.1'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export interface Settings {
  appName: string;
  version: string;
  environment: string;
  debug: boolean;
  secretKey: string;
  accessTokenExpireMinutes: number;
  bcryptRounds: number;
  dbPath: string;
  corsOrigins: string[];
  rateLimit: { requests: number; windowSeconds: number };
  logLevel: LogLevel;
  host: string;
  port: number;
}

export const APP_VERSION = '1.0.0';

export function parseCorsOrigins(raw: string): string[] {
  if (raw.trim() === '*') return ['*'];
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * Reads settings from an env-style record. Throws a ZodError naming every
 * invalid variable, so a bad deployment fails at startup.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.parse(env);
  return {
    appName: parsed.APP_NAME,
    version: APP_VERSION,
    environment: parsed.ENVIRONMENT,
    debug: parsed.DEBUG,
    secretKey: parsed.SECRET_KEY,
    accessTokenExpireMinutes: parsed.ACCESS_TOKEN_EXPIRE_MINUTES,
    bcryptRounds: parsed.BCRYPT_ROUNDS,
    dbPath: parsed.DB_PATH,
    corsOrigins: parseCorsOrigins(parsed.CORS_ORIGINS),
    rateLimit: {
      requests: parsed.RATE_LIMIT_REQUESTS,
      windowSeconds: parsed.RATE_LIMIT_WINDOW,
    },
    logLevel: parsed.LOG_LEVEL,
    host: parsed.HOST,
    port: parsed.PORT,
  };
}
