import fs from 'fs';
import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

const logLevels = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

const runtimeSchema = z.object({
  env: z.enum(['development', 'production', 'test']).default('development'),
  port: z.number().default(3000),
  logLevel: z.enum(logLevels).default('info'),
});

const required = (label: string, variable: string) =>
  z.string({
    required_error:
      `A ${label} should be provided, either in the \`${variable}\` environment variable ` +
      `or in a file whose path is passed via \`${variable}_FILE\``,
  }).min(1, `${label} must not be empty`);

const configSchema = runtimeSchema.extend({
  gocardless: z.object({
    baseUrl: z.string().url().default('https://bankaccountdata.gocardless.com'),
    secretId: required('GoCardless secret ID', 'GC_SECRET_ID'),
    secretKey: required('GoCardless secret key', 'GC_SECRET_KEY'),
    redirectUrl: z.string().default('https://www.google.com'),
    countryCode: z.string().length(2).optional(),
    maxHistoricalDays: z.number().int().positive().default(730),
    accessValidForDays: z.number().int().positive().default(90),
  }),

  database: z.object({
    host: required('DB host', 'DB_HOST'),
    port: z.number().int().positive().default(5432),
    user: required('DB user', 'DB_USER'),
    password: required('DB password', 'DB_PASSWORD'),
    name: required('DB name', 'DB_NAME'),
  }),

  smtp: z.object({
    host: required('SMTP host', 'SMTP_HOST'),
    port: z.number().int().positive().default(465),
    username: required('SMTP username', 'SMTP_USERNAME'),
    password: required('SMTP password', 'SMTP_PASSWORD'),
    fromEmail: required('From email', 'FROM_EMAIL').email(),
  }),

  userEmail: required('User email', 'USER_EMAIL').email(),

  sync: z.object({
    pollIntervalSeconds: z.number().int().nonnegative().default(0),
  }),
});

export type RuntimeConfig = z.infer<typeof runtimeSchema>;
export type Config = z.infer<typeof configSchema>;

/**
 * Reads `NAME` from the environment, or the contents of the file named by
 * `NAME_FILE` when that is set (Docker secrets).
 */
export function readEnv(env: Env, name: string): string | undefined {
  const file = env[`${name}_FILE`];
  if (file) {
    return fs.readFileSync(file, 'utf8').trim();
  }
  return env[name] || undefined;
}

function readNumber(env: Env, name: string): number | undefined {
  const value = readEnv(env, name);
  return value === undefined ? undefined : Number(value);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('\n');
}

export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  return runtimeSchema.parse({
    env: env.NODE_ENV,
    port: Number(env.PORT) || 3000,
    logLevel: env.LOG_LEVEL || (env.NODE_ENV === 'test' ? 'silent' : undefined),
  });
}

export function loadConfig(env: Env = process.env): Config {
  const rawConfig = {
    ...loadRuntimeConfig(env),

    gocardless: {
      baseUrl: env.GC_BASE_URL || undefined,
      secretId: readEnv(env, 'GC_SECRET_ID'),
      secretKey: readEnv(env, 'GC_SECRET_KEY'),
      redirectUrl: env.GC_REDIRECT_URL || undefined,
      countryCode: env.GC_COUNTRY_CODE || undefined,
      maxHistoricalDays: readNumber(env, 'GC_MAX_HISTORICAL_DAYS'),
      accessValidForDays: readNumber(env, 'GC_ACCESS_VALID_FOR_DAYS'),
    },

    database: {
      host: readEnv(env, 'DB_HOST'),
      port: readNumber(env, 'DB_PORT'),
      user: readEnv(env, 'DB_USER'),
      password: readEnv(env, 'DB_PASSWORD'),
      name: readEnv(env, 'DB_NAME'),
    },

    smtp: {
      host: readEnv(env, 'SMTP_HOST'),
      port: readNumber(env, 'SMTP_PORT'),
      username: readEnv(env, 'SMTP_USERNAME'),
      password: readEnv(env, 'SMTP_PASSWORD'),
      fromEmail: readEnv(env, 'FROM_EMAIL'),
    },

    userEmail: readEnv(env, 'USER_EMAIL'),

    sync: {
      pollIntervalSeconds: readNumber(env, 'POLL_INTERVAL_SECONDS'),
    },
  };

  const result = configSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

let cached: Config | null = null;

export function getConfig(): Config {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}
