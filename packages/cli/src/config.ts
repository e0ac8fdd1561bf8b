import { z } from 'zod';
import { AppError } from '@tokensum/core';

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8000;
export const DEFAULT_WELCOME = 'Welcome to the token generator!';

export interface AppConfig {
  host: string;
  port: number;
  /** Public URL advertised in the OpenAPI document */
  baseUrl: string;
  welcome: string;
  /** Log one line per request */
  accessLog: boolean;
}

const httpOrHttpsUrlSchema = z.string().url().refine((value) => {
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}, 'Must be an HTTP(S) URL.');

const configSchema = z.object({
  HOST: z.string().min(1).default(DEFAULT_HOST),
  PORT: z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  BASE_URL: httpOrHttpsUrlSchema.optional(),
  WELCOME_MESSAGE: z.string().min(1).default(DEFAULT_WELCOME),
  ACCESS_LOG: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
});

type ConfigKey = keyof z.input<typeof configSchema>;

const CONFIG_KEYS: readonly ConfigKey[] = ['HOST', 'PORT', 'BASE_URL', 'WELCOME_MESSAGE', 'ACCESS_LOG'];

/** Command line flags that override their environment variable. */
const FLAG_KEYS: Record<string, ConfigKey> = {
  '--host': 'HOST',
  '--port': 'PORT',
};

/**
 * Build the server configuration from environment variables and
 * `--flag=value` arguments. Flags win over the environment; blank
 * values count as unset.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  args: readonly string[] = [],
): AppConfig {
  const raw: Partial<Record<ConfigKey, string>> = {};

  for (const key of CONFIG_KEYS) {
    const value = env[key]?.trim();
    if (value) raw[key] = value;
  }

  for (const arg of args) {
    const eq = arg.indexOf('=');
    if (eq < 0) continue;
    const key = FLAG_KEYS[arg.slice(0, eq)];
    const value = arg.slice(eq + 1).trim();
    if (key && value) raw[key] = value;
  }

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new AppError('CONFIG_INVALID', `Invalid configuration: ${problems.join('; ')}`, {
      cause: result.error,
      issues: problems,
    });
  }

  const { HOST, PORT, BASE_URL, WELCOME_MESSAGE, ACCESS_LOG } = result.data;
  return {
    host: HOST,
    port: PORT,
    baseUrl: BASE_URL ?? `http://${HOST}:${PORT}`,
    welcome: WELCOME_MESSAGE,
    accessLog: ACCESS_LOG,
  };
}
