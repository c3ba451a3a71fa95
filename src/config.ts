import path from 'node:path';
import { config as loadDotenv, type DotenvParseOutput } from 'dotenv';
import { z, type ZodIssue } from 'zod';
import { resolveConfigSecrets, SECRET_SOURCE_KEYS } from './security/secrets.js';

const bool = z.preprocess((value) => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    if (value === 1) return true;
    if (value === 0) return false;
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    return value;
  }
  return value;
}, z.boolean());

export interface ListenAddress {
  host: string;
  port: number;
}

/** Splits `host:port`; IPv6 hosts are written in brackets, e.g. `[::1]:3000`. */
export const parseListenAddress = (value: string): ListenAddress | null => {
  const match = /^(?:\[([^\]]+)\]|([^:[\]]+)):(\d{1,5})$/.exec(value.trim());
  if (!match) return null;

  const host = match[1] ?? match[2] ?? '';
  const port = Number(match[3]);
  if (!host || !Number.isInteger(port) || port > 65535) return null;
  return { host, port };
};

const listenAddress = z
  .string()
  .transform((value, ctx) => {
    const parsed = parseListenAddress(value);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected host:port' });
      return z.NEVER;
    }
    return parsed;
  })
  .default('0.0.0.0:3000');

const schemaBase = z.object({
  NODE_ENV: z.string().default('production'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  HOMESERVER_URL: z.string().url(),
  HOMESERVER_NAME: z.string().default(''),

  APPSERVICE_REGISTRATION: z.string().min(1),
  APPSERVICE_ID: z.string().min(1).default('matrix-free-stuff'),
  APPSERVICE_SENDER_LOCALPART: z
    .string()
    .regex(/^[a-z0-9._=\-/]+$/, 'must be a valid user localpart')
    .default('free-stuff'),
  APPSERVICE_URL: z.string().default(''),

  WEBHOOK_PATH: z.string().startsWith('/').default('/'),
  WEBHOOK_SECRET: z.string().default(''),
  WEBHOOK_ADDR: listenAddress,

  MAX_BODY_BYTES: z.coerce.number().int().min(1024).max(64 * 1024 * 1024).default(1024 * 1024),
  HOMESERVER_TIMEOUT_MS: z.coerce.number().int().min(100).max(5 * 60 * 1000).default(10000),
  SELF_PING_ON_START: bool.default(true),
});

export const appConfigSchema = schemaBase.superRefine((input, ctx) => {
  if (input.APPSERVICE_URL && !z.string().url().safeParse(input.APPSERVICE_URL).success) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['APPSERVICE_URL'],
      message: 'APPSERVICE_URL must be empty or a URL the homeserver can reach.',
    });
  }
});

type SchemaInput = z.input<typeof appConfigSchema>;
type SchemaOutput = z.output<typeof appConfigSchema>;

const CONFIG_KEYS: readonly string[] = Object.keys(schemaBase.shape);
const KNOWN_CONFIG_KEYS = new Set<string>([...CONFIG_KEYS, ...SECRET_SOURCE_KEYS]);

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

const formatIssue = (issue: ZodIssue) => {
  const key = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${key}: ${issue.message}`;
};

export const formatConfigSchemaIssues = (issues: ZodIssue[]): string =>
  issues.map((issue) => `- ${formatIssue(issue)}`).join('\n');

const unknownDotenvKeys = (input: DotenvParseOutput | undefined): string[] => {
  if (!input) return [];
  return Object.keys(input)
    .filter((key) => !KNOWN_CONFIG_KEYS.has(key))
    .sort();
};

const pickConfigValues = (env: NodeJS.ProcessEnv): Partial<Record<keyof SchemaInput, string>> => {
  const output: Record<string, string> = {};
  for (const key of CONFIG_KEYS) {
    const value = env[key];
    if (value !== undefined) output[key] = value;
  }
  return output;
};

const parseSchema = (env: NodeJS.ProcessEnv): SchemaOutput => {
  const parsed = appConfigSchema.safeParse(pickConfigValues(env));
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration:\n${formatConfigSchemaIssues(parsed.error.issues)}`);
  }
  return parsed.data;
};

export const parseAppConfig = (
  env: NodeJS.ProcessEnv,
  dotenvVars: DotenvParseOutput | undefined = undefined,
  envFilePath = '.env',
) => {
  const unknown = unknownDotenvKeys(dotenvVars);
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown config key(s) in ${envFilePath}: ${unknown.join(', ')}`);
  }

  let resolved: NodeJS.ProcessEnv;
  try {
    resolved = resolveConfigSecrets(env);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid configuration:\n- ${reason}`, { cause: error });
  }

  const parsed = parseSchema(resolved);
  return {
    ...parsed,
    HOMESERVER_URL: parsed.HOMESERVER_URL.replace(/\/+$/, ''),
    HOMESERVER_NAME: parsed.HOMESERVER_NAME || new URL(parsed.HOMESERVER_URL).host,
    HOMESERVER_NAME_DERIVED: !parsed.HOMESERVER_NAME,
    WEBHOOK_SECRET: parsed.WEBHOOK_SECRET ? parsed.WEBHOOK_SECRET : null,
  };
};

export type AppConfig = ReturnType<typeof parseAppConfig>;

/**
 * Reads the env file named by `BRIDGE_ENV_FILE` (default `./.env`) into
 * `env` without overriding values already present, then parses `env`.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const envFilePath = env.BRIDGE_ENV_FILE || path.join(process.cwd(), '.env');
  const dotenvOutput = loadDotenv({ path: envFilePath, processEnv: env });
  const loadError = dotenvOutput.error;
  if (loadError && !('code' in loadError && loadError.code === 'ENOENT')) {
    throw new ConfigError(`Unable to load config file ${envFilePath}: ${loadError.message}`, { cause: loadError });
  }
  return parseAppConfig(env, dotenvOutput.parsed, envFilePath);
};
