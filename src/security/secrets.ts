import fs from 'node:fs';
import path from 'node:path';

export type SecretBackend = 'env' | 'file';

const SECRET_BACKENDS: ReadonlySet<string> = new Set<SecretBackend>(['env', 'file']);

export const CONFIG_SECRET_KEYS = ['WEBHOOK_SECRET'] as const;

export type ConfigSecretKey = (typeof CONFIG_SECRET_KEYS)[number];

/** Env keys that select where a secret comes from rather than holding one. */
export const SECRET_SOURCE_KEYS: readonly string[] = CONFIG_SECRET_KEYS.flatMap((key) => [`${key}_FILE`, `${key}_BACKEND`]);

export const MAX_SECRET_BYTES = 8192;

export class SecretResolutionError extends Error {
  constructor(
    readonly key: ConfigSecretKey,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SecretResolutionError';
  }
}

const stripTrailingLineBreaks = (value: string) => value.replace(/(?:\r?\n)+$/g, '');

const validateSecretValue = (name: ConfigSecretKey, value: string, maxSecretBytes: number) => {
  if (value.includes('\u0000')) {
    throw new SecretResolutionError(name, `${name} contains NUL bytes`);
  }
  if (Buffer.byteLength(value, 'utf8') > maxSecretBytes) {
    throw new SecretResolutionError(name, `${name} exceeds ${maxSecretBytes} bytes`);
  }
  return value;
};

const readSecretFile = (name: ConfigSecretKey, filePath: string, maxSecretBytes: number) => {
  if (!path.isAbsolute(filePath)) {
    throw new SecretResolutionError(name, `${name}_FILE must be an absolute path`);
  }

  let stats: fs.Stats;
  try {
    stats = fs.statSync(filePath);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SecretResolutionError(name, `${name}_FILE path is not readable: ${reason}`, { cause: error });
  }

  if (!stats.isFile()) {
    throw new SecretResolutionError(name, `${name}_FILE must point to a file`);
  }
  if (stats.size > maxSecretBytes) {
    throw new SecretResolutionError(name, `${name}_FILE exceeds ${maxSecretBytes} bytes`);
  }

  const raw = fs.readFileSync(filePath, { encoding: 'utf8' });
  return validateSecretValue(name, stripTrailingLineBreaks(raw), maxSecretBytes);
};

const isSecretBackend = (value: string): value is SecretBackend => SECRET_BACKENDS.has(value);

const resolveBackend = (name: ConfigSecretKey, inputEnv: NodeJS.ProcessEnv): SecretBackend => {
  const explicit = inputEnv[`${name}_BACKEND`]?.trim().toLowerCase();
  if (explicit) {
    if (!isSecretBackend(explicit)) {
      throw new SecretResolutionError(name, `${name}_BACKEND must be one of env,file`);
    }
    return explicit;
  }

  return inputEnv[`${name}_FILE`] ? 'file' : 'env';
};

/** Returns a copy of `inputEnv` with every secret key replaced by its resolved value. */
export const resolveConfigSecrets = (inputEnv: NodeJS.ProcessEnv, maxSecretBytes = MAX_SECRET_BYTES) => {
  const resolved: NodeJS.ProcessEnv = { ...inputEnv };

  for (const key of CONFIG_SECRET_KEYS) {
    const backend = resolveBackend(key, inputEnv);
    resolved[key] =
      backend === 'file'
        ? readSecretFile(key, inputEnv[`${key}_FILE`] ?? '', maxSecretBytes)
        : validateSecretValue(key, inputEnv[key] ?? '', maxSecretBytes);
  }

  return resolved;
};
