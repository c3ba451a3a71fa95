import crypto from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import { errorMeta, type Logger } from '../utils/logger.js';
import { ensureDir, resolvePath } from '../utils/path.js';

export const TOKEN_LENGTH = 64;

const TOKEN_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';

const namespaceSchema = z.object({
  exclusive: z.boolean().default(false),
  regex: z.string(),
});

export const registrationSchema = z.object({
  id: z.string().min(1),
  url: z.string().nullable().default(null),
  as_token: z.string().min(1),
  hs_token: z.string().min(1),
  sender_localpart: z.string().min(1),
  namespaces: z
    .object({
      users: z.array(namespaceSchema).default([]),
      aliases: z.array(namespaceSchema).default([]),
      rooms: z.array(namespaceSchema).default([]),
    })
    .default({}),
  rate_limited: z.boolean().optional(),
  protocols: z.array(z.string()).optional(),
  receive_ephemeral: z.boolean().optional(),
});

export type Registration = z.output<typeof registrationSchema>;

export interface RegistrationInit {
  id: string;
  senderLocalpart: string;
  url: string;
}

export class RegistrationError extends Error {
  constructor(message: string, readonly filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RegistrationError';
  }
}

export const generateToken = (length = TOKEN_LENGTH) => {
  let token = '';
  for (let i = 0; i < length; i += 1) {
    token += TOKEN_ALPHABET[crypto.randomInt(TOKEN_ALPHABET.length)];
  }
  return token;
};

export const createRegistration = (init: RegistrationInit): Registration => ({
  id: init.id,
  url: init.url,
  as_token: generateToken(),
  hs_token: generateToken(),
  sender_localpart: init.senderLocalpart,
  namespaces: { users: [], aliases: [], rooms: [] },
  rate_limited: false,
});

export const serializeRegistration = (registration: Registration) => stringifyYaml(registration);

export const parseRegistration = (text: string, filePath: string): Registration => {
  let raw: unknown;
  try {
    raw = parseYaml(text) as unknown;
  } catch (error) {
    throw new RegistrationError('registration file is not valid YAML', filePath, { cause: error });
  }

  const parsed = registrationSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join(', ');
    throw new RegistrationError(`invalid registration: ${details}`, filePath, { cause: parsed.error });
  }
  return parsed.data;
};

export const bridgeUserId = (registration: Registration, serverName: string) =>
  `@${registration.sender_localpart}:${serverName}`;

const isNotFound = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Reads the registration at `filePath`, or writes a fresh one with random
 * tokens when the file does not exist yet. Any other read failure is fatal.
 */
export const loadOrCreateRegistration = async (
  filePath: string,
  init: RegistrationInit,
  logger: Logger,
): Promise<{ registration: Registration; created: boolean }> => {
  const absolutePath = resolvePath(filePath);

  let text: string | null = null;
  try {
    text = await fs.readFile(absolutePath, { encoding: 'utf8' });
  } catch (error) {
    if (!isNotFound(error)) {
      throw new RegistrationError('failed to open existing registration file', absolutePath, { cause: error });
    }
    logger.debug('failed to open registration file', { path: absolutePath, ...errorMeta(error) });
  }

  if (text !== null) {
    logger.debug('loading registration from file', { path: absolutePath });
    return { registration: parseRegistration(text, absolutePath), created: false };
  }

  logger.warn('registration file is missing; creating a new registration in its place', { path: absolutePath });
  const dirPath = path.dirname(absolutePath);
  logger.info('creating leading directories', { dirPath });
  await ensureDir(dirPath);

  const registration = createRegistration(init);
  try {
    await fs.writeFile(absolutePath, serializeRegistration(registration), { encoding: 'utf8', mode: 0o600, flag: 'wx' });
  } catch (error) {
    throw new RegistrationError('could not create registration file', absolutePath, { cause: error });
  }
  logger.info('created registration file', { path: absolutePath });

  return { registration, created: true };
};
