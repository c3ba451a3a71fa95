import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';

export const expandPath = (input: string) => {
  if (!input.startsWith('~')) return input;
  return input.replace(/^~(?=$|\/)/, os.homedir());
};

export const ensureDir = async (input: string) => {
  await fs.mkdir(input, { recursive: true });
};

/** Absolute form of a possibly `~`-prefixed or relative path. */
export const resolvePath = (input: string) => path.resolve(expandPath(input));
