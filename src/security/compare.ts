import crypto from 'node:crypto';

/** Byte-for-byte comparison that takes the same time for any two equal-length inputs. */
export const safeEqual = (presented: string, expected: string) => {
  const a = Buffer.from(presented, 'utf8');
  const b = Buffer.from(expected, 'utf8');
  return a.length === b.length && crypto.timingSafeEqual(a, b);
};
