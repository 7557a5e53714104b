/**
 * Password verification against possibly hashed attribute values
 *
 * Stored values may carry a scheme tag: "{CRYPT}", "{SSHA}". Untagged
 * values are compared as plain text; unknown schemes never match.
 */
import { createHash } from 'crypto';

import crypt from 'unix-crypt-td-js';

const SCHEME_RE = /^{(.*?)}(.*)$/s;
const SHA1_LENGTH = 20;

export enum PasswordScheme {
  Crypt = 'CRYPT',
  Ssha = 'SSHA',
}

const verifyCrypt = (password: string, hashed: string): boolean =>
  crypt(password, hashed.slice(0, 4)) === hashed;

const verifySsha = (password: string, encoded: string): boolean => {
  const decoded = Buffer.from(encoded, 'base64');
  if (decoded.length < SHA1_LENGTH) return false;
  const digest = createHash('sha1')
    .update(Buffer.from(password, 'utf8'))
    .update(decoded.subarray(SHA1_LENGTH))
    .digest();
  return digest.equals(decoded.subarray(0, SHA1_LENGTH));
};

export const verifyPassword = (password: string, stored: string): boolean => {
  const match = SCHEME_RE.exec(stored);
  if (!match) return stored === password;
  const [, scheme, raw] = match;
  switch (scheme.toUpperCase()) {
    case PasswordScheme.Crypt:
      return verifyCrypt(password, raw);
    case PasswordScheme.Ssha:
      return verifySsha(password, raw);
    default:
      return false;
  }
};

/**
 * Build a "{SSHA}" value, for seeding directories
 */
export const encodeSsha = (password: string, salt: Buffer): string => {
  const digest = createHash('sha1')
    .update(Buffer.from(password, 'utf8'))
    .update(salt)
    .digest();
  return `{SSHA}${Buffer.concat([digest, salt]).toString('base64')}`;
};
