/**
 * @file src/lib/utils.ts
 * @description Utility functions: escaping and attribute value normalization
 */
import { InvalidArgumentError } from './errors';

export type RawValue = Buffer | string;
export type ValueInput = RawValue | readonly RawValue[] | null | undefined;

/**
 * Escape a value for use inside a DN (RFC 4514)
 */
export const escapeDnValue = (value: string): string => {
  let escaped = value.replace(/([,+"\\<>;=])/g, '\\$1');
  if (escaped.startsWith(' ') || escaped.startsWith('#')) {
    escaped = '\\' + escaped;
  }
  if (escaped.endsWith(' ') && !escaped.endsWith('\\ ')) {
    escaped = escaped.slice(0, -1) + '\\ ';
  }
  return escaped;
};

/**
 * Escape a value for use inside a search filter (RFC 4515)
 */
export const escapeLdapFilter = (value: string): string =>
  value.replace(
    /[*()\\\0]/g,
    c => '\\' + c.charCodeAt(0).toString(16).padStart(2, '0')
  );

/**
 * Wrap a bare value into a list; null and undefined become an empty list
 */
export const toValueList = (value: ValueInput): RawValue[] => {
  if (value === null || value === undefined) return [];
  if (typeof value === 'string' || Buffer.isBuffer(value)) return [value];
  return [...value];
};

/**
 * Ensure every value is a byte string
 * @throws InvalidArgumentError otherwise
 */
export const requireBuffers = (values: readonly unknown[]): Buffer[] => {
  const buffers: Buffer[] = [];
  for (const value of values) {
    if (!Buffer.isBuffer(value)) {
      throw new InvalidArgumentError('expected a byte string in the list');
    }
    buffers.push(value);
  }
  return buffers;
};

export const toBuffer = (value: RawValue): Buffer =>
  Buffer.isBuffer(value) ? Buffer.from(value) : Buffer.from(value, 'utf8');

export const decodeValue = (value: Buffer): string => value.toString('utf8');

export const includesValue = (
  values: readonly Buffer[],
  candidate: Buffer
): boolean => values.some(v => v.equals(candidate));
