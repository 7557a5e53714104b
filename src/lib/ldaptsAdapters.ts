/**
 * Conversions between ldapts client objects and emulator inputs/outputs,
 * so code written against ldapts can drive the emulator
 */
import type { Attribute, Change, SearchResult } from 'ldapts';

import {
  ModifyOperation,
  type AddRecord,
  type Modification,
  type SearchEntry,
} from './ldapEmulator';
import { decodeValue, type ValueInput } from './utils';

export type LdaptsEntry = SearchResult['searchEntries'][number];

const OPERATIONS: Record<Change['operation'], ModifyOperation> = {
  add: ModifyOperation.Add,
  delete: ModifyOperation.Delete,
  replace: ModifyOperation.Replace,
};

export const fromChanges = (changes: readonly Change[]): Modification[] =>
  changes.map(change => ({
    operation: OPERATIONS[change.operation],
    attribute: change.modification.type,
    values: change.modification.values,
  }));

export const fromAttributes = (attributes: readonly Attribute[]): AddRecord =>
  attributes.map((attribute): [string, ValueInput] => [
    attribute.type,
    attribute.values,
  ]);

/**
 * Search results in the shape ldapts returns: a single value as a string,
 * several values as a string array
 */
export const toLdaptsEntries = (entries: readonly SearchEntry[]): LdaptsEntry[] =>
  entries.map(({ dn, attributes }) => {
    const entry: LdaptsEntry = { dn };
    for (const [name, values] of Object.entries(attributes)) {
      const text = values.map(decodeValue);
      entry[name] = text.length === 1 ? text[0] : text;
    }
    return entry;
  });
