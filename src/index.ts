/**
 * @packageDocumentation mock-ldap-directory
 *
 * In-memory emulator of an LDAP connection, for exercising directory client
 * code in tests without a server.
 *
 * @example
 * const ldap = new LdapEmulator(directory);
 * const ticket = unwrap(ldap.search('dc=example,dc=com', SearchScope.OneLevel));
 * const { entries } = unwrap(ldap.result(ticket));
 */
export {
  LdapEmulator,
  SearchScope,
  ModifyOperation,
  ResultType,
} from './lib/ldapEmulator';
export type {
  AddRecord,
  AddResult,
  EmulatorCalls,
  EmulatorOptions,
  Modification,
  OperationResult,
  OptionKey,
  PasswordChangeResult,
  SearchArgs,
  SearchEntry,
  SearchResultMessage,
} from './lib/ldapEmulator';
export {
  ErrorKind,
  LdapError,
  InvalidDnSyntaxError,
  NoSuchObjectError,
  AlreadyExistsError,
  ProtocolError,
  InvalidCredentialsError,
  InvalidFilterError,
  UnsupportedFilterError,
  SeedRequiredError,
  InvalidArgumentError,
  unwrap,
} from './lib/errors';
export type { Outcome } from './lib/errors';
export { DistinguishedName } from './lib/dn';
export type { Rdn, AttributeTypeAndValue } from './lib/dn';
export { Entry } from './lib/entry';
export type { AttributeMap } from './lib/entry';
export type { SeedDirectory, SeedEntry } from './lib/directoryStore';
export { parseFilter, FilterType } from './lib/filter';
export type { FilterNode } from './lib/filter';
export { verifyPassword, encodeSsha, PasswordScheme } from './lib/password';
export type { RecordedCall } from './lib/recorder';
export {
  fromChanges,
  fromAttributes,
  toLdaptsEntries,
} from './lib/ldaptsAdapters';
export type { LdaptsEntry } from './lib/ldaptsAdapters';
export { loadConfig } from './config/args';
export type { Config, LogLevel } from './config/args';
export { buildLogger } from './logger/winston';
export * from './lib/utils';
