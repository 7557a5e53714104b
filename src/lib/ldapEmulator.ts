/**
 * In-memory LDAP connection
 *
 * Reproduces the request/response semantics of a directory connection
 * (bind, search, compare, modify, add, delete, rename, password change)
 * against a seeded tree, without any network. Every operation runs to
 * completion synchronously and returns an {@link Outcome}.
 *
 * @example
 * const ldap = new LdapEmulator({
 *   'dc=example,dc=com': { objectClass: ['domain'] },
 *   'uid=jdoe,dc=example,dc=com': { uid: ['jdoe'], userPassword: ['secret'] },
 * });
 * unwrap(ldap.bind('uid=jdoe,dc=example,dc=com', 'secret'));
 * const entries = unwrap(
 *   ldap.searchImmediate('dc=example,dc=com', SearchScope.Subtree, '(uid=jdoe)')
 * );
 */
import type { Control } from 'ldapts';
import type winston from 'winston';

import { loadConfig, type Config } from '../config/args';
import { buildLogger } from '../logger/winston';

import { AsyncResultQueue } from './asyncResults';
import { DirectoryStore, type SeedDirectory } from './directoryStore';
import { DistinguishedName } from './dn';
import { Entry, type AttributeMap } from './entry';
import {
  AlreadyExistsError,
  InvalidArgumentError,
  InvalidCredentialsError,
  InvalidDnSyntaxError,
  LdapError,
  NoSuchObjectError,
  ProtocolError,
  SeedRequiredError,
  UnsupportedFilterError,
  attempt,
  failure,
  success,
  unwrap,
  type Outcome,
} from './errors';
import {
  EntryMatcher,
  filterToString,
  parseFilter,
  type FilterNode,
} from './filter';
import { verifyPassword } from './password';
import { CallRecorder, type RecordedCall } from './recorder';
import {
  requireBuffers,
  toBuffer,
  toValueList,
  type RawValue,
  type ValueInput,
} from './utils';

export enum SearchScope {
  Base = 0,
  OneLevel = 1,
  Subtree = 2,
}

export enum ModifyOperation {
  Add = 0,
  Delete = 1,
  Replace = 2,
}

// Protocol message types reported on success
export enum ResultType {
  Bind = 97,
  SearchResult = 101,
  Modify = 103,
  Add = 105,
  Delete = 107,
  ModDn = 109,
  Extended = 120,
}

export interface Modification {
  operation: ModifyOperation;
  attribute: string;
  values?: ValueInput;
}

export type AddRecord = Array<[string, ValueInput]> | Record<string, ValueInput>;

export interface SearchEntry {
  dn: string;
  attributes: AttributeMap;
}

export interface OperationResult {
  type: ResultType;
  controls: Control[];
}

export interface AddResult extends OperationResult {
  messageId: number;
}

export interface PasswordChangeResult extends OperationResult {
  changed: boolean;
}

export interface SearchResultMessage {
  type: ResultType.SearchResult;
  // null once the ticket has been consumed, or for an unknown ticket
  entries: SearchEntry[] | null;
}

export type SearchArgs = [
  base: string,
  scope: SearchScope,
  filter?: string,
  attributes?: readonly string[] | null,
  attrsOnly?: boolean,
];

export type OptionKey = string | number;

/** Operations that accept seeded responses */
export type EmulatorCalls = {
  bind: { args: [who?: string, cred?: string]; value: OperationResult };
  search: { args: SearchArgs; value: number };
  searchImmediate: { args: SearchArgs; value: SearchEntry[] };
  result: {
    args: [ticket: number, all?: boolean, timeout?: number];
    value: SearchResultMessage;
  };
  compare: { args: [dn: string, attribute: string, value: string]; value: boolean };
  modify: { args: [dn: string, modifications: Modification[]]; value: OperationResult };
  add: { args: [dn: string, record: AddRecord]; value: AddResult };
  delete: { args: [dn: string]; value: OperationResult };
  rename: {
    args: [dn: string, newRdn: string, newSuperior?: string | null];
    value: OperationResult;
  };
  changePassword: {
    args: [
      user: string,
      oldPassword: RawValue | null | undefined,
      newPassword: RawValue,
    ];
    value: PasswordChangeResult;
  };
  whoami: { args: []; value: string };
};

export interface EmulatorOptions {
  config?: Partial<Config>;
  logger?: winston.Logger;
}

const checkDn = (dn: string): DistinguishedName => DistinguishedName.parse(dn);

export class LdapEmulator {
  readonly config: Config;
  readonly logger: winston.Logger;
  private store: DirectoryStore;
  private asyncResults = new AsyncResultQueue<SearchEntry[]>();
  private recorder: CallRecorder<EmulatorCalls>;
  private sessionOptions: Map<OptionKey, unknown>;
  private _boundAs: string | null = null;
  private _tlsEnabled = false;
  // Level of the bind line: notice, or info for loggers without notice
  private readonly bindLogLevel: string;

  /**
   * @param directory - initial tree, deep-copied: `{ dn: { attr: [values] } }`
   * @throws InvalidDnSyntaxError or AlreadyExistsError for bad seed data
   */
  constructor(directory: SeedDirectory = {}, options: EmulatorOptions = {}) {
    this.config = loadConfig(options.config);
    this.logger = options.logger ?? buildLogger(this.config);
    this.bindLogLevel = 'notice' in this.logger.levels ? 'notice' : 'info';
    this.store = DirectoryStore.fromSeed(directory);
    this.recorder = new CallRecorder<EmulatorCalls>(this.config.record_calls);
    this.sessionOptions = new Map(Object.entries(this.config.options));
    this.logger.info(
      `Mock directory initialized with ${this.store.size} entries`
    );
  }

  /**
   * Session state
   */

  /** DN of the last successful bind, null when unbound */
  get boundAs(): string | null {
    return this._boundAs;
  }

  get tlsEnabled(): boolean {
    return this._tlsEnabled;
  }

  get options(): ReadonlyMap<OptionKey, unknown> {
    return this.sessionOptions;
  }

  /** Deep copy of the current tree */
  get directory(): Record<string, AttributeMap> {
    return this.store.snapshot();
  }

  getEntry(dn: string): AttributeMap | undefined {
    if (!DistinguishedName.isValid(dn)) return undefined;
    return this.store.get(dn)?.entry.toObject();
  }

  /**
   * Call recording and seeding
   */

  methodsCalled(): string[];
  methodsCalled(withArgs: true): RecordedCall[];
  methodsCalled(withArgs = false): string[] | RecordedCall[] {
    return withArgs ? this.recorder.withArgs() : this.recorder.names();
  }

  resetCalls(): void {
    this.recorder.reset();
  }

  /**
   * Register the value an exact call returns. Seeded calls bypass the
   * engine, which is how searches with unsupported filters get an answer.
   */
  seed<M extends keyof EmulatorCalls>(
    method: M,
    args: EmulatorCalls[M]['args'],
    value: EmulatorCalls[M]['value']
  ): void {
    this.recorder.seed(method, args, success(value));
  }

  seedError<M extends keyof EmulatorCalls>(
    method: M,
    args: EmulatorCalls[M]['args'],
    error: LdapError
  ): void {
    this.recorder.seed(method, args, failure(error));
  }

  clearSeeds(): void {
    this.recorder.clearSeeds();
  }

  private call<M extends keyof EmulatorCalls>(
    method: M,
    args: EmulatorCalls[M]['args'],
    impl: () => EmulatorCalls[M]['value']
  ): Outcome<EmulatorCalls[M]['value']> {
    this.recorder.record(method, args);
    const seeded = this.recorder.lookup(method, args);
    if (seeded) {
      this.logger.debug(`${method}: answered from seed`);
      return seeded;
    }
    const outcome = attempt(impl);
    if (!outcome.ok) {
      this.logger.log(
        outcome.error instanceof SeedRequiredError ? 'warn' : 'info',
        `${method} failed: ${outcome.error.message}`
      );
    }
    return outcome;
  }

  /**
   * Recording-only operations
   */

  initialize(...args: unknown[]): void {
    this.recorder.record('initialize', args);
  }

  saslExternalBind(...args: unknown[]): void {
    this.recorder.record('saslExternalBind', args);
  }

  /**
   * Session operations
   */

  setOption(key: OptionKey, value: unknown): void {
    this.recorder.record('setOption', [key, value]);
    this.sessionOptions.set(key, value);
  }

  getOption(key: OptionKey): Outcome<unknown> {
    this.recorder.record('getOption', [key]);
    if (!this.sessionOptions.has(key)) {
      return failure(new InvalidArgumentError(`Option not set: ${key}`));
    }
    return success(this.sessionOptions.get(key));
  }

  startTls(): void {
    this.recorder.record('startTls', []);
    this._tlsEnabled = true;
  }

  unbind(): void {
    this.recorder.record('unbind', []);
    this._boundAs = null;
  }

  unbindSync(): void {
    this.recorder.record('unbindSync', []);
    this._boundAs = null;
  }

  whoami(): Outcome<string> {
    return this.call('whoami', [], () =>
      this._boundAs ? `dn:${this._boundAs}` : ''
    );
  }

  /**
   * Simple bind. Empty identity and credential is an anonymous bind and
   * always succeeds; otherwise the credential is checked against the
   * password attribute, an unknown DN counting as bad credentials.
   */
  bind(who = '', cred = ''): Outcome<OperationResult> {
    return this.call('bind', [who, cred], () => {
      let matched = who === '' && cred === '';
      if (!matched) {
        try {
          matched = this.compareValue(who, this.config.password_attribute, cred);
        } catch (err) {
          if (!(err instanceof NoSuchObjectError)) throw err;
        }
      }
      if (!matched) throw new InvalidCredentialsError(who, cred);
      this._boundAs = who;
      this.logger.log(this.bindLogLevel, `Bound as "${who}"`);
      return { type: ResultType.Bind, controls: [] };
    });
  }

  /**
   * Search
   */

  /** Issue a search; the entries wait behind the returned ticket */
  search(...args: SearchArgs): Outcome<number> {
    return this.call('search', args, () => {
      const seeded = this.recorder.lookup('searchImmediate', args);
      const entries = seeded ? unwrap(seeded) : this.runSearch(args);
      return this.asyncResults.push(entries);
    });
  }

  /**
   * Fetch the entries of a ticket. A ticket yields its entries once; a
   * consumed or unknown ticket yields null. The timeout is accepted and
   * ignored.
   */
  result(ticket: number, all = true, timeout?: number): Outcome<SearchResultMessage> {
    return this.call('result', [ticket, all, timeout], () => ({
      type: ResultType.SearchResult,
      entries: this.asyncResults.pop(ticket),
    }));
  }

  searchImmediate(...args: SearchArgs): Outcome<SearchEntry[]> {
    return this.call('searchImmediate', args, () => this.runSearch(args));
  }

  private runSearch(args: SearchArgs): SearchEntry[] {
    const [base, scope, filter = this.config.default_filter, attributes, attrsOnly] =
      args;
    const baseDn = checkDn(base);
    if (!this.store.contains(base)) throw new NoSuchObjectError(base);
    const inScope = this.scopePredicate(scope, baseDn);

    let tree: FilterNode;
    try {
      tree = parseFilter(filter);
    } catch (err) {
      if (err instanceof UnsupportedFilterError) {
        throw new SeedRequiredError('searchImmediate', args, err);
      }
      throw err;
    }

    const entries: SearchEntry[] = [];
    for (const stored of this.store.values()) {
      if (!inScope(stored.parsed)) continue;
      const matcher = new EntryMatcher(stored.entry, {
        passwordAttribute: this.config.password_attribute,
        verifyPassword,
      });
      if (!matcher.matches(tree)) continue;
      const kept = attributes ? stored.entry.project(attributes) : stored.entry;
      const projected = kept.toObject();
      if (attrsOnly) {
        for (const name of Object.keys(projected)) projected[name] = [];
      }
      entries.push({ dn: stored.dn, attributes: projected });
    }
    this.logger.debug(
      `search base="${base}" scope=${SearchScope[scope]} filter="${filterToString(tree)}": ${entries.length} entries`
    );
    return entries;
  }

  private scopePredicate(
    scope: SearchScope,
    base: DistinguishedName
  ): (dn: DistinguishedName) => boolean {
    switch (scope) {
      case SearchScope.Base:
        return dn => dn.equalsIgnoreCase(base);
      case SearchScope.OneLevel:
        return dn => dn.isImmediateChildOf(base);
      case SearchScope.Subtree:
        return dn => base.isSuffixOf(dn);
      default: {
        const unexpected: never = scope;
        throw new InvalidArgumentError(
          `Unrecognized scope: ${String(unexpected)}`
        );
      }
    }
  }

  /**
   * Compare
   */

  compare(dn: string, attribute: string, value: string): Outcome<boolean> {
    return this.call('compare', [dn, attribute, value], () =>
      this.compareValue(dn, attribute, value)
    );
  }

  private isPasswordAttribute(attribute: string): boolean {
    return (
      attribute.toLowerCase() === this.config.password_attribute.toLowerCase()
    );
  }

  // Password attribute values go through the scheme-aware verifier
  private compareValue(dn: string, attribute: string, value: string): boolean {
    checkDn(dn);
    const stored = this.store.get(dn);
    if (!stored) throw new NoSuchObjectError(dn);
    const values = stored.entry.getText(attribute);
    if (this.isPasswordAttribute(attribute)) {
      return values.some(v => verifyPassword(value, v));
    }
    return values.includes(value);
  }

  /**
   * Modify: modifications are applied in order; a failing one stops the
   * call without undoing the previous ones.
   */
  modify(dn: string, modifications: Modification[]): Outcome<OperationResult> {
    return this.call('modify', [dn, modifications], () => {
      checkDn(dn);
      const stored = this.store.get(dn);
      if (!stored) throw new NoSuchObjectError(dn);
      for (const modification of modifications) {
        this.applyModification(stored.entry, modification);
      }
      this.logger.debug(`modify "${dn}": ${modifications.length} changes`);
      return { type: ResultType.Modify, controls: [] };
    });
  }

  private applyModification(entry: Entry, modification: Modification): void {
    const { operation, attribute } = modification;
    const values = toValueList(modification.values);
    switch (operation) {
      case ModifyOperation.Add:
        if (values.length === 0) {
          throw new ProtocolError(`No value to add to ${attribute}`);
        }
        entry.add(attribute, requireBuffers(values));
        return;
      case ModifyOperation.Delete:
        if (!entry.has(attribute)) return;
        if (values.length === 0) {
          entry.delete(attribute);
        } else {
          entry.removeValues(attribute, requireBuffers(values));
        }
        return;
      case ModifyOperation.Replace:
        if (values.length === 0) {
          entry.delete(attribute);
        } else {
          entry.set(attribute, requireBuffers(values));
        }
        return;
      default: {
        const unexpected: never = operation;
        throw new InvalidArgumentError(
          `Unrecognized modify operation: ${String(unexpected)}`
        );
      }
    }
  }

  /**
   * Add
   */

  add(dn: string, record: AddRecord): Outcome<AddResult> {
    return this.call('add', [dn, record], () => {
      checkDn(dn);
      const pairs = Array.isArray(record) ? record : Object.entries(record);
      const attributes: AttributeMap = {};
      for (const [name, values] of pairs) {
        attributes[name] = [
          ...(attributes[name] ?? []),
          ...requireBuffers(toValueList(values)),
        ];
      }
      if (this.store.contains(dn)) throw new AlreadyExistsError(dn);
      this.store.put(dn, new Entry(attributes));
      this.logger.debug(`add "${dn}"`);
      return {
        type: ResultType.Add,
        controls: [],
        messageId: this.recorder.count,
      };
    });
  }

  /**
   * Delete
   */

  delete(dn: string): Outcome<OperationResult> {
    return this.call('delete', [dn], () => {
      checkDn(dn);
      if (!this.store.remove(dn)) throw new NoSuchObjectError(dn);
      this.logger.debug(`delete "${dn}"`);
      return { type: ResultType.Delete, controls: [] };
    });
  }

  /**
   * Rename (modify DN). The old RDN value leaves the entry and the new one
   * joins it; the entry moves under newSuperior when given.
   */
  rename(
    dn: string,
    newRdn: string,
    newSuperior?: string | null
  ): Outcome<OperationResult> {
    return this.call('rename', [dn, newRdn, newSuperior], () => {
      const oldDn = checkDn(dn);
      const rdnDn = checkDn(newRdn);
      if (newSuperior) checkDn(newSuperior);
      const [oldAva] = oldDn.rdn ?? [];
      const [newAva] = rdnDn.rdn ?? [];
      if (!newAva || rdnDn.length !== 1) throw new InvalidDnSyntaxError(newRdn);

      const stored = this.store.get(dn);
      if (!stored || !oldAva) throw new NoSuchObjectError(dn);

      const superior = newSuperior || oldDn.parent().toString();
      const newDn = superior ? `${newRdn},${superior}` : newRdn;
      if (this.store.contains(newDn)) throw new AlreadyExistsError(newDn);

      const entry = stored.entry;
      const oldValues = entry.get(oldAva.attribute) ?? [];
      if (
        oldAva.attribute.toLowerCase() === newAva.attribute.toLowerCase() ||
        oldValues.length > 1
      ) {
        entry.removeValues(oldAva.attribute, [toBuffer(oldAva.value)]);
      } else {
        entry.delete(oldAva.attribute);
      }
      entry.add(newAva.attribute, [toBuffer(newAva.value)]);

      this.store.remove(dn);
      this.store.put(newDn, entry);
      this.logger.debug(`rename "${dn}" -> "${newDn}"`);
      return { type: ResultType.ModDn, controls: [] };
    });
  }

  /**
   * Password modify. A supplied old password is compared byte for byte with
   * the first stored value, without the scheme-aware verifier used by bind
   * and compare; on mismatch nothing changes.
   */
  changePassword(
    user: string,
    oldPassword: RawValue | null | undefined,
    newPassword: RawValue
  ): Outcome<PasswordChangeResult> {
    return this.call('changePassword', [user, oldPassword, newPassword], () => {
      checkDn(user);
      const stored = this.store.get(user);
      if (!stored) throw new NoSuchObjectError(user);
      const attribute = this.config.password_attribute;
      let changed = true;
      if (oldPassword !== null && oldPassword !== undefined) {
        const current = stored.entry.get(attribute)?.[0];
        changed = current !== undefined && current.equals(toBuffer(oldPassword));
      }
      if (changed) stored.entry.set(attribute, [toBuffer(newPassword)]);
      this.logger.debug(
        `password change for "${user}": ${changed ? 'done' : 'old password mismatch'}`
      );
      return { type: ResultType.Extended, controls: [], changed };
    });
  }
}

export default LdapEmulator;
