/**
 * Search filter engine
 *
 * Recursive-descent parser for the RFC 4515 string form, restricted to
 * equality, presence and the boolean operators. Other operators are
 * recognized and reported as unsupported, never evaluated.
 */
import type { Entry } from './entry';
import { InvalidFilterError, UnsupportedFilterError } from './errors';
import { escapeLdapFilter } from './utils';

export enum FilterType {
  And = 'and',
  Or = 'or',
  Not = 'not',
  Equality = 'equality',
  Presence = 'presence',
}

export interface AndFilter {
  type: FilterType.And;
  filters: FilterNode[];
}

export interface OrFilter {
  type: FilterType.Or;
  filters: FilterNode[];
}

export interface NotFilter {
  type: FilterType.Not;
  filter: FilterNode;
}

export interface EqualityFilter {
  type: FilterType.Equality;
  attribute: string;
  value: string;
}

export interface PresenceFilter {
  type: FilterType.Presence;
  attribute: string;
}

export type FilterNode =
  | AndFilter
  | OrFilter
  | NotFilter
  | EqualityFilter
  | PresenceFilter;

const ATTRIBUTE_DESCRIPTION =
  /^(?:[A-Za-z][A-Za-z0-9-]*|\d+(?:\.\d+)*)(?:;[A-Za-z0-9-]+)*$/;

class FilterParser {
  private pos = 0;

  constructor(private readonly input: string) {}

  parse(): FilterNode {
    this.skipSpaces();
    const node = this.parseFilter();
    this.skipSpaces();
    if (this.pos < this.input.length) this.fail('trailing characters');
    return node;
  }

  private fail(reason: string): never {
    throw new InvalidFilterError(this.input, reason);
  }

  private skipSpaces(): void {
    while (this.pos < this.input.length && /\s/.test(this.input[this.pos])) {
      this.pos++;
    }
  }

  private expect(c: string): void {
    if (this.input[this.pos] !== c) {
      this.fail(`expected "${c}" at position ${this.pos}`);
    }
    this.pos++;
  }

  private parseFilter(): FilterNode {
    this.expect('(');
    let node: FilterNode;
    switch (this.input[this.pos]) {
      case '&':
        this.pos++;
        node = { type: FilterType.And, filters: this.parseList() };
        break;
      case '|':
        this.pos++;
        node = { type: FilterType.Or, filters: this.parseList() };
        break;
      case '!':
        this.pos++;
        this.skipSpaces();
        node = { type: FilterType.Not, filter: this.parseFilter() };
        this.skipSpaces();
        break;
      default:
        node = this.parseItem();
    }
    this.expect(')');
    return node;
  }

  private parseList(): FilterNode[] {
    const filters: FilterNode[] = [];
    this.skipSpaces();
    while (this.input[this.pos] === '(') {
      filters.push(this.parseFilter());
      this.skipSpaces();
    }
    return filters;
  }

  private parseItem(): FilterNode {
    const start = this.pos;
    while (this.pos < this.input.length && !'=~<>:()'.includes(this.input[this.pos])) {
      this.pos++;
    }
    const attribute = this.input.slice(start, this.pos).trim();
    const op = this.input[this.pos];
    if (op === ':') throw new UnsupportedFilterError('extensible match');
    if (op === '~' || op === '<' || op === '>') {
      if (this.input[this.pos + 1] !== '=') this.fail(`bad operator "${op}"`);
      throw new UnsupportedFilterError(
        op === '~' ? 'approximate match' : `ordering match (${op}=)`
      );
    }
    if (op !== '=') this.fail('missing "="');
    if (!ATTRIBUTE_DESCRIPTION.test(attribute)) {
      this.fail(`bad attribute description "${attribute}"`);
    }
    this.pos++;
    const raw = this.readValue();
    if (raw === '*') return { type: FilterType.Presence, attribute };
    if (raw.includes('*')) throw new UnsupportedFilterError('substring match');
    return { type: FilterType.Equality, attribute, value: this.unescape(raw) };
  }

  // Raw value up to the closing parenthesis, escapes left in place
  private readValue(): string {
    const start = this.pos;
    while (this.pos < this.input.length) {
      const c = this.input[this.pos];
      if (c === ')') break;
      if (c === '(') this.fail('unescaped "(" in value');
      if (c === '\\') {
        if (!/^[0-9A-Fa-f]{2}$/.test(this.input.slice(this.pos + 1, this.pos + 3))) {
          this.fail(`bad escape at position ${this.pos}`);
        }
        this.pos += 3;
        continue;
      }
      this.pos++;
    }
    return this.input.slice(start, this.pos);
  }

  // Runs of plain text are encoded whole so surrogate pairs stay intact
  private unescape(raw: string): string {
    const chunks: Buffer[] = [];
    let start = 0;
    for (let i = raw.indexOf('\\'); i !== -1; i = raw.indexOf('\\', start)) {
      chunks.push(
        Buffer.from(raw.slice(start, i), 'utf8'),
        Buffer.from([parseInt(raw.slice(i + 1, i + 3), 16)])
      );
      start = i + 3;
    }
    chunks.push(Buffer.from(raw.slice(start), 'utf8'));
    return Buffer.concat(chunks).toString('utf8');
  }
}

/**
 * Parse a filter string
 * @throws UnsupportedFilterError for operators outside equality/presence/and/or/not
 * @throws InvalidFilterError for malformed filters
 */
export const parseFilter = (filter: string): FilterNode =>
  new FilterParser(filter).parse();

export interface FilterVisitor<R> {
  and(node: AndFilter): R;
  or(node: OrFilter): R;
  not(node: NotFilter): R;
  equality(node: EqualityFilter): R;
  presence(node: PresenceFilter): R;
}

export const visitFilter = <R>(node: FilterNode, visitor: FilterVisitor<R>): R => {
  switch (node.type) {
    case FilterType.And:
      return visitor.and(node);
    case FilterType.Or:
      return visitor.or(node);
    case FilterType.Not:
      return visitor.not(node);
    case FilterType.Equality:
      return visitor.equality(node);
    case FilterType.Presence:
      return visitor.presence(node);
    default: {
      const impossible: never = node;
      throw new Error(`Unknown filter node ${JSON.stringify(impossible)}`);
    }
  }
};

export interface MatchOptions {
  /** Attribute whose values are compared through the password verifier */
  passwordAttribute: string;
  verifyPassword: (candidate: string, stored: string) => boolean;
}

/**
 * Evaluates a parsed filter against one entry. A missing attribute never
 * matches.
 */
export class EntryMatcher implements FilterVisitor<boolean> {
  constructor(
    private readonly entry: Entry,
    private readonly options: MatchOptions
  ) {}

  matches(node: FilterNode): boolean {
    return visitFilter(node, this);
  }

  and(node: AndFilter): boolean {
    return node.filters.every(f => this.matches(f));
  }

  or(node: OrFilter): boolean {
    return node.filters.some(f => this.matches(f));
  }

  not(node: NotFilter): boolean {
    return !this.matches(node.filter);
  }

  equality(node: EqualityFilter): boolean {
    const values = this.entry.getText(node.attribute);
    if (
      node.attribute.toLowerCase() ===
      this.options.passwordAttribute.toLowerCase()
    ) {
      return values.some(v => this.options.verifyPassword(node.value, v));
    }
    return values.includes(node.value);
  }

  presence(node: PresenceFilter): boolean {
    return this.entry.has(node.attribute);
  }
}

/** Back to the string form, used in log lines */
export const filterToString = (node: FilterNode): string =>
  visitFilter(node, {
    and: n => `(&${n.filters.map(filterToString).join('')})`,
    or: n => `(|${n.filters.map(filterToString).join('')})`,
    not: n => `(!${filterToString(n.filter)})`,
    equality: n => `(${n.attribute}=${escapeLdapFilter(n.value)})`,
    presence: n => `(${n.attribute}=*)`,
  });
