/**
 * Distinguished name model
 *
 * Parses a DN string (RFC 4514 string representation) into its relative
 * components and offers the structural comparisons used by search scopes
 * and entry lookup. Comparison is case-insensitive on both attribute types
 * and values; no other normalization is applied.
 */
import { InvalidDnSyntaxError } from './errors';
import { escapeDnValue } from './utils';

export interface AttributeTypeAndValue {
  attribute: string;
  value: string;
}

// A relative DN: usually one pair, several when joined with "+"
export type Rdn = AttributeTypeAndValue[];

const ATTRIBUTE_TYPE = /^(?:[A-Za-z][A-Za-z0-9-]*|\d+(?:\.\d+)*)$/;
const HEX_PAIR = /^[0-9A-Fa-f]{2}$/;
const ESCAPABLE = '"+,;<>\\=# ';
const FORBIDDEN = '"<>';

class DnReader {
  private pos = 0;

  constructor(private readonly input: string) {}

  fail(): never {
    throw new InvalidDnSyntaxError(this.input);
  }

  get done(): boolean {
    return this.pos >= this.input.length;
  }

  peek(): string {
    return this.input[this.pos];
  }

  next(): string {
    return this.input[this.pos++];
  }

  skipSpaces(): void {
    while (!this.done && this.peek() === ' ') this.pos++;
  }

  // Source text from each RDN to the end of the input
  readonly tails: string[] = [];

  readRdns(): Rdn[] {
    const rdns: Rdn[] = [];
    if (this.input.trim() === '') return rdns;
    for (;;) {
      this.tails.push(this.input.slice(this.pos).trimStart());
      rdns.push(this.readRdn());
      if (this.done) return rdns;
      const sep = this.next();
      if (sep !== ',' && sep !== ';') this.fail();
    }
  }

  private readRdn(): Rdn {
    const rdn: Rdn = [this.readPair()];
    while (!this.done && this.peek() === '+') {
      this.pos++;
      rdn.push(this.readPair());
    }
    return rdn;
  }

  private readPair(): AttributeTypeAndValue {
    this.skipSpaces();
    const start = this.pos;
    while (!this.done && this.peek() !== '=' && this.peek() !== ' ') {
      const c = this.peek();
      if (c === ',' || c === '+' || c === ';') this.fail();
      this.pos++;
    }
    const attribute = this.input.slice(start, this.pos);
    this.skipSpaces();
    if (this.done || this.next() !== '=') this.fail();
    if (!ATTRIBUTE_TYPE.test(attribute)) this.fail();
    this.skipSpaces();
    const value = !this.done && this.peek() === '#' ? this.readHex() : this.readString();
    return { attribute, value };
  }

  // "#" hexstring form, kept verbatim
  private readHex(): string {
    const start = this.pos++;
    while (!this.done && /[0-9A-Fa-f]/.test(this.peek())) this.pos++;
    const raw = this.input.slice(start, this.pos);
    if (raw.length < 3 || raw.length % 2 === 0) this.fail();
    this.skipSpaces();
    return raw;
  }

  private readString(): string {
    let value = '';
    let pending: number[] = [];
    // significant length: trailing unescaped spaces are dropped
    let keep = 0;
    const flush = (): void => {
      if (pending.length > 0) {
        value += Buffer.from(pending).toString('utf8');
        pending = [];
        keep = value.length;
      }
    };
    while (!this.done) {
      const c = this.peek();
      if (c === ',' || c === '+' || c === ';') break;
      this.pos++;
      if (c === '\\') {
        if (this.done) this.fail();
        const e = this.next();
        if (ESCAPABLE.includes(e)) {
          flush();
          value += e;
          keep = value.length;
          continue;
        }
        const pair = e + (this.done ? '' : this.next());
        if (!HEX_PAIR.test(pair)) this.fail();
        pending.push(parseInt(pair, 16));
        continue;
      }
      if (FORBIDDEN.includes(c)) this.fail();
      flush();
      value += c;
      if (c !== ' ') keep = value.length;
    }
    flush();
    return value.slice(0, keep);
  }
}

const normalizeRdn = (rdn: Rdn): string =>
  rdn
    .map(
      ({ attribute, value }) =>
        `${attribute.toLowerCase()}=${escapeDnValue(value.toLowerCase())}`
    )
    .sort()
    .join('+');

export class DistinguishedName {
  readonly rdns: readonly Rdn[];
  private readonly normalized: readonly string[];

  private constructor(
    rdns: Rdn[],
    private readonly tails: readonly string[]
  ) {
    this.rdns = rdns;
    this.normalized = rdns.map(normalizeRdn);
  }

  /**
   * Parse a DN string
   * @throws InvalidDnSyntaxError when the string is not a valid DN
   */
  static parse(dn: string): DistinguishedName {
    const reader = new DnReader(dn);
    const rdns = reader.readRdns();
    return new DistinguishedName(rdns, reader.tails);
  }

  static isValid(dn: string): boolean {
    try {
      DistinguishedName.parse(dn);
      return true;
    } catch (err) {
      if (err instanceof InvalidDnSyntaxError) return false;
      throw err;
    }
  }

  get length(): number {
    return this.rdns.length;
  }

  // Leading component, undefined for the root DSE
  get rdn(): Rdn | undefined {
    return this.rdns[0];
  }

  /** Parent DN, spelled as in the parsed string; the root is its own parent */
  parent(): DistinguishedName {
    return new DistinguishedName(this.rdns.slice(1), this.tails.slice(1));
  }

  /** Lower-cased, escaped components, leaf first */
  components(): readonly string[] {
    return this.normalized;
  }

  equalsIgnoreCase(other: DistinguishedName): boolean {
    return (
      this.normalized.length === other.normalized.length &&
      this.normalized.every((c, i) => c === other.normalized[i])
    );
  }

  /**
   * True when candidate is this DN or one of its descendants
   * (candidate's trailing components equal all of ours)
   */
  isSuffixOf(candidate: DistinguishedName): boolean {
    const offset = candidate.normalized.length - this.normalized.length;
    if (offset < 0) return false;
    return this.normalized.every(
      (c, i) => c === candidate.normalized[offset + i]
    );
  }

  isImmediateChildOf(base: DistinguishedName): boolean {
    return (
      this.normalized.length === base.normalized.length + 1 &&
      base.isSuffixOf(this)
    );
  }

  /** The DN as spelled in the parsed string */
  toString(): string {
    return this.tails[0] ?? '';
  }
}
