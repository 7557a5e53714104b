/**
 * Directory entry: attribute name (case-insensitive) to ordered byte values
 *
 * An attribute never holds an empty value list: setting an empty list or
 * removing the last value removes the attribute.
 */
import { decodeValue, includesValue } from './utils';

export type AttributeMap = Record<string, Buffer[]>;

interface Slot {
  name: string;
  values: Buffer[];
}

export class Entry {
  private slots = new Map<string, Slot>();

  constructor(attributes: AttributeMap = {}) {
    for (const [name, values] of Object.entries(attributes)) {
      this.add(name, values);
    }
  }

  get size(): number {
    return this.slots.size;
  }

  has(name: string): boolean {
    return this.slots.has(name.toLowerCase());
  }

  /** Values of an attribute, or undefined when absent */
  get(name: string): readonly Buffer[] | undefined {
    return this.slots.get(name.toLowerCase())?.values;
  }

  getText(name: string): string[] {
    return (this.get(name) ?? []).map(decodeValue);
  }

  /** Attribute names as first spelled */
  names(): string[] {
    return [...this.slots.values()].map(slot => slot.name);
  }

  /** Overwrite an attribute; an empty list deletes it */
  set(name: string, values: readonly Buffer[]): void {
    const key = name.toLowerCase();
    if (values.length === 0) {
      this.slots.delete(key);
      return;
    }
    const unique: Buffer[] = [];
    for (const v of values) {
      if (!includesValue(unique, v)) unique.push(Buffer.from(v));
    }
    const previous = this.slots.get(key);
    this.slots.set(key, { name: previous?.name ?? name, values: unique });
  }

  /** Append the values not already present */
  add(name: string, values: readonly Buffer[]): void {
    const current = this.get(name) ?? [];
    const merged = [...current];
    for (const v of values) {
      if (!includesValue(merged, v)) merged.push(v);
    }
    this.set(name, merged);
  }

  /** Remove the listed values; drops the attribute when none remain */
  removeValues(name: string, values: readonly Buffer[]): void {
    const current = this.get(name);
    if (!current) return;
    this.set(
      name,
      current.filter(v => !includesValue(values, v))
    );
  }

  delete(name: string): boolean {
    return this.slots.delete(name.toLowerCase());
  }

  /** Copy restricted to the given attribute names; "*" keeps everything */
  project(names: readonly string[]): Entry {
    if (names.includes('*')) return this.clone();
    const wanted = new Set(names.map(n => n.toLowerCase()));
    const copy = new Entry();
    for (const [key, slot] of this.slots) {
      if (wanted.has(key)) copy.set(slot.name, slot.values);
    }
    return copy;
  }

  clone(): Entry {
    const copy = new Entry();
    for (const slot of this.slots.values()) copy.set(slot.name, slot.values);
    return copy;
  }

  /** Deep copy as a plain object */
  toObject(): AttributeMap {
    const result: AttributeMap = {};
    for (const slot of this.slots.values()) {
      result[slot.name] = slot.values.map(v => Buffer.from(v));
    }
    return result;
  }
}
