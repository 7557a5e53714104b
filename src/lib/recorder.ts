/**
 * Call log and canned responses owned by one emulator instance
 */
import { isDeepStrictEqual } from 'util';

import type { Outcome } from './errors';

export interface RecordedCall {
  method: string;
  args: unknown[];
}

/** Shape of a seedable call: its argument tuple and success value */
export interface CallSignature {
  args: readonly unknown[];
  value: unknown;
}

interface Seed<S extends CallSignature> {
  args: readonly unknown[];
  outcome: Outcome<S['value']>;
}

type SeedTable<Calls extends Record<string, CallSignature>> = {
  [M in keyof Calls]?: Seed<Calls[M]>[];
};

// Trailing undefined arguments are not significant
const trimArgs = (args: readonly unknown[]): unknown[] => {
  const copy = [...args];
  while (copy.length > 0 && copy[copy.length - 1] === undefined) copy.pop();
  return copy;
};

export class CallRecorder<Calls extends Record<string, CallSignature>> {
  private calls: RecordedCall[] = [];
  private seeds: SeedTable<Calls> = {};

  constructor(private readonly enabled = true) {}

  record(method: string, args: readonly unknown[]): void {
    if (this.enabled) this.calls.push({ method, args: trimArgs(args) });
  }

  get count(): number {
    return this.calls.length;
  }

  names(): string[] {
    return this.calls.map(c => c.method);
  }

  withArgs(): RecordedCall[] {
    return this.calls.map(c => ({ method: c.method, args: [...c.args] }));
  }

  reset(): void {
    this.calls = [];
  }

  /**
   * Register a response for an exact call. Arguments are compared
   * structurally; a later seed for the same call replaces the earlier one.
   */
  seed<M extends keyof Calls>(
    method: M,
    args: Calls[M]['args'],
    outcome: Outcome<Calls[M]['value']>
  ): void {
    const trimmed = trimArgs(args);
    const existing: Seed<Calls[M]>[] = this.seeds[method] ?? [];
    const kept = existing.filter(s => !isDeepStrictEqual(s.args, trimmed));
    kept.push({ args: trimmed, outcome });
    this.seeds[method] = kept;
  }

  /** Seeded response for a call, if any */
  lookup<M extends keyof Calls>(
    method: M,
    args: Calls[M]['args']
  ): Outcome<Calls[M]['value']> | undefined {
    const trimmed = trimArgs(args);
    const existing: Seed<Calls[M]>[] = this.seeds[method] ?? [];
    const found = existing.find(s => isDeepStrictEqual(s.args, trimmed));
    return found?.outcome;
  }

  clearSeeds(): void {
    this.seeds = {};
  }
}
