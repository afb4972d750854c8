/**
 * Shared test fixtures for @coffer/ledger.
 */

import type { Money } from "@coffer/types";
import { Ledger } from "../src/ledger.js";
import type { LedgerOptions } from "../src/ledger.js";
import { SequentialIdGenerator } from "../src/id-generator.js";

export const TS = "2024-01-15T10:00:00.000Z";

export function usd(amount: string): Money {
  return { amount, decimals: 2 };
}

/** A clock frozen at TS. */
export function fixedClock(iso: string = TS): () => Date {
  return () => new Date(iso);
}

/**
 * A clock that returns each ISO string in turn, then repeats the last.
 */
export function steppingClock(...isos: readonly string[]): () => Date {
  let i = 0;
  return () => {
    const iso = isos[Math.min(i, isos.length - 1)] ?? TS;
    i++;
    return new Date(iso);
  };
}

export function makeLedger(options: LedgerOptions = {}): Ledger {
  const clock = options.clock ?? fixedClock();
  return new Ledger({
    idGenerator: new SequentialIdGenerator({ clock }),
    ...options,
    clock,
  });
}

/** Run `fn` and return what it threw, or undefined. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  return undefined;
}
