import { Decimal } from 'decimal.js';

import type { Counter1, Counter2, Counter3 } from './types.js';

/**
 * Mutable accumulator used while a statistic is computed; frozen into a
 * counter on return.
 */
export class Tally {
  private readonly counts = new Map<string, Decimal>();

  add(key: string, amount: Decimal.Value = 1): this {
    const existing = this.counts.get(key);
    const value = new Decimal(amount);
    this.counts.set(key, existing === undefined ? value : existing.plus(value));
    return this;
  }

  /** Overwrites the value for `key`. */
  set(key: string, amount: Decimal.Value): this {
    this.counts.set(key, new Decimal(amount));
    return this;
  }

  get size(): number {
    return this.counts.size;
  }

  toCounter(): Counter1 {
    return Object.fromEntries(this.counts);
  }
}

export class Tally2 {
  private readonly rows = new Map<string, Tally>();

  row(key: string): Tally {
    let row = this.rows.get(key);
    if (row === undefined) {
      row = new Tally();
      this.rows.set(key, row);
    }
    return row;
  }

  add(outer: string, inner: string, amount: Decimal.Value = 1): this {
    this.row(outer).add(inner, amount);
    return this;
  }

  toCounter(): Counter2 {
    return Object.fromEntries([...this.rows].map(([key, row]) => [key, row.toCounter()]));
  }
}

export class Tally3 {
  private readonly tables = new Map<string, Tally2>();

  add(first: string, second: string, third: string, amount: Decimal.Value = 1): this {
    let table = this.tables.get(first);
    if (table === undefined) {
      table = new Tally2();
      this.tables.set(first, table);
    }
    table.add(second, third, amount);
    return this;
  }

  toCounter(): Counter3 {
    return Object.fromEntries([...this.tables].map(([key, table]) => [key, table.toCounter()]));
  }
}

/**
 * Counter with one entry per key, each set to 1 (`{ a: 1, b: 1 }`).
 */
export const presence = (keys: Iterable<string>): Counter1 => {
  const tally = new Tally();
  for (const key of keys) tally.set(key, 1);
  return tally.toCounter();
};

/**
 * Counter1 from plain numbers, e.g. `counterOf({ pass: 1 })`.
 */
export const counterOf = (entries: Readonly<Record<string, Decimal.Value>>): Counter1 => {
  const tally = new Tally();
  for (const [key, value] of Object.entries(entries)) tally.set(key, value);
  return tally.toCounter();
};
