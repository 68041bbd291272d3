import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Result shapes
// ─────────────────────────────────────────────────────────────────────────────

/** key → amount (e.g. currency → sum) */
export type Counter1 = Readonly<Record<string, Decimal>>;

/** key → key → amount (e.g. type → year → count) */
export type Counter2 = Readonly<Record<string, Counter1>>;

/** key → key → key → amount (e.g. type → currency → year → sum) */
export type Counter3 = Readonly<Record<string, Counter2>>;

export interface ShapeValues {
  number: Decimal;
  counter1: Counter1;
  counter2: Counter2;
  counter3: Counter3;
}

export type Shape = keyof ShapeValues;

export const SHAPES = ['number', 'counter1', 'counter2', 'counter3'] as const satisfies readonly Shape[];

export type StatResultOf<S extends Shape> = S extends Shape
  ? { readonly shape: S; readonly value: ShapeValues[S] }
  : never;

/**
 * A statistic value tagged with its shape.
 */
export type StatResult = StatResultOf<Shape>;

/**
 * Aggregate at one hierarchy level: statistic name → value.
 */
export type StatMap = Readonly<Record<string, StatResult>>;

/**
 * JSON-like value of a statistic that is derived from an aggregate
 * rather than merged.
 */
export type DerivedValue =
  | string
  | number
  | boolean
  | null
  | readonly DerivedValue[]
  | { readonly [key: string]: DerivedValue };
