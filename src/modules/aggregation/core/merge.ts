/**
 * Merge rules per result shape.
 *
 * Numbers add. Counters take the union of their keys and merge the values of
 * shared keys with the rule one level down. Every rule is associative and
 * commutative with the shape's identity as neutral element, so sequential
 * and tree-shaped folds agree.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { createShapeMismatchError, type ShapeMismatchError } from './errors.js';

import type { Counter1, Counter2, Counter3, Shape, StatMap, StatResult } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Identity
// ─────────────────────────────────────────────────────────────────────────────

export const identity = (shape: Shape): StatResult => {
  switch (shape) {
    case 'number':
      return { shape, value: new Decimal(0) };
    case 'counter1':
      return { shape, value: {} };
    case 'counter2':
      return { shape, value: {} };
    case 'counter3':
      return { shape, value: {} };
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Runtime shape checks
// ─────────────────────────────────────────────────────────────────────────────

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value) && !Decimal.isDecimal(value);

const isFiniteDecimal = (value: unknown): boolean =>
  Decimal.isDecimal(value) && value.isFinite();

const isNested = (value: unknown, depth: number): boolean => {
  if (depth === 0) return isFiniteDecimal(value);
  if (!isPlainObject(value)) return false;
  return Object.values(value).every((inner) => isNested(inner, depth - 1));
};

const SHAPE_DEPTH: Record<Shape, number> = {
  number: 0,
  counter1: 1,
  counter2: 2,
  counter3: 3,
};

/**
 * Whether `value` has the structure of `shape` (finite decimals at the
 * declared nesting depth).
 */
export const conformsTo = (shape: Shape, value: unknown): boolean =>
  isNested(value, SHAPE_DEPTH[shape]);

// ─────────────────────────────────────────────────────────────────────────────
// Value merges
// ─────────────────────────────────────────────────────────────────────────────

const mergeKeyed = <T>(
  a: Readonly<Record<string, T>>,
  b: Readonly<Record<string, T>>,
  mergeInner: (x: T, y: T) => T
): Record<string, T> => {
  const out = new Map<string, T>(Object.entries(a));
  for (const [key, value] of Object.entries(b)) {
    const existing = out.get(key);
    out.set(key, existing === undefined ? value : mergeInner(existing, value));
  }
  return Object.fromEntries(out);
};

export const mergeNumber = (a: Decimal, b: Decimal): Decimal => a.plus(b);

export const mergeCounter1 = (a: Counter1, b: Counter1): Counter1 => mergeKeyed(a, b, mergeNumber);

export const mergeCounter2 = (a: Counter2, b: Counter2): Counter2 => mergeKeyed(a, b, mergeCounter1);

export const mergeCounter3 = (a: Counter3, b: Counter3): Counter3 => mergeKeyed(a, b, mergeCounter2);

/**
 * Merges two results of the same shape.
 */
export const mergeResults = (
  a: StatResult,
  b: StatResult,
  statistic?: string
): Result<StatResult, ShapeMismatchError> => {
  const mismatch = () => err(createShapeMismatchError(a.shape, b.shape, statistic));

  switch (a.shape) {
    case 'number':
      return b.shape === 'number' ? ok({ shape: 'number', value: mergeNumber(a.value, b.value) }) : mismatch();
    case 'counter1':
      return b.shape === 'counter1'
        ? ok({ shape: 'counter1', value: mergeCounter1(a.value, b.value) })
        : mismatch();
    case 'counter2':
      return b.shape === 'counter2'
        ? ok({ shape: 'counter2', value: mergeCounter2(a.value, b.value) })
        : mismatch();
    case 'counter3':
      return b.shape === 'counter3'
        ? ok({ shape: 'counter3', value: mergeCounter3(a.value, b.value) })
        : mismatch();
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Folds
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Left fold starting from the shape's identity.
 */
export const fold = (
  shape: Shape,
  results: Iterable<StatResult>,
  statistic?: string
): Result<StatResult, ShapeMismatchError> => {
  let acc = identity(shape);
  for (const result of results) {
    const merged = mergeResults(acc, result, statistic);
    if (merged.isErr()) return err(merged.error);
    acc = merged.value;
  }
  return ok(acc);
};

/**
 * Pairwise reduction: merges neighbours level by level. Yields the same
 * value as {@link fold}.
 */
export const foldTree = (
  shape: Shape,
  results: readonly StatResult[],
  statistic?: string
): Result<StatResult, ShapeMismatchError> => {
  for (const result of results) {
    if (result.shape !== shape) return err(createShapeMismatchError(shape, result.shape, statistic));
  }

  let level: StatResult[] = [...results];
  if (level.length === 0) return ok(identity(shape));

  while (level.length > 1) {
    const next: StatResult[] = [];
    for (let i = 0; i < level.length; i += 2) {
      const left = level[i];
      const right = level[i + 1];
      if (left === undefined) continue;
      if (right === undefined) {
        next.push(left);
        continue;
      }
      const merged = mergeResults(left, right, statistic);
      if (merged.isErr()) return err(merged.error);
      next.push(merged.value);
    }
    level = next;
  }

  return ok(level[0] ?? identity(shape));
};

/**
 * Folds aggregates name by name. A statistic missing from a map counts as
 * its identity, so maps from different record kinds combine.
 */
export const foldStatMaps = (maps: Iterable<StatMap>): Result<StatMap, ShapeMismatchError> => {
  const out = new Map<string, StatResult>();

  for (const map of maps) {
    for (const [name, result] of Object.entries(map)) {
      const existing = out.get(name);
      if (existing === undefined) {
        out.set(name, result);
        continue;
      }
      const merged = mergeResults(existing, result, name);
      if (merged.isErr()) return err(merged.error);
      out.set(name, merged.value);
    }
  }

  return ok(Object.fromEntries(out));
};
