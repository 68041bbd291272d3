import type { Shape } from './types.js';

/**
 * Two values of different shapes were merged. Statistics keep one shape
 * for every record, so this points at a mixed-up aggregate.
 */
export interface ShapeMismatchError {
  readonly type: 'ShapeMismatch';
  readonly message: string;
  readonly expected: Shape;
  readonly actual: Shape;
  readonly statistic?: string | undefined;
}

export const createShapeMismatchError = (
  expected: Shape,
  actual: Shape,
  statistic?: string
): ShapeMismatchError => ({
  type: 'ShapeMismatch',
  message:
    statistic === undefined
      ? `Cannot merge ${actual} into ${expected}`
      : `Cannot merge ${actual} into ${expected} for statistic '${statistic}'`,
  expected,
  actual,
  statistic,
});
