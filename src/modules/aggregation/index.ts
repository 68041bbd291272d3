// Types
export type {
  Counter1,
  Counter2,
  Counter3,
  ShapeValues,
  Shape,
  StatResult,
  StatResultOf,
  StatMap,
  DerivedValue,
} from './core/types.js';
export { SHAPES } from './core/types.js';

// Errors
export type { ShapeMismatchError } from './core/errors.js';
export { createShapeMismatchError } from './core/errors.js';

// Merge
export {
  identity,
  conformsTo,
  mergeNumber,
  mergeCounter1,
  mergeCounter2,
  mergeCounter3,
  mergeResults,
  fold,
  foldTree,
  foldStatMaps,
} from './core/merge.js';

// Accumulators
export { Tally, Tally2, Tally3, presence, counterOf } from './core/tally.js';
