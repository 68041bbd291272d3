import { Decimal } from 'decimal.js';

import type { Counter1, Counter2, StatMap } from '@/modules/aggregation/index.js';
import type { EvaluationContext } from '@/modules/statistics/index.js';

const ZERO = new Decimal(0);

/**
 * Read access to a merged aggregate. A statistic that is absent or has
 * another shape reads as the identity of the requested shape.
 */
export class GroupFacts {
  constructor(
    /** Publisher id, or the corpus label */
    readonly key: string,
    readonly stats: StatMap,
    readonly ctx: EvaluationContext
  ) {}

  number(name: string): Decimal {
    const result = this.stats[name];
    return result?.shape === 'number' ? result.value : ZERO;
  }

  counter1(name: string): Counter1 {
    const result = this.stats[name];
    return result?.shape === 'counter1' ? result.value : {};
  }

  counter2(name: string): Counter2 {
    const result = this.stats[name];
    return result?.shape === 'counter2' ? result.value : {};
  }
}
