import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { DerivedDeclaration, NumberInput, SummedDeclaration } from './types.js';
import type { Counter1, Counter2, Counter3, DerivedValue } from '@/modules/aggregation/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Declaration helpers
// ─────────────────────────────────────────────────────────────────────────────

export const numberStatistic = <F>(
  name: string,
  compute: (facts: F) => NumberInput
): SummedDeclaration<F> => ({
  name,
  shape: 'number',
  aggregation: 'sum',
  compute: (facts: F) => new Decimal(compute(facts)),
});

export const counter1Statistic = <F>(
  name: string,
  compute: (facts: F) => Counter1
): SummedDeclaration<F> => ({ name, shape: 'counter1', aggregation: 'sum', compute });

export const counter2Statistic = <F>(
  name: string,
  compute: (facts: F) => Counter2
): SummedDeclaration<F> => ({ name, shape: 'counter2', aggregation: 'sum', compute });

export const counter3Statistic = <F>(
  name: string,
  compute: (facts: F) => Counter3
): SummedDeclaration<F> => ({ name, shape: 'counter3', aggregation: 'sum', compute });

export const derivedStatistic = <C>(
  name: string,
  derive: (context: C) => DerivedValue
): DerivedDeclaration<C> => ({ name, aggregation: 'none', derive });

// ─────────────────────────────────────────────────────────────────────────────
// Catalogue validation
// ─────────────────────────────────────────────────────────────────────────────

export interface DuplicateStatisticError {
  readonly type: 'DuplicateStatistic';
  readonly message: string;
  readonly level: string;
  readonly name: string;
}

/**
 * Checks that every statistic name appears once within its level.
 */
export const ensureUniqueNames = <D extends { readonly name: string }>(
  level: string,
  declarations: readonly D[]
): Result<readonly D[], DuplicateStatisticError> => {
  const seen = new Set<string>();
  for (const declaration of declarations) {
    if (seen.has(declaration.name)) {
      return err({
        type: 'DuplicateStatistic',
        message: `Statistic '${declaration.name}' is declared twice for ${level}`,
        level,
        name: declaration.name,
      });
    }
    seen.add(declaration.name);
  }
  return ok(declarations);
};
