import type { Decimal } from 'decimal.js';

import type { Logger } from '@/infra/logger/index.js';
import type { DerivedValue, Shape, ShapeValues } from '@/modules/aggregation/index.js';
import type { CurrencyConverter } from '@/modules/currency/index.js';
import type { ReferenceTables } from '@/modules/reference-tables/index.js';
import type { CalendarDate } from '@/modules/record-tree/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Evaluation context
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read-only inputs shared by every record evaluation.
 */
export interface EvaluationContext {
  readonly tables: ReferenceTables;
  readonly converter: CurrencyConverter;
  /** Reference date for every "today" comparison */
  readonly today: CalendarDate;
  /** Latest year used by the USD transaction roll-up; null disables the clamp */
  readonly usdClampYear: number | null;
  readonly logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Declarations
// ─────────────────────────────────────────────────────────────────────────────

type SummedDeclarationOf<F, S extends Shape> = S extends Shape
  ? {
      readonly name: string;
      readonly shape: S;
      readonly aggregation: 'sum';
      readonly compute: (facts: F) => ShapeValues[S];
    }
  : never;

/**
 * Statistic computed per unit and summed across the group.
 */
export type SummedDeclaration<F> = SummedDeclarationOf<F, Shape>;

/**
 * Statistic derived from an already merged aggregate; never folded.
 */
export interface DerivedDeclaration<C> {
  readonly name: string;
  readonly aggregation: 'none';
  readonly derive: (context: C) => DerivedValue;
}

export type NumberInput = Decimal.Value;
