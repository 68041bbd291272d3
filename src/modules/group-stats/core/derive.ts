import { describeUnknownError } from '@/common/types/errors.js';

import type { Logger } from '@/infra/logger/index.js';
import type { DerivedValue } from '@/modules/aggregation/index.js';
import type { DerivedDeclaration } from '@/modules/statistics/index.js';

/**
 * Derives every statistic from an already merged aggregate. A derivation
 * that throws yields null and is logged.
 */
export const deriveStatistics = <C>(
  declarations: readonly DerivedDeclaration<C>[],
  context: C,
  logger: Logger
): Record<string, DerivedValue> => {
  const out: Record<string, DerivedValue> = {};
  for (const declaration of declarations) {
    try {
      out[declaration.name] = declaration.derive(context);
    } catch (error) {
      logger.warn({ statistic: declaration.name, reason: describeUnknownError(error) }, 'Derived statistic failed');
      out[declaration.name] = null;
    }
  }
  return out;
};
