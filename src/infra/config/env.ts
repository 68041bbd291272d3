/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import path from 'node:path';

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

const IsoDate = Type.String({ pattern: '^[0-9]{4}-[0-9]{2}-[0-9]{2}$' });

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Reference data
  REFERENCE_DATA_DIR: Type.String({ default: 'reference-data' }),
  EXCHANGE_RATES_FILE: Type.Optional(Type.String()),

  // Evaluation
  STATS_TODAY: Type.Optional(IsoDate),
  USD_CLAMP_YEAR: Type.Optional(Type.Integer({ minimum: 1900, maximum: 2999 })),
});

export type Env = Static<typeof EnvSchema>;

const parseOptionalInt = (raw: string | undefined): number | undefined => {
  if (raw === undefined || raw === '') return undefined;
  return Number(raw);
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    REFERENCE_DATA_DIR: env['REFERENCE_DATA_DIR'] ?? 'reference-data',
    EXCHANGE_RATES_FILE: env['EXCHANGE_RATES_FILE'],
    STATS_TODAY: env['STATS_TODAY'],
    USD_CLAMP_YEAR: parseOptionalInt(env['USD_CLAMP_YEAR']),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  env: {
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  referenceData: {
    rootDir: env.REFERENCE_DATA_DIR,
    exchangeRatesFile:
      env.EXCHANGE_RATES_FILE ?? path.join(env.REFERENCE_DATA_DIR, 'exchange_rates.csv'),
  },
  evaluation: {
    /** Reference date for every date-relative rule; undefined means the current date */
    today: env.STATS_TODAY,
    /** Upper year bound for the USD transaction roll-up; undefined disables the clamp */
    usdClampYear: env.USD_CLAMP_YEAR,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
