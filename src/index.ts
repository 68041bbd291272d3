/**
 * Library entry point.
 */

export { buildStatsEngine, type StatsEngineDeps, type EngineBuildError } from './app/build-engine.js';
export { parseEnv, createConfig, type AppConfig, type Env } from './infra/config/index.js';
export { createLogger, createSilentLogger, type Logger } from './infra/logger/index.js';

export * from './modules/aggregation/index.js';
export * from './modules/currency/index.js';
export * from './modules/file-stats/index.js';
export * from './modules/group-stats/index.js';
export * from './modules/pipeline/index.js';
export * from './modules/record-tree/index.js';
export * from './modules/reference-tables/index.js';
export * from './modules/statistics/index.js';
