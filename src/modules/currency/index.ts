// Types
export type { ExchangeRateTable, ExchangeRateRow, CurrencyConverter } from './core/types.js';

// Logic
export { buildExchangeRateTable, createCurrencyConverter } from './core/converter.js';

// Repository
export { loadExchangeRates, parseExchangeRatesCsv } from './shell/repo/exchange-rates-repo.js';
