/**
 * @ratewise/exchange-rates
 *
 * FX rate resolution over materialized provider rate tables
 */

// Shared types
export type {
  CalendarDate,
  FxProviderDescriptor,
  FxProviderMetadata,
  FxRateQuery,
  FxRateResolution,
  PegTable,
  PeggedCurrency,
  QuoteType,
  RateTable,
} from './shared/types/index.js';

// Errors
export {
  CircularPegError,
  FxRateInvariantError,
  NoFxRateFoundError,
  UnsupportedCurrencyError,
  type FxRateError,
} from './shared/errors.js';

export { formatCalendarDate, parseCalendarDate, startOfUtcDay, subtractDays } from './shared/calendar-date-utils.js';

// Resolution
export { resolveFxRate } from './calculator/exchange-rate-calculator.js';

// Tables
export {
  ExchangeRateFileSchema,
  ExchangeRateRecordSchema,
  PeggedCurrencySchema,
  type ExchangeRateFile,
  type ExchangeRateRecord,
} from './tables/schemas.js';
export { buildPegTable, buildRateTable, mergePegDefinitions, type BuildRateTableOptions } from './tables/rate-table-builder.js';
export { DEFAULT_PEGGED_CURRENCIES } from './tables/pegged-currencies.js';

// Providers
export { getAvailableProviderNames, getProviderDescriptor, type ProviderName } from './providers/provider-descriptors.js';

// Service
export {
  ExchangeRateService,
  type ExchangeRateServiceFromRecordsOptions,
  type ExchangeRateServiceOptions,
} from './service/exchange-rate-service.js';
export { MAX_LOOKBACK_DAYS, validateExchangeRateEnv, type ExchangeRateEnvConfig } from './service/env.schema.js';
