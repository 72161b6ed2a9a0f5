export * from './currency.js';
export * from './utils/decimal-utils.js';
export * from './utils/type-guard-utils.js';
