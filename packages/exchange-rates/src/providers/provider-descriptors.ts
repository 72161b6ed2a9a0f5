/**
 * Descriptors for known rate publishers
 *
 * Only the base currency and quote convention matter to resolution; fetching
 * the published tables happens outside this package.
 */

import type { Currency } from '@ratewise/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { FxProviderMetadata } from '../shared/types/index.js';

const KNOWN_PROVIDERS = {
  ecb: {
    name: 'ecb',
    displayName: 'European Central Bank',
    currency: 'EUR' as Currency,
    // 1 EUR = 1.0856 USD
    quoteType: 'indirect',
  },
  'bank-of-canada': {
    name: 'bank-of-canada',
    displayName: 'Bank of Canada',
    currency: 'CAD' as Currency,
    // 1 USD = 1.3500 CAD
    quoteType: 'direct',
  },
  banxico: {
    name: 'banxico',
    displayName: 'Banco de México',
    currency: 'MXN' as Currency,
    // 1 USD = 17.5 MXN
    quoteType: 'direct',
  },
} as const satisfies Record<string, FxProviderMetadata>;

export type ProviderName = keyof typeof KNOWN_PROVIDERS;

function isProviderName(name: string): name is ProviderName {
  return Object.prototype.hasOwnProperty.call(KNOWN_PROVIDERS, name);
}

/**
 * Get the names of all known providers
 */
export function getAvailableProviderNames(): ProviderName[] {
  return Object.keys(KNOWN_PROVIDERS).filter(isProviderName);
}

/**
 * Look up a known provider by name (case-insensitive)
 */
export function getProviderDescriptor(name: string): Result<FxProviderMetadata, Error> {
  const normalized = name.trim().toLowerCase();
  if (!isProviderName(normalized)) {
    return err(
      new Error(`Unknown exchange rate provider: ${name}. Available: ${getAvailableProviderNames().join(', ')}`)
    );
  }
  return ok(KNOWN_PROVIDERS[normalized]);
}
