import { parseDecimal, type Currency } from '@ratewise/core';

import type { PeggedCurrency } from '../shared/types/index.js';

function peg(currency: string, peggedTo: string, rate: string): PeggedCurrency {
  return { currency: currency as Currency, peggedTo: peggedTo as Currency, rate: parseDecimal(rate) };
}

/**
 * Currencies held at a fixed rate to an anchor currency
 * Rate: 1 unit of currency = rate units of peggedTo
 */
export const DEFAULT_PEGGED_CURRENCIES: readonly PeggedCurrency[] = [
  peg('AED', 'USD', '0.27229'), // 3.6725 AED per USD
  peg('SAR', 'USD', '0.26667'), // 3.75 SAR per USD
  peg('QAR', 'USD', '0.27473'), // 3.64 QAR per USD
  peg('BHD', 'USD', '2.65957'), // 0.376 BHD per USD
  peg('OMR', 'USD', '2.60078'), // 0.3845 OMR per USD
  peg('JOD', 'USD', '1.41044'), // 0.709 JOD per USD
  peg('DJF', 'USD', '0.00562679'), // 177.721 DJF per USD
  peg('BGN', 'EUR', '0.51129'), // 1.95583 BGN per EUR
  peg('XOF', 'EUR', '0.00152449'), // 655.957 XOF per EUR
  peg('XAF', 'EUR', '0.00152449'), // 655.957 XAF per EUR
];
