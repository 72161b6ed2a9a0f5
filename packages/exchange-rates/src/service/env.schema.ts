import { z } from 'zod';

/** Upper bound for any lookback window, from env or from callers */
export const MAX_LOOKBACK_DAYS = 366;

export const exchangeRateEnvSchema = z.object({
  // How many days before the requested date a published rate is still acceptable
  FX_RATE_LOOKBACK_DAYS: z
    .string()
    .default('7')
    .transform((val: string) => Number(val))
    .pipe(z.number().int().min(0).max(MAX_LOOKBACK_DAYS)),
});

export type ExchangeRateEnvConfig = z.infer<typeof exchangeRateEnvSchema>;

export function validateExchangeRateEnv(env: NodeJS.ProcessEnv = process.env): ExchangeRateEnvConfig {
  return exchangeRateEnvSchema.parse(env);
}
