// Providers command - list the known rate publishers and their quote conventions

import { getAvailableProviderNames, getProviderDescriptor, type FxProviderMetadata } from '@ratewise/exchange-rates';
import type { Command } from 'commander';
import pc from 'picocolors';

import { createSuccessResponse } from '../shared/cli-response.js';

/**
 * Known providers in registration order
 */
export function listProviders(): FxProviderMetadata[] {
  return getAvailableProviderNames().flatMap((name) => {
    const provider = getProviderDescriptor(name);
    return provider.isOk() ? [provider.value] : [];
  });
}

export function formatProviderLine(provider: FxProviderMetadata): string {
  return `${provider.name.padEnd(16)} ${provider.currency}  ${provider.quoteType.padEnd(8)}  ${provider.displayName}`;
}

export function registerProvidersCommand(program: Command): void {
  program
    .command('providers')
    .description('List known rate providers with their base currency and quote convention')
    .option('--json', 'Output results in JSON format')
    .action((options: { json?: boolean | undefined }) => {
      const providers = listProviders();

      if (options.json) {
        console.log(JSON.stringify(createSuccessResponse('providers', providers), undefined, 2));
        return;
      }

      console.log(pc.bold(`${'NAME'.padEnd(16)} BASE QUOTE     DISPLAY NAME`));
      for (const provider of providers) {
        console.log(formatProviderLine(provider));
      }
    });
}
