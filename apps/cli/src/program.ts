import { configureLogger } from '@ratewise/logger';
import { Command } from 'commander';

import { registerProvidersCommand } from './features/providers/providers.js';
import { registerRateCommand } from './features/rate/rate.js';

interface GlobalOptions {
  verbose?: boolean | undefined;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('ratewise')
    .description('Resolve FX rates from published provider rate tables')
    .version('0.1.0')
    .option('--verbose', 'Write debug logs to stderr')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts<GlobalOptions>().verbose) {
        configureLogger({ level: 'debug', console: true });
      }
    });

  // Rate command - resolve a conversion rate from a rates file
  registerRateCommand(program);

  // Providers command - list known rate publishers
  registerProvidersCommand(program);

  return program;
}
