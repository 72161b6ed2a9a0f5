#!/usr/bin/env node
import { getLogger } from '@ratewise/logger';

import { createProgram } from './program.js';

const logger = getLogger('CLI');

async function main() {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  logger.error({ error }, 'Unhandled CLI error');
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
