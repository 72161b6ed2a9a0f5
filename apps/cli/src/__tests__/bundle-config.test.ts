import fs from 'node:fs/promises';

import { describe, expect, it } from 'vitest';

import bundleConfig from '../../tsup.config.js';

interface CliPackageJson {
  bin: Record<string, string>;
  dependencies: Record<string, string>;
}

async function readPackageJson(): Promise<CliPackageJson> {
  const content = await fs.readFile(new URL('../../package.json', import.meta.url), 'utf8');
  return JSON.parse(content) as CliPackageJson;
}

describe('CLI bundle', () => {
  it('writes the entry the ratewise bin points at', async () => {
    if (typeof bundleConfig === 'function' || Array.isArray(bundleConfig)) {
      throw new Error('Expected a single static bundle config');
    }
    const packageJson = await readPackageJson();

    expect(bundleConfig.entry).toEqual(['src/index.ts']);
    expect(bundleConfig.format).toEqual(['esm']);
    expect(packageJson.bin['ratewise']).toBe(`./${bundleConfig.outDir ?? 'dist'}/index.js`);
  });

  it('inlines the workspace packages and keeps npm dependencies external', async () => {
    if (typeof bundleConfig === 'function' || Array.isArray(bundleConfig)) {
      throw new Error('Expected a single static bundle config');
    }
    const packageJson = await readPackageJson();
    const inlined = (bundleConfig.noExternal ?? []).filter((pattern): pattern is RegExp => pattern instanceof RegExp);

    const dependencies = Object.keys(packageJson.dependencies);
    const workspacePackages = dependencies.filter((name) => inlined.some((pattern) => pattern.test(name)));

    expect(workspacePackages).toEqual(['@ratewise/core', '@ratewise/exchange-rates', '@ratewise/logger']);
    // Runtime imports of the inlined packages must be installable from the CLI package itself
    expect(dependencies).toEqual(expect.arrayContaining(['pino', 'pino-pretty', 'zod', 'decimal.js', 'neverthrow']));
  });
});
