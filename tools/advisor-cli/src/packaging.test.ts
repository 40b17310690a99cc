import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';
import { z } from 'zod';

const repoRoot = fileURLToPath(new URL('../../../', import.meta.url));
const packageRoot = fileURLToPath(new URL('../', import.meta.url));

const readJson = (filePath: string): unknown => {
  const document: unknown = JSON.parse(readFileSync(filePath, 'utf8'));
  return document;
};

const manifestSchema = z.object({
  bin: z.record(z.string()),
  scripts: z.record(z.string()).default({}),
  dependencies: z.record(z.string()).default({}),
});

const buildConfigSchema = z.object({
  extends: z.string(),
  exclude: z.array(z.string()),
});

describe('advisor entry point', () => {
  it('runs the TypeScript source through tsx', () => {
    const manifest = manifestSchema.parse(readJson(`${packageRoot}package.json`));

    expect(manifest.bin.advisor).toBe('./src/cli.ts');
    expect(manifest.dependencies.tsx).toBeDefined();
    const source = readFileSync(fileURLToPath(new URL('./cli.ts', import.meta.url)), 'utf8');
    expect(source.split('\n')[0]).toBe('#!/usr/bin/env tsx');
  });

  it('is exposed from the workspace root', () => {
    const manifest = manifestSchema.parse(readJson(`${repoRoot}package.json`));

    expect(manifest.bin.advisor).toBe('tools/advisor-cli/src/cli.ts');
    expect(manifest.scripts.advisor).toBe('tsx tools/advisor-cli/src/cli.ts');
    expect(manifest.dependencies.tsx).toBeDefined();
  });
});

describe('build configuration', () => {
  it('leaves tests and fixtures out of the emitted build', () => {
    const manifest = manifestSchema.parse(readJson(`${repoRoot}package.json`));
    const config = buildConfigSchema.parse(readJson(`${repoRoot}tsconfig.build.json`));

    expect(manifest.scripts.build).toBe('tsc -p tsconfig.build.json');
    expect(config.extends).toBe('./tsconfig.json');
    expect(config.exclude).toEqual(
      expect.arrayContaining(['**/*.test.ts', '**/__tests__/**', '**/__fixtures__/**']),
    );
  });
});
