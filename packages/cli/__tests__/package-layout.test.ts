import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

function readJson(relPath: string): unknown {
  return JSON.parse(readFileSync(fileURLToPath(new URL(relPath, import.meta.url)), 'utf-8'));
}

describe('package layout', () => {
  it('points the doclinks bin at the entry the cli build emits', () => {
    expect(readJson('../package.json')).toMatchObject({
      bin: { doclinks: './dist/index.js' },
      scripts: { build: 'tsc -b tsconfig.build.json' },
    });
    expect(readJson('../tsconfig.build.json')).toMatchObject({
      compilerOptions: { rootDir: 'src', outDir: 'dist' },
      include: ['src/**/*.ts'],
      references: [{ path: '../core/tsconfig.build.json' }],
    });
  });

  it('loads core from its compiled output at run time', () => {
    expect(readJson('../../core/package.json')).toMatchObject({
      main: './dist/index.js',
      exports: { '.': { import: './dist/index.js' } },
    });
    expect(readJson('../../core/tsconfig.build.json')).toMatchObject({
      compilerOptions: { composite: true, rootDir: 'src', outDir: 'dist' },
    });
  });

  it('builds core before the cli from the root', () => {
    expect(readJson('../../../package.json')).toMatchObject({
      scripts: {
        build: 'tsc -b packages/core/tsconfig.build.json packages/cli/tsconfig.build.json',
      },
    });
  });
});
