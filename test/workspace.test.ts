import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { isPlainObject } from '@hostbridge/utils/casing';

const rootDir = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');
const PACKAGES = ['utils', 'config', 'protocol', 'daemon', 'sdk', 'mcp', 'cli'];

function readJson(file: string): Record<string, unknown> {
  const value: unknown = JSON.parse(fs.readFileSync(path.join(rootDir, file), 'utf-8'));
  if (!isPlainObject(value)) throw new Error(`${file} is not a JSON object`);
  return value;
}

function field(value: unknown, key: string): unknown {
  return isPlainObject(value) ? value[key] : undefined;
}

function internalDependencies(pkg: string): string[] {
  const deps = field(readJson(`packages/${pkg}/package.json`), 'dependencies');
  return Object.keys(isPlainObject(deps) ? deps : {})
    .filter((name) => name.startsWith('@hostbridge/'))
    .map((name) => name.slice('@hostbridge/'.length));
}

describe('workspace packages', () => {
  it.each(PACKAGES)('%s exports compiled JavaScript at runtime and sources to the type-checker', (pkg) => {
    const exports = field(readJson(`packages/${pkg}/package.json`), 'exports');
    expect(isPlainObject(exports)).toBe(true);

    for (const target of Object.values(isPlainObject(exports) ? exports : {})) {
      const source = field(target, 'hostbridge-source');
      expect(source).toMatch(/^\.\/src\/[a-z-]+\.ts$/);
      const base = String(source).slice('./src/'.length, -'.ts'.length);

      expect(target).toEqual({
        'hostbridge-source': `./src/${base}.ts`,
        types: `./dist/${base}.d.ts`,
        default: `./dist/${base}.js`,
      });
      expect(fs.existsSync(path.join(rootDir, 'packages', pkg, 'src', `${base}.ts`))).toBe(true);
    }
  });

  it.each(PACKAGES)('%s builds its sources into dist without the tests', (pkg) => {
    const config = readJson(`packages/${pkg}/tsconfig.build.json`);

    expect(config.extends).toBe('../../tsconfig.json');
    expect(config.compilerOptions).toMatchObject({
      noEmit: false,
      rootDir: 'src',
      outDir: 'dist',
      customConditions: [],
    });
    expect(config.include).toEqual(['src/**/*.ts']);
    expect(config.exclude).toEqual(['src/**/*.test.ts']);
  });

  it('points each bin at a compiled entry with a node shebang', () => {
    const bins: Array<[string, string]> = [
      ['cli', 'hostbridge'],
      ['mcp', 'hostbridge-mcp'],
    ];
    for (const [pkg, name] of bins) {
      expect(field(readJson(`packages/${pkg}/package.json`), 'bin')).toEqual({ [name]: './dist/bin.js' });
      const source = fs.readFileSync(path.join(rootDir, 'packages', pkg, 'src', 'bin.ts'), 'utf-8');
      expect(source.split('\n')[0]).toBe('#!/usr/bin/env node');
    }
  });

  it('builds every package after the packages it depends on', () => {
    const script = field(field(readJson('package.json'), 'scripts'), 'build');
    expect(typeof script).toBe('string');

    const order = String(script)
      .split(' && ')
      .map((step) => /^tsc -p packages\/([a-z]+)\/tsconfig\.build\.json$/.exec(step)?.[1] ?? step);
    expect([...order].sort()).toEqual([...PACKAGES].sort());

    order.forEach((pkg, index) => {
      for (const dep of internalDependencies(pkg)) {
        expect(order.indexOf(dep)).toBeGreaterThanOrEqual(0);
        expect(order.indexOf(dep)).toBeLessThan(index);
      }
    });
  });
});
