/**
 * Tests for npm package configuration
 * Validates package.json and the CLI entry point are wired for installation
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { VERSION } from './index.js';

// Project root (parent of src directory)
const projectRoot = fileURLToPath(new URL('..', import.meta.url));

interface PackageJson {
  name: string;
  version: string;
  type: string;
  main: string;
  types?: string;
  bin: Record<string, string>;
  files: string[];
  scripts: Record<string, string>;
  engines: {
    node: string;
  };
  dependencies: Record<string, string>;
  devDependencies: Record<string, string>;
}

describe('package.json configuration', () => {
  let packageJson: PackageJson;

  beforeAll(() => {
    const content = readFileSync(join(projectRoot, 'package.json'), 'utf-8');
    packageJson = JSON.parse(content);
  });

  it('exposes the version through the library entry point', () => {
    expect(VERSION).toBe(packageJson.version);
    expect(packageJson.version).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it('uses ESM modules', () => {
    expect(packageJson.type).toBe('module');
  });

  it('has the intake command pointing into dist', () => {
    expect(packageJson.bin.intake).toBe('dist/cli/index.js');
    expect(packageJson.main).toBe('dist/index.js');
    expect(packageJson.types).toBe('dist/index.d.ts');
  });

  it('ships the built code and the question bank', () => {
    expect(packageJson.files).toContain('dist');
    expect(packageJson.files).toContain('data');
    expect(packageJson.files).not.toContain('src');
  });

  it('has build, test and typecheck scripts', () => {
    expect(packageJson.scripts.build).toContain('tsc');
    expect(packageJson.scripts.test).toBe('vitest run');
    expect(packageJson.scripts.typecheck).toBe('tsc --noEmit');
  });

  it('requires Node.js 20 or higher', () => {
    const majorVersion = parseInt(packageJson.engines.node.replace(/[^\d.]/g, '').split('.')[0], 10);
    expect(majorVersion).toBeGreaterThanOrEqual(20);
  });

  it('declares the runtime libraries', () => {
    for (const dependency of ['commander', 'yaml', '@inquirer/prompts', 'chalk', 'tslog', 'openai']) {
      expect(packageJson.dependencies[dependency], dependency).toBeDefined();
    }
    expect(packageJson.devDependencies.typescript).toBeDefined();
    expect(packageJson.devDependencies.vitest).toBeDefined();
  });
});

describe('data files', () => {
  it('includes the fallback question bank', () => {
    expect(existsSync(join(projectRoot, 'data', 'fallback-questions.json'))).toBe(true);
  });
});

describe('CLI entry point', () => {
  const cliSource = readFileSync(join(projectRoot, 'src', 'cli', 'index.ts'), 'utf-8');

  it('has shebang line', () => {
    expect(cliSource.startsWith('#!/usr/bin/env node')).toBe(true);
  });

  it('handles symlinks correctly for global install', () => {
    expect(cliSource).toContain('realpathSync');
    expect(cliSource).toContain('fileURLToPath');
  });
});
