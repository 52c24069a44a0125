import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createProgram, runCLI, resolveOptions, getHelpText, EXAMPLES, DESCRIPTION } from './index.js';
import { VERSION } from '../index.js';

describe('createProgram', () => {
  it('creates a Commander program with correct name', () => {
    expect(createProgram().name()).toBe('intake');
  });

  it('has the correct version', () => {
    expect(createProgram().version()).toBe(VERSION);
  });

  it('takes no positional arguments', () => {
    expect(createProgram().registeredArguments).toEqual([]);
  });

  it('defines every option with a short flag where one exists', () => {
    const program = createProgram();
    const flags = program.options.map((opt) => [opt.short, opt.long]);

    expect(flags).toEqual([
      ['-v', '--version'],
      ['-r', '--resume'],
      ['-p', '--provider'],
      ['-e', '--export'],
      ['-o', '--output'],
      ['-t', '--timeout'],
      [undefined, '--verbose'],
    ]);
  });

  it('lists the providers in the --provider description', () => {
    const option = createProgram().options.find((opt) => opt.long === '--provider');
    expect(option?.description).toBe('Question provider: openai, claude, static (default: from config)');
  });

  it('describes where files are kept', () => {
    expect(DESCRIPTION).toContain('./intake/');
    expect(createProgram().description()).toBe(DESCRIPTION);
  });
});

describe('resolveOptions', () => {
  it('defaults the flags', () => {
    expect(resolveOptions({})).toEqual({ options: { resume: false, verbose: false }, errors: [] });
  });

  it('converts valid values', () => {
    expect(
      resolveOptions({
        resume: true,
        provider: 'claude',
        export: 'Markdown',
        output: './out',
        timeout: '5000',
        verbose: true,
      })
    ).toEqual({
      options: {
        resume: true,
        verbose: true,
        provider: 'claude',
        exportFormat: 'markdown',
        outputDir: './out',
        timeoutMs: 5000,
      },
      errors: [],
    });
  });

  it('accepts "none" to turn export off', () => {
    expect(resolveOptions({ export: 'none' }).options.exportFormat).toBe('none');
  });

  it('collects every invalid value', () => {
    expect(resolveOptions({ provider: 'gpt4', export: 'pdf', timeout: '0' }).errors).toEqual([
      'Unknown provider "gpt4". Choose one of: openai, claude, static',
      'Unknown export format "pdf". Choose one of: json, csv, markdown, none',
      'Timeout must be a positive number of milliseconds, got "0"',
    ]);
    expect(resolveOptions({ timeout: '2.5s' }).errors).toEqual([
      'Timeout must be a positive number of milliseconds, got "2.5s"',
    ]);
  });
});

describe('runCLI', () => {
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  it('starts a new intake by default', () => {
    const result = runCLI(['node', 'intake']);

    expect(result.action).toBe('start');
    expect(result.options).toEqual({ resume: false, verbose: false });
  });

  it('handles --resume flag', () => {
    const result = runCLI(['node', 'intake', '--resume']);

    expect(result.action).toBe('resume');
    expect(result.options.resume).toBe(true);
  });

  it('parses short flags together', () => {
    const result = runCLI(['node', 'intake', '-p', 'static', '-e', 'csv', '-o', 'exports', '-t', '1000']);

    expect(result.action).toBe('start');
    expect(result.options).toEqual({
      resume: false,
      verbose: false,
      provider: 'static',
      exportFormat: 'csv',
      outputDir: 'exports',
      timeoutMs: 1000,
    });
  });

  it('reports invalid values and returns an error', () => {
    const result = runCLI(['node', 'intake', '--provider', 'invalid']);

    expect(result.action).toBe('error');
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      'Error: Unknown provider "invalid". Choose one of: openai, claude, static'
    );
  });
});

describe('EXAMPLES', () => {
  it('demonstrates the main options', () => {
    expect(EXAMPLES).toContain('$ intake --resume');
    expect(EXAMPLES).toContain('--provider static');
    expect(EXAMPLES).toContain('--export markdown');
    expect(EXAMPLES).toContain('--timeout 5000');
  });
});

describe('getHelpText', () => {
  it('includes usage and every option', () => {
    const helpText = getHelpText();
    expect(helpText).toContain('Usage: intake [options]');
    for (const flag of ['--resume', '--provider', '--export', '--output', '--timeout', '--verbose', '--version', '--help']) {
      expect(helpText).toContain(flag);
    }
  });
});
