/**
 * arithmo CLI Tests: Shared Utilities
 */

import { describe, expect, it } from 'vitest';
import {
  createTraceLogger,
  formatError,
  formatOutput,
  parseFlags,
  readVersion,
} from '../../src/cli-shared.js';
import { calculate, ConfigError, RuntimeError } from '../../src/index.js';
import { runError } from '../helpers/runtime.js';

describe('formatOutput', () => {
  it('prints numbers as String() does', () => {
    expect(formatOutput(14)).toBe('14');
    expect(formatOutput(0.5)).toBe('0.5');
    expect(formatOutput(Infinity)).toBe('Infinity');
  });

  it('prints negative zero as 0', () => {
    expect(formatOutput(-0)).toBe('0');
  });
});

describe('formatError', () => {
  it('formats lexer errors with the column', () => {
    expect(formatError(runError('2 $ 3'))).toBe(
      "Lexer error at column 3: Unknown character '$'"
    );
  });

  it('formats parse errors with the column', () => {
    expect(formatError(runError('1 +'))).toBe(
      'Parse error at column 4: Unexpected end of input, expected a number or ('
    );
  });

  it('formats runtime errors with the column', () => {
    expect(formatError(runError('10 / 0'))).toBe(
      'Runtime error at column 1: Division by zero'
    );
  });

  it('includes the line for multi-line input', () => {
    expect(formatError(runError('1 +\n2 $'))).toBe(
      "Lexer error at line 2, column 3: Unknown character '$'"
    );
  });

  it('formats runtime errors without a location', () => {
    expect(formatError(new RuntimeError('ARITH-R002', {}))).toBe(
      'Runtime error: Modulo by zero'
    );
  });

  it('prints other errors as their message', () => {
    expect(
      formatError(new ConfigError('ARITH-C001', { reason: 'bad key' }))
    ).toBe('Invalid configuration: bad key');
    expect(formatError(new Error('plain failure'))).toBe('plain failure');
  });
});

describe('createTraceLogger', () => {
  it('logs each node indented by depth', () => {
    const lines: string[] = [];
    calculate('2*3', {
      observability: createTraceLogger((line) => lines.push(line)),
    });
    expect(lines).toEqual([
      'trace>   2 = 2',
      'trace>   3 = 3',
      'trace> 2 * 3 = 6',
    ]);
  });
});

describe('parseFlags', () => {
  it('maps flags to configuration overrides', () => {
    expect(parseFlags(['--tree', '--integer', '--trace', '1+2'])).toEqual({
      help: false,
      version: false,
      explain: undefined,
      configPath: undefined,
      overrides: { showTree: true, mode: 'integer', trace: true },
      positionals: ['1+2'],
    });
  });

  it('treats single-dash arguments as expressions', () => {
    expect(parseFlags(['-3+5']).positionals).toEqual(['-3+5']);
  });

  it('stops option parsing at --', () => {
    const flags = parseFlags(['--', '--tree']);
    expect(flags.positionals).toEqual(['--tree']);
    expect(flags.overrides).toEqual({});
  });

  it('reads the config path in both forms', () => {
    expect(parseFlags(['--config', 'a.yaml']).configPath).toBe('a.yaml');
    expect(parseFlags(['--config=b.yaml']).configPath).toBe('b.yaml');
  });

  it('recognizes help and version', () => {
    const flags = parseFlags(['--help', '--version']);
    expect(flags.help).toBe(true);
    expect(flags.version).toBe(true);
  });

  it('rejects a missing config path', () => {
    expect(() => parseFlags(['--config'])).toThrow(
      'Missing value for --config'
    );
  });

  it('lets the last mode flag win', () => {
    expect(parseFlags(['--integer', '--float']).overrides).toEqual({
      mode: 'float',
    });
    expect(parseFlags(['--float', '--integer']).overrides).toEqual({
      mode: 'integer',
    });
  });

  it('reads the error ID after --explain', () => {
    expect(parseFlags(['--explain', 'ARITH-R001']).explain).toBe('ARITH-R001');
    expect(() => parseFlags(['--explain'])).toThrow(
      'Missing error ID after --explain'
    );
  });

  it('rejects unknown options', () => {
    expect(() => parseFlags(['--bogus'])).toThrow('Unknown option: --bogus');
  });
});

describe('readVersion', () => {
  it('reads the package version', () => {
    expect(readVersion()).toMatch(/^\d+\.\d+\.\d+/);
  });
});
