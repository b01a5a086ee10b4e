/**
 * CLI Shared Utilities
 * Common flag parsing and formatting functions for CLI tools
 */

import * as fs from 'fs';
import type { ConfigOverrides } from './config.js';
import { formatExpression } from './printer/index.js';
import type { ObservabilityCallbacks } from './runtime/index.js';
import { ArithError, LexerError, ParseError, RuntimeError } from './types.js';

/**
 * Convert an evaluation result to its printed form
 *
 * @param value - The value to format
 * @returns Formatted string representation (-0 prints as 0)
 */
export function formatOutput(value: number): string {
  if (Object.is(value, -0)) return '0';
  return String(value);
}

function describeLocation(err: ArithError): string {
  const location = err.location;
  if (!location) return '';
  if (location.line === 1) return ` at column ${location.column}`;
  return ` at line ${location.line}, column ${location.column}`;
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns One-line message with the error kind and column
 */
export function formatError(err: Error): string {
  if (err instanceof LexerError) {
    return `Lexer error${describeLocation(err)}: ${err.toData().message}`;
  }

  if (err instanceof ParseError) {
    return `Parse error${describeLocation(err)}: ${err.toData().message}`;
  }

  if (err instanceof RuntimeError) {
    return `Runtime error${describeLocation(err)}: ${err.toData().message}`;
  }

  return err.message;
}

/**
 * Observability callbacks that log each evaluated node as
 * `trace> <expression> = <value>`, indented by tree depth.
 */
export function createTraceLogger(
  write: (line: string) => void
): ObservabilityCallbacks {
  return {
    onEvaluate: (event) => {
      const indent = '  '.repeat(event.depth);
      write(
        `trace> ${indent}${formatExpression(event.node)} = ${formatOutput(event.value)}`
      );
    },
  };
}

/** Flags shared by arithmo and arithmo-eval */
export interface CliFlags {
  help: boolean;
  version: boolean;
  /** Error ID to document instead of evaluating */
  explain: string | undefined;
  configPath: string | undefined;
  overrides: ConfigOverrides;
  positionals: string[];
}

/**
 * Parse command-line flags.
 * Arguments starting with `--` are options; `--` ends option parsing.
 * Anything else, including `-3+5`, is positional.
 *
 * @throws Error on unknown options or a missing --config/--explain value
 */
export function parseFlags(argv: string[]): CliFlags {
  const flags: CliFlags = {
    help: false,
    version: false,
    explain: undefined,
    configPath: undefined,
    overrides: {},
    positionals: [],
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--') {
      flags.positionals.push(...argv.slice(i + 1));
      break;
    }

    if (!arg.startsWith('--')) {
      flags.positionals.push(arg);
      continue;
    }

    if (arg.startsWith('--config=')) {
      flags.configPath = arg.slice('--config='.length);
      continue;
    }

    switch (arg) {
      case '--help':
        flags.help = true;
        break;
      case '--version':
        flags.version = true;
        break;
      case '--tree':
        flags.overrides.showTree = true;
        break;
      case '--integer':
        flags.overrides.mode = 'integer';
        break;
      case '--float':
        flags.overrides.mode = 'float';
        break;
      case '--trace':
        flags.overrides.trace = true;
        break;
      case '--config': {
        const value = argv[i + 1];
        if (value === undefined) {
          throw new Error('Missing value for --config');
        }
        flags.configPath = value;
        i++;
        break;
      }
      case '--explain': {
        const value = argv[i + 1];
        if (value === undefined) {
          throw new Error('Missing error ID after --explain');
        }
        flags.explain = value;
        i++;
        break;
      }
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return flags;
}

/**
 * Read the package version from package.json
 */
export function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson: unknown = JSON.parse(
    fs.readFileSync(packageJsonPath, 'utf-8')
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return 'unknown';
}
