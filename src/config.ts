/**
 * Configuration Loader
 * Loads and validates .arithmo.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import {
  ConfigError,
  DEFAULT_MAX_DEPTH,
  ERROR_IDS,
  type ArithmeticMode,
} from './types.js';

// ============================================================
// TYPES
// ============================================================

export interface ArithConfig {
  readonly mode: ArithmeticMode;
  readonly maxDepth: number;
  /** Print the AST tree before each result */
  readonly showTree: boolean;
  /** Log every evaluated node */
  readonly trace: boolean;
  /** Inputs that end an interactive session */
  readonly exitKeywords: readonly string[];
}

/** Settings that override the loaded configuration (e.g. CLI flags) */
export interface ConfigOverrides {
  mode?: ArithmeticMode;
  maxDepth?: number;
  showTree?: boolean;
  trace?: boolean;
  exitKeywords?: string[];
}

export interface LoadConfigOptions {
  /** Directory searched for CONFIG_FILE_NAME (default: process.cwd()) */
  cwd?: string | undefined;
  /** Explicit configuration file; must exist when given */
  path?: string | undefined;
}

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.arithmo.yaml';

const KNOWN_KEYS = new Set([
  'mode',
  'maxDepth',
  'showTree',
  'trace',
  'exitKeywords',
]);

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): ArithConfig {
  return {
    mode: 'float',
    maxDepth: DEFAULT_MAX_DEPTH,
    showTree: false,
    trace: false,
    exitKeywords: ['exit', 'quit'],
  };
}

// ============================================================
// VALIDATION
// ============================================================

function invalid(reason: string): ConfigError {
  return new ConfigError(ERROR_IDS.INVALID_CONFIG, { reason });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMode(value: unknown): value is ArithmeticMode {
  return value === 'float' || value === 'integer';
}

function readBoolean(key: string, value: unknown): boolean {
  if (typeof value !== 'boolean') {
    throw invalid(`${key} must be a boolean`);
  }
  return value;
}

/**
 * Validate parsed configuration data and return the keys it sets.
 *
 * @throws ConfigError naming the first invalid key
 */
export function validateConfig(data: unknown): ConfigOverrides {
  // Empty file
  if (data === null || data === undefined) {
    return {};
  }

  if (!isPlainObject(data)) {
    throw invalid('must be a mapping');
  }

  const overrides: ConfigOverrides = {};

  for (const [key, value] of Object.entries(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw invalid(`unknown key "${key}"`);
    }

    switch (key) {
      case 'mode':
        if (!isMode(value)) {
          throw invalid(`mode must be 'float' or 'integer'`);
        }
        overrides.mode = value;
        break;
      case 'maxDepth':
        if (
          typeof value !== 'number' ||
          !Number.isSafeInteger(value) ||
          value < 1
        ) {
          throw invalid('maxDepth must be a positive integer');
        }
        overrides.maxDepth = value;
        break;
      case 'showTree':
        overrides.showTree = readBoolean(key, value);
        break;
      case 'trace':
        overrides.trace = readBoolean(key, value);
        break;
      case 'exitKeywords':
        if (
          !Array.isArray(value) ||
          !value.every((item): item is string => typeof item === 'string')
        ) {
          throw invalid('exitKeywords must be a list of strings');
        }
        overrides.exitKeywords = value;
        break;
    }
  }

  return overrides;
}

/**
 * Parse configuration text (YAML; JSON is accepted as a YAML subset).
 *
 * @throws ConfigError on syntax errors or invalid keys
 */
export function parseConfig(text: string): ConfigOverrides {
  let data: unknown;
  try {
    data = yaml.parse(text);
  } catch (err) {
    throw invalid(
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }
  return validateConfig(data);
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/** Apply overrides on top of a configuration */
export function resolveConfig(
  base: ArithConfig,
  overrides: ConfigOverrides
): ArithConfig {
  return {
    mode: overrides.mode ?? base.mode,
    maxDepth: overrides.maxDepth ?? base.maxDepth,
    showTree: overrides.showTree ?? base.showTree,
    trace: overrides.trace ?? base.trace,
    exitKeywords: overrides.exitKeywords ?? base.exitKeywords,
  };
}

/**
 * Load configuration from an explicit path, or from CONFIG_FILE_NAME in
 * the working directory.
 *
 * A missing default file yields the defaults; a missing explicit file
 * is an error.
 *
 * @throws ConfigError if the file is unreadable or invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): ArithConfig {
  const defaults = createDefaultConfig();
  const explicit = options.path !== undefined;
  const configPath =
    options.path ?? join(options.cwd ?? process.cwd(), CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    if (explicit) {
      throw invalid(`file not found: ${configPath}`);
    }
    return defaults;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw invalid(
      `failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return resolveConfig(defaults, parseConfig(fileContent));
}
