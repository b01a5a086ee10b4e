/**
 * arithmo-eval - Evaluate one arithmetic expression
 *
 * Usage:
 *   arithmo-eval '2 + 3 * 4'
 *   arithmo-eval --tree '(1 + 2) * 3'
 *   arithmo-eval --help
 */

import {
  calculate,
  createDefaultConfig,
  loadConfig,
  renderTree,
  resolveConfig,
  type ArithConfig,
  type CalculationResult,
  type ConfigOverrides,
  type ObservabilityCallbacks,
} from './index.js';
import {
  createTraceLogger,
  formatError,
  formatOutput,
  parseFlags,
  readVersion,
} from './cli-shared.js';
import { explainError } from './cli-explain.js';
import { ConfigError } from './types.js';

type EvalCommand =
  | { mode: 'help' }
  | { mode: 'version' }
  | { mode: 'explain'; errorId: string }
  | {
      mode: 'eval';
      expression: string;
      configPath: string | undefined;
      overrides: ConfigOverrides;
    };

/**
 * Parse command-line arguments into structured command
 */
export function parseArgs(argv: string[]): EvalCommand {
  const flags = parseFlags(argv);

  if (flags.help) {
    return { mode: 'help' };
  }
  if (flags.version) {
    return { mode: 'version' };
  }
  if (flags.explain !== undefined) {
    return { mode: 'explain', errorId: flags.explain };
  }

  // If no expression, default to help
  if (flags.positionals.length === 0) {
    return { mode: 'help' };
  }

  // Unquoted input arrives split by the shell: `arithmo-eval 2 + 3`
  return {
    mode: 'eval',
    expression: flags.positionals.join(' '),
    configPath: flags.configPath,
    overrides: flags.overrides,
  };
}

/**
 * Evaluate an expression under the given configuration
 */
export function evaluateExpression(
  expression: string,
  config: ArithConfig = createDefaultConfig(),
  observability: ObservabilityCallbacks = {}
): CalculationResult {
  return calculate(expression.trim(), {
    mode: config.mode,
    maxDepth: config.maxDepth,
    observability,
  });
}

/**
 * Display help information
 */
function showHelp(): void {
  console.log(`arithmo Expression Evaluator

Usage:
  arithmo-eval [options] <expression>

Options:
  --tree            Print the expression tree before the result
  --integer         Use integer arithmetic
  --float           Use floating-point arithmetic (default)
  --trace           Log each evaluated node to stderr
  --config <path>   Read settings from a YAML file
  --explain <id>    Show documentation for an error ID
  --help            Show this help message
  --version         Show version information

Examples:
  arithmo-eval '2 + 3 * 4'
  arithmo-eval -- '-2 ^ 2'
  arithmo-eval --integer '7 / 2'
  arithmo-eval --explain ARITH-R001`);
}

/**
 * Entry point for arithmo-eval binary
 *
 * @returns Process exit code
 */
export function main(argv: string[]): number {
  let command: EvalCommand;
  try {
    command = parseArgs(argv);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    return 1;
  }

  if (command.mode === 'help') {
    showHelp();
    return 0;
  }

  if (command.mode === 'version') {
    console.log(`arithmo-eval ${readVersion()}`);
    return 0;
  }

  if (command.mode === 'explain') {
    const documentation = explainError(command.errorId);
    if (documentation === null) {
      console.error(`Invalid error ID: ${command.errorId}`);
      console.error(
        'Error ID must be in format ARITH-{L|P|R|C}{3-digit}, e.g., ARITH-R001'
      );
      return 1;
    }
    console.log(documentation);
    return 0;
  }

  let config: ArithConfig;
  try {
    config = resolveConfig(
      loadConfig({ path: command.configPath }),
      command.overrides
    );
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(formatError(err));
      return 1;
    }
    throw err;
  }

  const observability = config.trace
    ? createTraceLogger((line) => console.error(line))
    : {};
  const result = evaluateExpression(command.expression, config, observability);

  if (!result.success) {
    console.error(formatError(result.error));
    return 1;
  }

  if (config.showTree) {
    console.log(renderTree(result.ast));
  }
  console.log(formatOutput(result.value));
  return 0;
}
