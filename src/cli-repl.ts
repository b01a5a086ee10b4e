/**
 * arithmo - Interactive arithmetic prompt
 *
 * Usage:
 *   arithmo
 *   arithmo --tree --integer
 *   arithmo --config ./settings.yaml
 */

import { createInterface } from 'readline';
import {
  calculate,
  createDefaultConfig,
  loadConfig,
  renderTree,
  resolveConfig,
  type ArithConfig,
} from './index.js';
import {
  createTraceLogger,
  formatError,
  formatOutput,
  parseFlags,
  readVersion,
} from './cli-shared.js';

export const PROMPT = 'in> ';

export interface ReplOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  /** Receives trace lines (default: output) */
  traceOutput?: NodeJS.WritableStream | undefined;
  config?: ArithConfig | undefined;
}

/**
 * Read expressions line by line until end of input, an empty line or an
 * exit keyword, writing `out> ` or `err> ` for each.
 *
 * @returns Number of lines that failed
 */
export async function runRepl(options: ReplOptions): Promise<number> {
  const config = options.config ?? createDefaultConfig();
  const { output } = options;
  const traceOutput = options.traceOutput ?? output;
  const observability = config.trace
    ? createTraceLogger((line) => traceOutput.write(`${line}\n`))
    : {};

  const rl = createInterface({ input: options.input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();
  let failures = 0;

  try {
    for (;;) {
      output.write(PROMPT);
      const next = await lines.next();
      if (next.done) break;

      const line = next.value.trim();
      if (line === '' || config.exitKeywords.includes(line)) break;

      const result = calculate(line, {
        mode: config.mode,
        maxDepth: config.maxDepth,
        observability,
      });

      if (!result.success) {
        failures++;
        output.write(`err> ${formatError(result.error)}\n`);
        continue;
      }

      if (config.showTree) {
        output.write(`ast>\n${renderTree(result.ast)}\n`);
      }
      output.write(`out> ${formatOutput(result.value)}\n`);
    }
  } finally {
    rl.close();
  }

  return failures;
}

/**
 * Display help information
 */
function showHelp(): void {
  console.log(`arithmo Interactive Calculator

Usage:
  arithmo [options]

Options:
  --tree            Print the expression tree before each result
  --integer         Use integer arithmetic
  --float           Use floating-point arithmetic (default)
  --trace           Log each evaluated node to stderr
  --config <path>   Read settings from a YAML file
  --help            Show this help message
  --version         Show version information

Enter one expression per line. An empty line, end of input or
'exit' ends the session.`);
}

/**
 * Entry point for arithmo binary
 *
 * @returns Process exit code: 0 when every line succeeded, 1 otherwise
 */
export async function main(argv: string[]): Promise<number> {
  let config: ArithConfig;
  try {
    const flags = parseFlags(argv);

    if (flags.help) {
      showHelp();
      return 0;
    }
    if (flags.version) {
      console.log(`arithmo ${readVersion()}`);
      return 0;
    }
    if (flags.explain !== undefined) {
      throw new Error('--explain is only supported by arithmo-eval');
    }
    if (flags.positionals.length > 0) {
      throw new Error(`Unexpected argument: ${flags.positionals[0]}`);
    }

    config = resolveConfig(
      loadConfig({ path: flags.configPath }),
      flags.overrides
    );
  } catch (err) {
    console.error(err instanceof Error ? formatError(err) : String(err));
    return 1;
  }

  const failures = await runRepl({
    input: process.stdin,
    output: process.stdout,
    traceOutput: process.stderr,
    config,
  });
  return failures === 0 ? 0 : 1;
}
