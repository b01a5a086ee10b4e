/**
 * arithmo CLI Tests: interactive prompt
 */

import { Readable, Writable } from 'node:stream';
import { describe, expect, it } from 'vitest';
import { runRepl } from '../../src/cli-repl.js';
import {
  createDefaultConfig,
  parse,
  renderTree,
  type ArithConfig,
} from '../../src/index.js';

/** Writable stream that records everything written to it */
function collector(): { stream: Writable; text: () => string } {
  let data = '';
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      data += String(chunk);
      callback();
    },
  });
  return { stream, text: () => data };
}

async function session(
  input: string,
  overrides: Partial<ArithConfig> = {}
): Promise<{ failures: number; output: string; trace: string }> {
  const output = collector();
  const trace = collector();
  const failures = await runRepl({
    input: Readable.from([input]),
    output: output.stream,
    traceOutput: trace.stream,
    config: { ...createDefaultConfig(), ...overrides },
  });
  return { failures, output: output.text(), trace: trace.text() };
}

describe('arithmo REPL', () => {
  it('evaluates each line until end of input', async () => {
    const { failures, output } = await session('2+3\n4*5\n');
    expect(output).toBe('in> out> 5\nin> out> 20\nin> ');
    expect(failures).toBe(0);
  });

  it('evaluates a final line without a newline', async () => {
    const { output } = await session('5');
    expect(output).toBe('in> out> 5\nin> ');
  });

  it('trims input lines', async () => {
    const { output } = await session('  3 + 4  \n');
    expect(output).toBe('in> out> 7\nin> ');
  });

  it('stops at an exit keyword', async () => {
    const { output } = await session('1+1\nexit\n9\n');
    expect(output).toBe('in> out> 2\nin> ');
  });

  it('stops at an empty line', async () => {
    const { output } = await session('1\n\n2\n');
    expect(output).toBe('in> out> 1\nin> ');
  });

  it('reports errors and keeps reading', async () => {
    const { failures, output } = await session('1/0\n2 $\n8\n');
    expect(output).toBe(
      'in> err> Runtime error at column 1: Division by zero\n' +
        "in> err> Lexer error at column 3: Unknown character '$'\n" +
        'in> out> 8\n' +
        'in> '
    );
    expect(failures).toBe(2);
  });

  it('uses configured exit keywords', async () => {
    const { failures, output } = await session('exit\nbye\n', {
      exitKeywords: ['bye'],
    });
    expect(output).toBe(
      "in> err> Lexer error at column 1: Unknown character 'e'\nin> "
    );
    expect(failures).toBe(1);
  });

  it('prints the tree before the result', async () => {
    const { output } = await session('1+2\n', { showTree: true });
    expect(output).toBe(
      `in> ast>\n${renderTree(parse('1+2'))}\nout> 3\nin> `
    );
  });

  it('rejects a long flat chain and keeps reading', async () => {
    const chain = Array<string>(200000).fill('1').join('+');
    const { failures, output } = await session(`${chain}\n2\n`);
    expect(output).toBe(
      'in> err> Parse error at column 512: Expression nesting exceeds maximum depth of 256\n' +
        'in> out> 2\n' +
        'in> '
    );
    expect(failures).toBe(1);
  });

  it('reports integer overflow', async () => {
    const { output } = await session('2^64\n', { mode: 'integer' });
    expect(output).toBe(
      "in> err> Runtime error at column 1: Integer overflow: result of '^' exceeds the safe integer range\nin> "
    );
  });

  it('uses integer arithmetic', async () => {
    const { output } = await session('7/2\n', { mode: 'integer' });
    expect(output).toBe('in> out> 3\nin> ');
  });

  it('writes trace lines to the trace stream', async () => {
    const { output, trace } = await session('2*3\n', { trace: true });
    expect(output).toBe('in> out> 6\nin> ');
    expect(trace).toBe('trace>   2 = 2\ntrace>   3 = 3\ntrace> 2 * 3 = 6\n');
  });
});
