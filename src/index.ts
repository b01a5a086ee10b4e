/**
 * arithmo Module
 * Exports lexer, parser, runtime, printer, configuration and AST types
 */

export {
  createLexerState,
  LexerError,
  nextToken,
  tokenize,
  type LexerState,
} from './lexer/index.js';
export {
  createParserState,
  parse,
  Parser,
  parseTokens,
  type ParserState,
} from './parser/index.js';
export {
  calculate,
  createEvalContext,
  evaluate,
  Evaluator,
  toInteger,
  type CalculateOptions,
  type CalculationFailure,
  type CalculationPhase,
  type CalculationResult,
  type CalculationSuccess,
  type ErrorEvent,
  type EvalContext,
  type EvaluateEvent,
  type EvaluateOptions,
  type ObservabilityCallbacks,
  type ParseEvent,
  type TokenizeEvent,
} from './runtime/index.js';
export { formatExpression, formatNumber, renderTree } from './printer/index.js';
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  parseConfig,
  resolveConfig,
  validateConfig,
  type ArithConfig,
  type ConfigOverrides,
  type LoadConfigOptions,
} from './config.js';
export * from './types.js';
