/**
 * Runtime Types
 * Evaluation options, observability events and calculation results
 */

import type {
  ArithError,
  ArithmeticMode,
  ExpressionNode,
  ParseOptions,
  Token,
} from '../../types.js';

// ============================================================
// OBSERVABILITY
// ============================================================

/** Pipeline stage that produced an error */
export type CalculationPhase = 'lex' | 'parse' | 'evaluate';

/** Observability callbacks for monitoring a calculation */
export interface ObservabilityCallbacks {
  /** Called after the source is tokenized */
  onTokenize?: (event: TokenizeEvent) => void;
  /** Called after the AST is built */
  onParse?: (event: ParseEvent) => void;
  /** Called after each node is evaluated (post-order) */
  onEvaluate?: (event: EvaluateEvent) => void;
  /** Called when calculate() captures an error */
  onError?: (event: ErrorEvent) => void;
}

export interface TokenizeEvent {
  /** Full token stream, ending with EOF */
  tokens: readonly Token[];
}

export interface ParseEvent {
  ast: ExpressionNode;
}

export interface EvaluateEvent {
  node: ExpressionNode;
  value: number;
  /** Distance from the root node (root = 0) */
  depth: number;
}

export interface ErrorEvent {
  error: ArithError;
  phase: CalculationPhase;
}

// ============================================================
// CONTEXT & OPTIONS
// ============================================================

/** Resolved evaluation settings shared by one evaluator */
export interface EvalContext {
  readonly mode: ArithmeticMode;
  readonly observability: ObservabilityCallbacks;
}

/** Options for creating an evaluation context */
export interface EvaluateOptions {
  /** Default: 'float' */
  mode?: ArithmeticMode;
  observability?: ObservabilityCallbacks;
}

export type CalculateOptions = ParseOptions & EvaluateOptions;

// ============================================================
// RESULTS
// ============================================================

export interface CalculationSuccess {
  readonly success: true;
  readonly value: number;
  readonly ast: ExpressionNode;
  readonly tokens: readonly Token[];
}

export interface CalculationFailure {
  readonly success: false;
  readonly error: ArithError;
  readonly phase: CalculationPhase;
}

/** Outcome of calculate(): the value or the first error encountered */
export type CalculationResult = CalculationSuccess | CalculationFailure;
