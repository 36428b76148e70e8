/**
 * Parser State
 * The token queue and the three stacks a single parse works on
 */

import type { ExpressionNode } from '../ast-nodes.js';
import type { FunctionDescriptor } from '../functions/registry.js';
import type { Reducer } from '../reducers.js';
import type { Token } from '../token-types.js';

// ============================================================
// OBSERVABILITY
// ============================================================

/** Event emitted before a token is dispatched */
export interface TokenEvent {
  readonly token: Token;
  /** 0 for the top-level parse, +1 per nested CASE segment */
  readonly depth: number;
}

/** Event emitted after a reducer became a node */
export interface ReduceEvent {
  readonly reducer: Reducer;
  readonly operands: readonly ExpressionNode[];
  readonly node: ExpressionNode;
  readonly depth: number;
}

/** Observability callbacks for tracing a parse */
export interface ParserObservability {
  onToken?: ((event: TokenEvent) => void) | undefined;
  onReduce?: ((event: ReduceEvent) => void) | undefined;
}

// ============================================================
// OPTIONS
// ============================================================

/** Anything that resolves function names; FunctionRegistry is the standard one */
export interface FunctionLookup {
  get(name: string): FunctionDescriptor | undefined;
}

export interface ParserOptions {
  /** Pre-seeded operator stack (normally empty) */
  operations?: Reducer[] | undefined;
  /** Pre-seeded arity stack (normally empty) */
  arities?: number[] | undefined;
  /** Defaults to the standard registry, created on first lookup */
  functionRegistry?: FunctionLookup | undefined;
  /** Compare identifiers case-sensitively (default false) */
  caseSensitive?: boolean | undefined;
  observability?: ParserObservability | undefined;
}

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  /** Remaining tokens; consumed from the front */
  readonly input: Token[];
  /** Operand stack of completed nodes */
  readonly output: ExpressionNode[];
  /** Operator stack of pending reducers */
  readonly operations: Reducer[];
  /** Comma count per open function call */
  readonly arities: number[];
  readonly caseSensitive: boolean;
  readonly observability: ParserObservability;
  readonly depth: number;
  /** Token being handled, for error locations; null while draining */
  current: Token | null;
}

export function createParserState(
  tokens: readonly Token[],
  options: ParserOptions = {},
  depth = 0
): ParserState {
  return {
    input: [...tokens],
    output: [],
    operations: [...(options.operations ?? [])],
    arities: [...(options.arities ?? [])],
    caseSensitive: options.caseSensitive ?? false,
    observability: options.observability ?? {},
    depth,
    current: null,
  };
}

/** @internal */
export function topReducer(state: ParserState): Reducer | undefined {
  return state.operations[state.operations.length - 1];
}

/** @internal */
export function isMarker(reducer: Reducer): boolean {
  return reducer.type === 'GroupMarker' || reducer.type === 'AccessMarker';
}
