import type { OperatorSymbol, SourceSpan } from './token-types.js';

/**
 * Result type a node is known to produce without evaluation.
 * 'unknown' covers identifiers, calls to functions of unknown return type,
 * access and case expressions.
 */
export type ResultType =
  | 'numeric'
  | 'logical'
  | 'string'
  | 'datetime'
  | 'null'
  | 'unknown';

interface BaseNode {
  readonly resultType: ResultType;
  /** Span of the source text covered, when the tokens carried spans */
  readonly span?: SourceSpan | undefined;
}

// ============================================================
// LEAVES
// ============================================================

/** Empty expression; also the result of parsing an empty token stream */
export interface NilNode extends BaseNode {
  readonly type: 'Nil';
  readonly resultType: 'null';
}

export interface NumericNode extends BaseNode {
  readonly type: 'Numeric';
  readonly resultType: 'numeric';
  readonly value: number;
}

export interface LogicalNode extends BaseNode {
  readonly type: 'Logical';
  readonly resultType: 'logical';
  readonly value: boolean;
}

export interface StringNode extends BaseNode {
  readonly type: 'String';
  readonly resultType: 'string';
  readonly value: string;
}

export interface DateTimeNode extends BaseNode {
  readonly type: 'DateTime';
  readonly resultType: 'datetime';
  /** ISO-8601 text as tokenized */
  readonly value: string;
}

/**
 * Identifier reference.
 * `name` keeps the text as written; `key` is what name resolution compares
 * (lower-cased unless the parser ran case-sensitive).
 */
export interface IdentifierNode extends BaseNode {
  readonly type: 'Identifier';
  readonly resultType: 'unknown';
  readonly name: string;
  readonly key: string;
  readonly caseSensitive: boolean;
}

export type LeafNode =
  | NilNode
  | NumericNode
  | LogicalNode
  | StringNode
  | DateTimeNode
  | IdentifierNode;

// ============================================================
// OPERATIONS
// ============================================================

/** Binary operator application: left op right */
export interface OperationNode extends BaseNode {
  readonly type: 'Operation';
  readonly operator: Exclude<OperatorSymbol, 'negate'>;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

/** Unary minus */
export interface NegationNode extends BaseNode {
  readonly type: 'Negation';
  readonly resultType: 'numeric' | 'unknown';
  readonly operand: ExpressionNode;
}

/** Function call with its arguments in source order */
export interface FunctionNode extends BaseNode {
  readonly type: 'Function';
  /** Registry name (canonical casing) */
  readonly name: string;
  readonly args: ExpressionNode[];
}

/** Indexed access: container[index] */
export interface AccessNode extends BaseNode {
  readonly type: 'Access';
  readonly resultType: 'unknown';
  readonly container: ExpressionNode;
  readonly index: ExpressionNode;
}

// ============================================================
// CASE
// ============================================================

export interface CaseBranchNode {
  readonly when: ExpressionNode;
  readonly then: ExpressionNode;
}

/**
 * CASE [switch] WHEN cond THEN result ... [ELSE result] END
 * Without a switch expression each WHEN is a condition on its own.
 */
export interface CaseNode extends BaseNode {
  readonly type: 'Case';
  readonly resultType: 'unknown';
  readonly switch: ExpressionNode | null;
  readonly branches: CaseBranchNode[];
  readonly else: ExpressionNode | null;
}

export type ExpressionNode =
  | LeafNode
  | OperationNode
  | NegationNode
  | FunctionNode
  | AccessNode
  | CaseNode;

export type NodeType = ExpressionNode['type'];
