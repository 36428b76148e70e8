/**
 * Node Construction
 * Builds AST nodes from tokens and from reducers with their operands,
 * checking each node's accepted shape.
 */

import type {
  AccessNode,
  ExpressionNode,
  FunctionNode,
  IdentifierNode,
  LeafNode,
  NegationNode,
  NilNode,
  OperationNode,
  ResultType,
} from '../ast-nodes.js';
import { acceptsArity, describeArity } from '../functions/registry.js';
import type {
  AccessMarker,
  FunctionCallReducer,
  OperatorReducer,
} from '../reducers.js';
import type {
  DateTimeToken,
  IdentifierToken,
  LogicalToken,
  NullToken,
  NumericToken,
  OperatorSymbol,
  SourceSpan,
  StringToken,
} from '../token-types.js';

// ============================================================
// SHAPE ERRORS
// ============================================================

/**
 * Raised when a node rejects the children it was given.
 * The parser translates it into a `node_invalid` ParseError.
 */
export class NodeShapeError extends Error {
  /** Accepted child counts, or accepted result types */
  readonly expect: string;
  readonly actual: number | string;
  readonly child: string | undefined;

  constructor(expect: string, actual: number | string, child?: string) {
    super(
      child === undefined
        ? `expected ${expect} children, got ${actual}`
        : `expected ${expect} ${child} child, got ${actual}`
    );
    this.name = 'NodeShapeError';
    this.expect = expect;
    this.actual = actual;
    this.child = child;
  }
}

/** Reducers that produce a node when reduced */
export type BuildableReducer =
  | OperatorReducer
  | FunctionCallReducer
  | AccessMarker;

// ============================================================
// LEAVES
// ============================================================

export const NIL: NilNode = { type: 'Nil', resultType: 'null' };

export function buildLeaf(
  token: DateTimeToken | NumericToken | LogicalToken | StringToken | NullToken
): LeafNode {
  switch (token.category) {
    case 'datetime':
      return {
        type: 'DateTime',
        resultType: 'datetime',
        value: token.value,
        span: token.span,
      };
    case 'numeric':
      return {
        type: 'Numeric',
        resultType: 'numeric',
        value: token.value,
        span: token.span,
      };
    case 'logical':
      return {
        type: 'Logical',
        resultType: 'logical',
        value: token.value,
        span: token.span,
      };
    case 'string':
      return {
        type: 'String',
        resultType: 'string',
        value: token.value,
        span: token.span,
      };
    case 'null':
      return { ...NIL, span: token.span };
  }
}

export function buildIdentifier(
  token: IdentifierToken,
  caseSensitive: boolean
): IdentifierNode {
  return {
    type: 'Identifier',
    resultType: 'unknown',
    name: token.value,
    key: caseSensitive ? token.value : token.value.toLowerCase(),
    caseSensitive,
    span: token.span,
  };
}

// ============================================================
// OPERAND TYPE RULES
// ============================================================

const NUMERIC: readonly ResultType[] = ['numeric'];
const NUMERIC_OR_DATETIME: readonly ResultType[] = ['numeric', 'datetime'];
const LOGICAL: readonly ResultType[] = ['logical'];

/** Known result types each operator accepts; absent = any type */
const OPERAND_TYPES: Partial<Record<OperatorSymbol, readonly ResultType[]>> = {
  add: NUMERIC_OR_DATETIME,
  subtract: NUMERIC_OR_DATETIME,
  multiply: NUMERIC,
  divide: NUMERIC,
  mod: NUMERIC,
  pow: NUMERIC,
  negate: NUMERIC,
  bitor: NUMERIC,
  bitand: NUMERIC,
  and: LOGICAL,
  or: LOGICAL,
};

const COMPARATORS: ReadonlySet<OperatorSymbol> = new Set<OperatorSymbol>([
  'lt',
  'gt',
  'le',
  'ge',
  'ne',
  'eq',
]);

function checkOperand(
  op: OperatorSymbol,
  operand: ExpressionNode,
  child: string
): void {
  const accepted = OPERAND_TYPES[op];
  if (!accepted || operand.resultType === 'unknown') return;
  if (!accepted.includes(operand.resultType)) {
    throw new NodeShapeError(accepted.join(' or '), operand.resultType, child);
  }
}

function operationResultType(
  op: OperatorSymbol,
  left: ExpressionNode,
  right: ExpressionNode
): ResultType {
  if (COMPARATORS.has(op) || op === 'and' || op === 'or') return 'logical';
  if (left.resultType === 'numeric' && right.resultType === 'numeric') {
    return 'numeric';
  }
  return 'unknown';
}

function spanOf(
  first: ExpressionNode | undefined,
  last: ExpressionNode | undefined
): SourceSpan | undefined {
  if (!first?.span || !last?.span) return undefined;
  return { start: first.span.start, end: last.span.end };
}

// ============================================================
// REDUCTIONS
// ============================================================

function buildOperator(
  reducer: OperatorReducer,
  children: readonly ExpressionNode[]
): OperationNode | NegationNode {
  if (children.length !== reducer.arity) {
    throw new NodeShapeError(String(reducer.arity), children.length);
  }

  const [first, second] = children;

  if (reducer.op === 'negate') {
    if (!first) throw new NodeShapeError('1', 0);
    checkOperand('negate', first, 'operand');
    return {
      type: 'Negation',
      resultType: first.resultType === 'numeric' ? 'numeric' : 'unknown',
      operand: first,
      span: first.span,
    };
  }

  if (!first || !second) throw new NodeShapeError('2', children.length);
  checkOperand(reducer.op, first, 'left');
  checkOperand(reducer.op, second, 'right');

  return {
    type: 'Operation',
    operator: reducer.op,
    resultType: operationResultType(reducer.op, first, second),
    left: first,
    right: second,
    span: spanOf(first, second),
  };
}

function buildFunction(
  reducer: FunctionCallReducer,
  children: readonly ExpressionNode[]
): FunctionNode {
  if (!acceptsArity(reducer.fn, children.length)) {
    throw new NodeShapeError(describeArity(reducer.fn), children.length);
  }
  return {
    type: 'Function',
    name: reducer.fn.name,
    resultType: reducer.fn.resultType,
    args: [...children],
    span: spanOf(children[0], children[children.length - 1]),
  };
}

function buildAccess(children: readonly ExpressionNode[]): AccessNode {
  const [container, index] = children;
  if (children.length !== 2 || !container || !index) {
    throw new NodeShapeError('2', children.length);
  }
  return {
    type: 'Access',
    resultType: 'unknown',
    container,
    index,
    span: spanOf(container, index),
  };
}

/**
 * Build the node a reducer stands for from its operands (left to right).
 * @throws NodeShapeError when the operands do not fit the node
 */
export function buildNode(
  reducer: BuildableReducer,
  children: readonly ExpressionNode[]
): ExpressionNode {
  switch (reducer.type) {
    case 'Operator':
      return buildOperator(reducer, children);
    case 'FunctionCall':
      return buildFunction(reducer, children);
    case 'AccessMarker':
      return buildAccess(children);
  }
}
