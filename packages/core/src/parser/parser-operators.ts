/**
 * Parser Extension: Operators
 * Operators, comparators and combinators share one precedence-climbing handler
 */

import { Parser } from './parser.js';
import { OPERATORS, type OperatorReducer } from '../reducers.js';
import type {
  CombinatorToken,
  ComparatorToken,
  OperatorToken,
} from '../token-types.js';
import { topReducer } from './state.js';

declare module './parser.js' {
  interface Parser {
    parseBinaryOperation(
      token: OperatorToken | ComparatorToken | CombinatorToken
    ): void;
    pendingOperator(): OperatorReducer | null;
  }
}

/**
 * Whether the pending operator must be reduced before the incoming one is
 * pushed. Right-associative operators let an equal-precedence pending
 * operator wait, so `2 ^ 3 ^ 2` groups as `2 ^ (3 ^ 2)`.
 */
function reducesFirst(
  pending: OperatorReducer,
  incoming: OperatorReducer
): boolean {
  if (incoming.associativity === 'right') {
    return pending.precedence > incoming.precedence;
  }
  return pending.precedence >= incoming.precedence;
}

/**
 * Top of the operator stack when it takes part in precedence comparison.
 * Markers and function calls stop the drain.
 */
Parser.prototype.pendingOperator = function (
  this: Parser
): OperatorReducer | null {
  const top = topReducer(this.state);
  return top?.type === 'Operator' ? top : null;
};

Parser.prototype.parseBinaryOperation = function (
  this: Parser,
  token: OperatorToken | ComparatorToken | CombinatorToken
): void {
  const incoming = OPERATORS[token.value];

  let pending = this.pendingOperator();
  while (pending !== null && reducesFirst(pending, incoming)) {
    this.consume();
    pending = this.pendingOperator();
  }

  this.state.operations.push(incoming);
};
