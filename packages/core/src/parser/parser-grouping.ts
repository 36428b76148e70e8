/**
 * Parser Extension: Grouping
 * Parentheses, argument lists and argument separators
 */

import { Parser } from './parser.js';
import { GROUP_MARKER } from '../reducers.js';
import type { GroupingToken } from '../token-types.js';
import { isMarker, topReducer } from './state.js';

declare module './parser.js' {
  interface Parser {
    parseGrouping(token: GroupingToken): void;
    drainToMarker(): void;
  }
}

/**
 * Reduce until the top of the operator stack is a marker or the stack is
 * empty. The marker itself stays.
 */
Parser.prototype.drainToMarker = function (this: Parser): void {
  let top = topReducer(this.state);
  while (top !== undefined && !isMarker(top)) {
    this.consume();
    top = topReducer(this.state);
  }
};

Parser.prototype.parseGrouping = function (
  this: Parser,
  token: GroupingToken
): void {
  const { input, operations, arities } = this.state;

  switch (token.value) {
    case 'open': {
      // f() : the only place the parser looks past the current token
      const next = input[0];
      if (next?.category === 'grouping' && next.value === 'close') {
        input.shift();
        arities.pop();
        this.consume(0);
        return;
      }
      operations.push(GROUP_MARKER);
      return;
    }

    case 'close': {
      this.drainToMarker();

      const marker = operations.pop();
      if (marker?.type !== 'GroupMarker') {
        throw this.error({ kind: 'unbalanced_parenthesis' });
      }

      if (topReducer(this.state)?.type === 'FunctionCall') {
        // The last argument is not followed by a comma, hence + 1
        const commas = arities.pop() ?? 0;
        this.consume(commas + 1);
      }
      return;
    }

    case 'comma': {
      const last = arities.length - 1;
      if (last >= 0) {
        arities[last] = (arities[last] ?? 0) + 1;
      }
      this.drainToMarker();
      return;
    }

    default:
      throw this.error({ kind: 'unknown_grouping_token', token: token.value });
  }
};
