/**
 * Parser Extension: Function Calls
 * Opens a call; its argument list is closed by the grouping handler
 */

import { Parser } from './parser.js';
import type { FunctionToken } from '../token-types.js';

declare module './parser.js' {
  interface Parser {
    parseFunction(token: FunctionToken): void;
  }
}

Parser.prototype.parseFunction = function (
  this: Parser,
  token: FunctionToken
): void {
  const fn = this.functionRegistry.get(token.value);
  if (fn === undefined) {
    throw this.error({ kind: 'undefined_function', name: token.value });
  }

  // Commas seen so far for this call
  this.state.arities.push(0);
  this.state.operations.push({ type: 'FunctionCall', fn });
};
