/**
 * Parser Extension: Access
 * container[index]
 */

import { Parser } from './parser.js';
import { ACCESS_MARKER } from '../reducers.js';
import type { AccessToken } from '../token-types.js';
import { topReducer } from './state.js';

declare module './parser.js' {
  interface Parser {
    parseAccess(token: AccessToken): void;
  }
}

Parser.prototype.parseAccess = function (
  this: Parser,
  token: AccessToken
): void {
  switch (token.value) {
    case 'lbracket':
      this.state.operations.push(ACCESS_MARKER);
      return;

    case 'rbracket':
      this.drainToMarker();
      if (topReducer(this.state)?.type !== 'AccessMarker') {
        throw this.error({ kind: 'unbalanced_bracket' });
      }
      // Reduces the marker with the container and the index
      this.consume(2, true);
      return;

    default:
      throw this.error({ kind: 'unknown_access_token', token: token.value });
  }
};
