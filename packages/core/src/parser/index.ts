/**
 * Tally Parser
 * Main entry point and re-exports
 */

import type { ExpressionNode } from '../ast-nodes.js';
import { tokenize } from '../lexer/index.js';
import type { Token } from '../token-types.js';
import { Parser } from './parser.js';
import type { ParserOptions } from './state.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-operators.js';
import './parser-functions.js';
import './parser-grouping.js';
import './parser-access.js';

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse a classified token stream into an AST.
 *
 * Throws ParseError on the first error; never returns a partial tree.
 * The token array is copied, not consumed.
 *
 * @example
 * ```typescript
 * const ast = parse([
 *   { category: 'numeric', value: 1 },
 *   { category: 'operator', value: 'add' },
 *   { category: 'identifier', value: 'x' },
 * ]);
 * ```
 */
export function parse(
  tokens: readonly Token[],
  options: ParserOptions = {}
): ExpressionNode {
  return new Parser(tokens, options).parse();
}

/**
 * Tokenize and parse expression source text.
 *
 * Throws LexerError for unreadable text and ParseError for malformed
 * expressions.
 */
export function parseExpression(
  source: string,
  options: ParserOptions = {}
): ExpressionNode {
  return parse(tokenize(source), options);
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { CaseParser, type CaseParserHost } from './case-parser.js';
export {
  createParserState,
  type FunctionLookup,
  type ParserObservability,
  type ParserOptions,
  type ParserState,
  type ReduceEvent,
  type TokenEvent,
} from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';
