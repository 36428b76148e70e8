/**
 * Test utilities for parser tests
 */

import {
  formatNode,
  LexerError,
  parse,
  parseExpression,
  ParseError,
  type ParserOptions,
  type Token,
} from '../../src/index.js';

/** Parse source text and return the canonical expression text */
export function text(source: string, options: ParserOptions = {}): string {
  return formatNode(parseExpression(source, options));
}

/** Parse and return the ParseError it must raise */
export function parseFailure(
  input: string | readonly Token[],
  options: ParserOptions = {}
): ParseError {
  try {
    if (typeof input === 'string') {
      parseExpression(input, options);
    } else {
      parse(input, options);
    }
  } catch (err) {
    if (err instanceof ParseError) return err;
    throw err;
  }
  throw new Error('Expected parse to fail');
}

/** Run a tokenizer call and return the LexerError it must raise */
export function lexFailure(run: () => unknown): LexerError {
  try {
    run();
  } catch (err) {
    if (err instanceof LexerError) return err;
    throw err;
  }
  throw new Error('Expected tokenize to fail');
}

/** Hand-built tokens without raw text or spans */
export const tok = {
  num: (value: number): Token => ({ category: 'numeric', value }),
  id: (value: string): Token => ({ category: 'identifier', value }),
  fn: (value: string): Token => ({ category: 'function', value }),
  open: { category: 'grouping', value: 'open' } satisfies Token,
  close: { category: 'grouping', value: 'close' } satisfies Token,
  comma: { category: 'grouping', value: 'comma' } satisfies Token,
  lbracket: { category: 'access', value: 'lbracket' } satisfies Token,
  rbracket: { category: 'access', value: 'rbracket' } satisfies Token,
};
