/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation, Token } from '../token-types.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isIdentifierStart(ch: string): boolean {
  return isLetter(ch) || ch === '_';
}

/** Dots allow qualified names such as order.total */
export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch) || ch === '.';
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

type Unspanned<T> = T extends Token ? Omit<T, 'raw' | 'span'> : never;

/** Attach raw text and span to a classified token */
export function makeToken(
  token: Unspanned<Token>,
  raw: string,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { ...token, raw, span: { start, end } };
}

/**
 * Whether a '-' after this token is a unary minus.
 * True at the start of input and after anything that cannot end an operand.
 */
export function expectsOperand(previous: Token | undefined): boolean {
  if (previous === undefined) return true;
  switch (previous.category) {
    case 'operator':
    case 'comparator':
    case 'combinator':
      return true;
    case 'case':
      return previous.value !== 'close';
    case 'grouping':
      return previous.value === 'open' || previous.value === 'comma';
    case 'access':
      return previous.value === 'lbracket';
    default:
      return false;
  }
}
