/**
 * Tokenizer
 * Main tokenization logic
 */

import { LexerError } from '../error-classes.js';
import type { Token } from '../token-types.js';
import {
  expectsOperand,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import {
  type OperatorText,
  SINGLE_CHAR_OPERATORS,
  SYMBOLS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
import { readNumberOrDate, readString, readWord } from './readers.js';
import {
  atEnd,
  charAt,
  createLexerState,
  type LexerState,
  location,
  take,
  takeWhile,
} from './state.js';

function findOperator(state: LexerState): OperatorText | undefined {
  const two = charAt(state) + charAt(state, 1);
  const double = TWO_CHAR_OPERATORS.find((op) => op === two);
  if (double !== undefined) return double;
  return SINGLE_CHAR_OPERATORS.find((op) => op === charAt(state));
}

/**
 * Read the next token, or null at end of input.
 * `previous` decides whether '-' is a subtraction or a negation.
 */
export function nextToken(
  state: LexerState,
  previous?: Token
): Token | null {
  takeWhile(state, isWhitespace);
  if (atEnd(state)) return null;

  const start = location(state);
  const ch = charAt(state);

  if (isDigit(ch) || (ch === '.' && isDigit(charAt(state, 1)))) {
    return readNumberOrDate(state);
  }

  if (ch === '"' || ch === "'") {
    return readString(state);
  }

  if (isIdentifierStart(ch)) {
    return readWord(state);
  }

  const op = findOperator(state);
  if (op === undefined) {
    throw new LexerError({ kind: 'unexpected_character', char: ch }, start);
  }
  take(state, op.length);
  const end = location(state);

  if (op === '-' && expectsOperand(previous)) {
    return makeToken({ category: 'operator', value: 'negate' }, op, start, end);
  }
  return makeToken(SYMBOLS[op], op, start, end);
}

/**
 * Split expression source into classified tokens.
 *
 * @throws LexerError on characters outside the language or an unterminated
 *   string
 *
 * @example
 * tokenize('price * -2')
 * // numeric/identifier/operator tokens: price, multiply, negate, 2
 */
export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];

  let token = nextToken(state);
  while (token !== null) {
    tokens.push(token);
    token = nextToken(state, token);
  }

  return tokens;
}
