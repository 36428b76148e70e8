/**
 * Token Readers
 * Functions to read specific token kinds from source
 */

import { LexerError } from '../error-classes.js';
import type { Token } from '../token-types.js';
import { isIdentifierChar, isWhitespace, makeToken } from './helpers.js';
import { KEYWORDS } from './operators.js';
import {
  atEnd,
  charAt,
  type LexerState,
  location,
  matchAt,
  take,
  takeWhile,
  textSince,
} from './state.js';

const DATETIME_PATTERN =
  /\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?(?![\d.])/y;

const NUMBER_PATTERN = /(?:\d+(?:\.\d+)?|\.\d+)(?:[eE][+-]?\d+)?/y;

/** Datetime literal or number; caller guarantees a digit or '.digit' */
export function readNumberOrDate(state: LexerState): Token {
  const start = location(state);

  const date = matchAt(state, DATETIME_PATTERN);
  if (date !== null) {
    take(state, date.length);
    return makeToken(
      { category: 'datetime', value: date.replace(' ', 'T') },
      date,
      start,
      location(state)
    );
  }

  const number = matchAt(state, NUMBER_PATTERN);
  if (number === null) {
    throw new LexerError(
      { kind: 'unexpected_character', char: charAt(state) },
      start
    );
  }
  take(state, number.length);
  return makeToken(
    { category: 'numeric', value: Number(number) },
    number,
    start,
    location(state)
  );
}

/** Process escape sequence; unknown escapes keep the escaped character */
function processEscape(state: LexerState): string {
  const escaped = take(state);
  switch (escaped) {
    case 'n':
      return '\n';
    case 't':
      return '\t';
    case 'r':
      return '\r';
    default:
      return escaped;
  }
}

export function readString(state: LexerState): Token {
  const start = location(state);
  const quote = take(state);

  let value = '';
  while (!atEnd(state) && charAt(state) !== quote) {
    value += takeWhile(state, (ch) => ch !== quote && ch !== '\\');
    if (charAt(state) === '\\') {
      take(state);
      if (atEnd(state)) break;
      value += processEscape(state);
    }
  }

  if (atEnd(state)) {
    throw new LexerError({ kind: 'unterminated_string' }, start);
  }
  take(state); // closing quote

  return makeToken(
    { category: 'string', value },
    textSince(state, start),
    start,
    location(state)
  );
}

/** Keyword, function name or identifier */
export function readWord(state: LexerState): Token {
  const start = location(state);
  const word = takeWhile(state, isIdentifierChar);
  const end = location(state);

  const keyword = KEYWORDS.get(word.toLowerCase());
  // and( / or( directly followed by a parenthesis are the logic functions
  const isCombinatorCall =
    keyword?.category === 'combinator' && charAt(state) === '(';
  if (keyword !== undefined && !isCombinatorCall) {
    return makeToken(keyword, word, start, end);
  }

  // A name followed by '(' (whitespace allowed) is a call
  let offset = 0;
  while (isWhitespace(charAt(state, offset))) offset++;
  if (charAt(state, offset) === '(') {
    return makeToken({ category: 'function', value: word }, word, start, end);
  }

  return makeToken({ category: 'identifier', value: word }, word, start, end);
}
