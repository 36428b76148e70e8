/**
 * Lexer State
 * A cursor over expression source. Readers look ahead with `charAt` and
 * `matchAt`, then move the cursor with `take` or `takeWhile`.
 */

import type { SourceLocation } from '../token-types.js';

export interface Cursor {
  line: number;
  column: number;
  offset: number;
}

export interface LexerState {
  readonly source: string;
  /** Location of the next unread character */
  readonly cursor: Cursor;
}

export function createLexerState(source: string): LexerState {
  return { source, cursor: { line: 1, column: 1, offset: 0 } };
}

/** Snapshot of the cursor, safe to keep in a span */
export function location(state: LexerState): SourceLocation {
  const { line, column, offset } = state.cursor;
  return { line, column, offset };
}

/** Character `ahead` places past the cursor; '' past the end */
export function charAt(state: LexerState, ahead = 0): string {
  return state.source.charAt(state.cursor.offset + ahead);
}

export function atEnd(state: LexerState): boolean {
  return state.cursor.offset >= state.source.length;
}

/** Move past `count` characters and return them */
export function take(state: LexerState, count = 1): string {
  const { cursor, source } = state;
  const end = Math.min(cursor.offset + count, source.length);
  const text = source.slice(cursor.offset, end);

  for (let i = 0; i < text.length; i++) {
    if (text.charAt(i) === '\n') {
      cursor.line += 1;
      cursor.column = 1;
    } else {
      cursor.column += 1;
    }
  }
  cursor.offset = end;
  return text;
}

/** Move past the longest run of characters accepted by `accept` */
export function takeWhile(
  state: LexerState,
  accept: (ch: string) => boolean
): string {
  let length = 0;
  while (
    state.cursor.offset + length < state.source.length &&
    accept(charAt(state, length))
  ) {
    length += 1;
  }
  return take(state, length);
}

/** Source text from `start` up to the cursor */
export function textSince(state: LexerState, start: SourceLocation): string {
  return state.source.slice(start.offset, state.cursor.offset);
}

/** Text a sticky pattern matches at the cursor, without moving it */
export function matchAt(state: LexerState, pattern: RegExp): string | null {
  pattern.lastIndex = state.cursor.offset;
  return pattern.exec(state.source)?.[0] ?? null;
}
