/**
 * Lexer Module
 * Converts source text into classified tokens
 */

export { createLexerState, type LexerState } from './state.js';
export { nextToken, tokenize } from './tokenizer.js';
