/**
 * Tally Error Classes
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './token-types.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface TallyErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Readonly<Record<string, unknown>> | undefined;
}

function requireDefinition(errorId: string, category: ErrorCategory): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition.messageTemplate;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all Tally errors.
 * Provides structured data for host applications to format as needed.
 */
export class TallyError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Readonly<Record<string, unknown>> | undefined;

  constructor(data: TallyErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'TallyError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): TallyErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: TallyErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// PARSE ERRORS
// ============================================================

/**
 * Why a parse failed. One variant per error kind, each with its own payload.
 * `operator` names the reducer involved: an operator symbol, a function
 * name, or `access`.
 */
export type ParseErrorReason =
  | {
      readonly kind: 'too_few_operands';
      readonly operator: string;
      readonly expect: number;
      readonly actual: number;
    }
  | {
      readonly kind: 'node_invalid';
      readonly operator: string;
      /** Accepted child counts ("2", "1, 2", "at least 1") or result types */
      readonly expect: string;
      readonly actual: number | string;
      /** Offending child for type mismatches */
      readonly child?: string | undefined;
    }
  | { readonly kind: 'undefined_function'; readonly name: string }
  | { readonly kind: 'unbalanced_bracket' }
  | { readonly kind: 'unbalanced_parenthesis' }
  | { readonly kind: 'unknown_grouping_token'; readonly token: string }
  | { readonly kind: 'not_implemented_token_category'; readonly category: string }
  | { readonly kind: 'invalid_statement' }
  | { readonly kind: 'malformed_case'; readonly reason: string }
  | { readonly kind: 'unknown_access_token'; readonly token: string };

export type ParseErrorKind = ParseErrorReason['kind'];

export const PARSE_ERROR_IDS: Readonly<Record<ParseErrorKind, string>> = {
  too_few_operands: 'TALLY-P001',
  node_invalid: 'TALLY-P002',
  undefined_function: 'TALLY-P003',
  unbalanced_bracket: 'TALLY-P004',
  unbalanced_parenthesis: 'TALLY-P005',
  unknown_grouping_token: 'TALLY-P006',
  not_implemented_token_category: 'TALLY-P007',
  invalid_statement: 'TALLY-P008',
  malformed_case: 'TALLY-P009',
  unknown_access_token: 'TALLY-P010',
};

/** Parse-time errors */
export class ParseError extends TallyError {
  readonly reason: ParseErrorReason;

  constructor(reason: ParseErrorReason, location?: SourceLocation) {
    const errorId = PARSE_ERROR_IDS[reason.kind];
    const template = requireDefinition(errorId, 'parse');
    super({
      errorId,
      message: renderMessage(template, reason),
      location,
      context: reason,
    });
    this.name = 'ParseError';
    this.reason = reason;
  }

  get kind(): ParseErrorKind {
    return this.reason.kind;
  }
}

// ============================================================
// LEXER ERRORS
// ============================================================

export type LexerErrorReason =
  | { readonly kind: 'unexpected_character'; readonly char: string }
  | { readonly kind: 'unterminated_string' };

export type LexerErrorKind = LexerErrorReason['kind'];

export const LEXER_ERROR_IDS: Readonly<Record<LexerErrorKind, string>> = {
  unexpected_character: 'TALLY-L001',
  unterminated_string: 'TALLY-L002',
};

export class LexerError extends TallyError {
  // Lexer errors always have a location
  override readonly location: SourceLocation;
  readonly reason: LexerErrorReason;

  constructor(reason: LexerErrorReason, location: SourceLocation) {
    const errorId = LEXER_ERROR_IDS[reason.kind];
    const template = requireDefinition(errorId, 'lexer');
    super({
      errorId,
      message: renderMessage(template, reason),
      location,
      context: reason,
    });
    this.name = 'LexerError';
    this.location = location;
    this.reason = reason;
  }

  get kind(): LexerErrorKind {
    return this.reason.kind;
  }
}
