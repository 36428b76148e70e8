// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// TOKEN CATEGORIES
// ============================================================

export const TOKEN_CATEGORIES = [
  'datetime',
  'numeric',
  'logical',
  'string',
  'null',
  'identifier',
  'operator',
  'comparator',
  'combinator',
  'function',
  'case',
  'access',
  'grouping',
] as const;

export type TokenCategory = (typeof TOKEN_CATEGORIES)[number];

// ============================================================
// TOKEN VALUES
// ============================================================

export type OperatorValue =
  | 'add'
  | 'subtract'
  | 'multiply'
  | 'divide'
  | 'pow'
  | 'negate'
  | 'mod'
  | 'bitor'
  | 'bitand';

export type ComparatorValue = 'lt' | 'gt' | 'le' | 'ge' | 'ne' | 'eq';

export type CombinatorValue = 'and' | 'or';

/** Every symbol that resolves to an Operator reducer */
export type OperatorSymbol = OperatorValue | ComparatorValue | CombinatorValue;

export type GroupingValue = 'open' | 'close' | 'comma';

export type AccessValue = 'lbracket' | 'rbracket';

export type CaseValue = 'open' | 'when' | 'then' | 'else' | 'close';

// ============================================================
// TOKENS
// ============================================================

interface BaseToken {
  /** Source text the token was read from (absent for hand-built tokens) */
  readonly raw?: string | undefined;
  readonly span?: SourceSpan | undefined;
}

export interface DateTimeToken extends BaseToken {
  readonly category: 'datetime';
  /** ISO-8601 date or date-time */
  readonly value: string;
}

export interface NumericToken extends BaseToken {
  readonly category: 'numeric';
  readonly value: number;
}

export interface LogicalToken extends BaseToken {
  readonly category: 'logical';
  readonly value: boolean;
}

export interface StringToken extends BaseToken {
  readonly category: 'string';
  readonly value: string;
}

export interface NullToken extends BaseToken {
  readonly category: 'null';
  readonly value: null;
}

export interface IdentifierToken extends BaseToken {
  readonly category: 'identifier';
  readonly value: string;
}

export interface OperatorToken extends BaseToken {
  readonly category: 'operator';
  readonly value: OperatorValue;
}

export interface ComparatorToken extends BaseToken {
  readonly category: 'comparator';
  readonly value: ComparatorValue;
}

export interface CombinatorToken extends BaseToken {
  readonly category: 'combinator';
  readonly value: CombinatorValue;
}

export interface FunctionToken extends BaseToken {
  readonly category: 'function';
  /** Function name as written */
  readonly value: string;
}

/**
 * Structural tokens keep `value` as a plain string: streams built by hand
 * may carry values outside the known set, which the parser reports.
 */
export interface CaseToken extends BaseToken {
  readonly category: 'case';
  readonly value: CaseValue | (string & {});
}

export interface AccessToken extends BaseToken {
  readonly category: 'access';
  readonly value: AccessValue | (string & {});
}

export interface GroupingToken extends BaseToken {
  readonly category: 'grouping';
  readonly value: GroupingValue | (string & {});
}

export type Token =
  | DateTimeToken
  | NumericToken
  | LogicalToken
  | StringToken
  | NullToken
  | IdentifierToken
  | OperatorToken
  | ComparatorToken
  | CombinatorToken
  | FunctionToken
  | CaseToken
  | AccessToken
  | GroupingToken;

export function isTokenCategory(value: unknown): value is TokenCategory {
  return (
    typeof value === 'string' &&
    TOKEN_CATEGORIES.some((category) => category === value)
  );
}

/** Short printable form of a token, used by traces and error context */
export function describeToken(token: Token): string {
  if (token.raw !== undefined) return token.raw;
  return `${token.category}:${String(token.value)}`;
}
