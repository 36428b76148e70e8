/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse';

/**
 * Example demonstrating an error condition.
 * Used in error documentation to show common scenarios.
 */
export interface ErrorExample {
  readonly description: string;
  /** Expression source demonstrating the error */
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: TALLY-{category letter}{3-digit} (e.g., TALLY-P001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      if (idMap.has(def.errorId)) {
        throw new TypeError(`Duplicate error ID: ${def.errorId}`);
      }
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (TALLY-L0xx)
  {
    errorId: 'TALLY-L001',
    category: 'lexer',
    description: 'Unexpected character',
    messageTemplate: 'Unexpected character {char}',
    cause: 'Character is not part of any token of the expression language.',
    resolution:
      'Remove the character or replace it with a supported operator (+ - * / ^ % | & < > = != <> && ||).',
    examples: [{ description: 'Hash sign', code: 'price # 2' }],
  },
  {
    errorId: 'TALLY-L002',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause: 'String opened with a quote but the input ended before it closed.',
    resolution: 'Add the matching closing quote.',
    examples: [{ description: 'Missing closing quote', code: "concat('a" }],
  },

  // Parse Errors (TALLY-P0xx)
  {
    errorId: 'TALLY-P001',
    category: 'parse',
    description: 'Too few operands',
    messageTemplate:
      '{operator} has too few operands (expected {expect}, got {actual})',
    cause:
      'An operator or function was reduced while fewer complete operands were available than it needs.',
    resolution:
      'Supply the missing operand. Common causes: trailing operators and empty arguments.',
    examples: [
      { description: 'Trailing operator', code: '1 +' },
      { description: 'Empty last argument', code: 'max(a,)' },
    ],
  },
  {
    errorId: 'TALLY-P002',
    category: 'parse',
    description: 'Invalid node',
    messageTemplate: '{operator} requires {expect} operands, but got {actual}',
    cause:
      'The operands collected for a node do not match the number or type of children it accepts.',
    resolution:
      'Check the argument count of the function, or the operand types of the operator.',
    examples: [
      { description: 'Wrong argument count', code: 'if(a, b)' },
      { description: 'String operand to arithmetic', code: "'a' * 2" },
    ],
  },
  {
    errorId: 'TALLY-P003',
    category: 'parse',
    description: 'Undefined function',
    messageTemplate: 'Undefined function {name}',
    cause: 'A function call names a function the registry does not define.',
    resolution:
      'Check the spelling, or register the function before parsing.',
    examples: [{ description: 'Unknown function', code: 'median(1, 2, 3)' }],
  },
  {
    errorId: 'TALLY-P004',
    category: 'parse',
    description: 'Unbalanced bracket',
    messageTemplate: 'Unbalanced bracket',
    cause: 'A closing ] has no matching [ or a [ was never closed.',
    resolution: 'Match every [ with a ].',
    examples: [
      { description: 'Unclosed bracket', code: 'prices[1' },
      { description: 'Extra closing bracket', code: 'prices]' },
    ],
  },
  {
    errorId: 'TALLY-P005',
    category: 'parse',
    description: 'Unbalanced parenthesis',
    messageTemplate: 'Unbalanced parenthesis',
    cause: 'A closing ) has no matching ( or a ( was never closed.',
    resolution: 'Match every ( with a ).',
    examples: [
      { description: 'Unclosed parenthesis', code: '(a + b' },
      { description: 'Extra closing parenthesis', code: 'a + b)' },
    ],
  },
  {
    errorId: 'TALLY-P006',
    category: 'parse',
    description: 'Unknown grouping token',
    messageTemplate: 'Unknown grouping token {token}',
    cause:
      'A grouping token carries a value other than open, close or comma.',
    resolution: 'Fix the token producer; grouping values are open, close, comma.',
  },
  {
    errorId: 'TALLY-P007',
    category: 'parse',
    description: 'Token category not supported',
    messageTemplate: 'Not implemented for tokens of category {category}',
    cause: 'The token stream contains a category the parser has no handler for.',
    resolution: 'Fix the token producer.',
  },
  {
    errorId: 'TALLY-P008',
    category: 'parse',
    description: 'Invalid statement',
    messageTemplate: 'Invalid statement',
    cause:
      'The tokens do not reduce to exactly one expression: operands are left over or missing.',
    resolution: 'Join the expressions with an operator or remove the extra ones.',
    examples: [
      { description: 'Two adjacent values', code: '1 2' },
      { description: 'Separated values outside a call', code: '(1, 2)' },
    ],
  },
  {
    errorId: 'TALLY-P009',
    category: 'parse',
    description: 'Malformed case expression',
    messageTemplate: 'Malformed case expression: {reason}',
    cause: 'CASE expression keywords are missing, repeated or out of order.',
    resolution:
      'Write CASE [value] WHEN condition THEN result ... [ELSE result] END.',
    examples: [
      { description: 'Missing END', code: 'CASE x WHEN 1 THEN 2' },
      { description: 'WHEN without THEN', code: 'CASE x WHEN 1 END' },
    ],
  },
  {
    errorId: 'TALLY-P010',
    category: 'parse',
    description: 'Unknown access token',
    messageTemplate: 'Unknown access token {token}',
    cause: 'An access token carries a value other than lbracket or rbracket.',
    resolution: 'Fix the token producer; access values are lbracket, rbracket.',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Undefined function {name}", { name: "median" })
 * // Returns: "Undefined function median"
 */
export function renderMessage(
  template: string,
  context: Readonly<Record<string, unknown>>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        try {
          result += String(value);
        } catch {
          // Objects without a usable toString (e.g. null prototype)
          result += Object.prototype.toString.call(value);
        }
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
