/**
 * Case Sub-Parser
 * CASE [switch] WHEN cond THEN result ... [ELSE result] END
 *
 * Receives the opening CASE token from the driving loop, consumes the rest
 * of the construct from the shared token queue and pushes one Case node.
 */

import type { CaseBranchNode, CaseNode, ExpressionNode } from '../ast-nodes.js';
import { ParseError } from '../error-classes.js';
import type { CaseToken, Token } from '../token-types.js';

/** What the sub-parser needs from the parser that delegates to it */
export interface CaseParserHost {
  /** Shared token queue, consumed from the front */
  readonly input: Token[];
  subParse(tokens: readonly Token[]): ExpressionNode;
}

type SegmentKeyword = 'switch' | 'when' | 'then' | 'else';

interface Segment {
  readonly keyword: SegmentKeyword;
  /** Keyword token that opened the segment */
  readonly token: Token;
  readonly tokens: Token[];
}

const SEGMENT_KEYWORDS = new Map<string, SegmentKeyword>([
  ['when', 'when'],
  ['then', 'then'],
  ['else', 'else'],
]);

const KEYWORD_TEXT = new Map<string, string>([
  ['open', 'CASE'],
  ['close', 'END'],
  ['switch', 'CASE'],
  ['when', 'WHEN'],
  ['then', 'THEN'],
  ['else', 'ELSE'],
]);

function keywordText(value: string): string {
  return KEYWORD_TEXT.get(value) ?? value;
}

export class CaseParser {
  private readonly host: CaseParserHost;

  constructor(host: CaseParserHost) {
    this.host = host;
  }

  parse(token: CaseToken, output: ExpressionNode[]): void {
    if (token.value !== 'open') {
      throw this.malformed(
        `unexpected ${keywordText(token.value)} outside CASE`,
        token
      );
    }

    const { segments, closing } = this.collect(token);
    output.push(this.build(segments, token, closing));
  }

  /**
   * Split the tokens up to the matching END at top-level keywords.
   * Nested CASE ... END pairs stay inside the enclosing segment.
   */
  private collect(opening: CaseToken): {
    segments: Segment[];
    closing: Token;
  } {
    const segments: Segment[] = [];
    let current: Segment = { keyword: 'switch', token: opening, tokens: [] };
    let depth = 0;

    while (true) {
      const token = this.host.input.shift();
      if (token === undefined) {
        throw this.malformed('missing END', opening);
      }

      if (token.category === 'case' && depth === 0 && token.value !== 'open') {
        segments.push(current);
        if (token.value === 'close') return { segments, closing: token };

        const keyword = SEGMENT_KEYWORDS.get(token.value);
        if (keyword === undefined) {
          throw this.malformed(`unknown keyword ${token.value}`, token);
        }
        current = { keyword, token, tokens: [] };
        continue;
      }

      if (token.category === 'case') {
        if (token.value === 'open') depth++;
        if (token.value === 'close') depth--;
      }
      current.tokens.push(token);
    }
  }

  private build(
    segments: Segment[],
    opening: CaseToken,
    closing: Token
  ): CaseNode {
    const [head, ...rest] = segments;
    const switchNode =
      head && head.tokens.length > 0 ? this.host.subParse(head.tokens) : null;
    const branches: CaseBranchNode[] = [];
    let otherwise: ExpressionNode | null = null;

    let i = 0;
    while (i < rest.length) {
      const segment = rest[i];
      if (segment === undefined) break;

      switch (segment.keyword) {
        case 'when': {
          const next = rest[i + 1];
          if (next?.keyword !== 'then') {
            throw this.malformed('WHEN without THEN', segment.token);
          }
          branches.push({
            when: this.parseSegment(segment),
            then: this.parseSegment(next),
          });
          i += 2;
          break;
        }
        case 'else':
          if (branches.length === 0) {
            throw this.malformed('ELSE before WHEN', segment.token);
          }
          if (i !== rest.length - 1) {
            throw this.malformed('ELSE must be the last branch', segment.token);
          }
          otherwise = this.parseSegment(segment);
          i++;
          break;
        case 'then':
        case 'switch':
          throw this.malformed(
            `${keywordText(segment.keyword)} without WHEN`,
            segment.token
          );
      }
    }

    if (branches.length === 0) {
      throw this.malformed('missing WHEN', opening);
    }

    return {
      type: 'Case',
      resultType: 'unknown',
      switch: switchNode,
      branches,
      else: otherwise,
      span:
        opening.span && closing.span
          ? { start: opening.span.start, end: closing.span.end }
          : undefined,
    };
  }

  private parseSegment(segment: Segment): ExpressionNode {
    if (segment.tokens.length === 0) {
      throw this.malformed(
        `empty ${keywordText(segment.keyword)} expression`,
        segment.token
      );
    }
    return this.host.subParse(segment.tokens);
  }

  private malformed(reason: string, token: Token): ParseError {
    return new ParseError(
      { kind: 'malformed_case', reason },
      token.span?.start
    );
  }
}
