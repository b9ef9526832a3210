/**
 * Query Lexer
 *
 * Splits a raw query string into position-tagged tokens. A lexer is configured
 * with an ordered list of rules (parenthesis, logic operator, proximity operator,
 * field, term); at each offset the first rule whose pattern matches wins.
 *
 * @remarks
 * Detection is deliberately broad. Fields are recognized by shape (`XX=` or a
 * bracket suffix such as `[tiab]`) for every platform; whether a field is valid
 * for the platform is decided by the linter. A character no rule accepts becomes
 * an `UNKNOWN` token, which the linter reports as a tokenizing failure.
 *
 * Consecutive terms are merged (`combineSubsequentTerms`) so that unquoted
 * multi-word terms such as `heart attack` form a single term.
 */

import { Span, Token, TokenKind } from '../query/types.js';

export interface LexerRule {
  kind: TokenKind;
  /** Source without anchors; compiled as a sticky expression */
  pattern: string;
  caseInsensitive?: boolean;
}

interface CompiledRule {
  kind: TokenKind;
  regex: RegExp;
}

// ============================================================================
// Shared sub-patterns
// ============================================================================

/** A word-like operator must end at whitespace, a parenthesis or the end of input */
const WORD_END = '(?=[\\s()]|$)';

export const LEXER_PATTERNS = {
  parenOpen: '\\(',
  parenClose: '\\)',
  logicOperator: `(?:AND|OR|NOT)${WORD_END}`,
  equalsField: '[A-Za-z][A-Za-z0-9]+=',
  bracketField: '\\[[^\\[\\]]*\\]',
  term: '"[^"]*"|[^\\s()\\[\\]"]+',
  wordEnd: WORD_END,
} as const;

export class Lexer {
  private readonly rules: CompiledRule[];

  constructor(rules: LexerRule[]) {
    this.rules = rules.map((rule) => ({
      kind: rule.kind,
      regex: new RegExp(rule.pattern, rule.caseInsensitive ? 'yi' : 'y'),
    }));
  }

  tokenize(query: string): Token[] {
    const tokens: Token[] = [];
    let pos = 0;

    while (pos < query.length) {
      if (/\s/.test(query[pos])) {
        pos++;
        continue;
      }

      const token = this.matchAt(query, pos);
      tokens.push(token);
      pos = token.span[1];
    }

    return this.postProcess(combineSubsequentTerms(tokens, query), query);
  }

  /**
   * Hook for platform lexers that reclassify tokens by context.
   */
  protected postProcess(tokens: Token[], _query: string): Token[] {
    return tokens;
  }

  private matchAt(query: string, pos: number): Token {
    for (const rule of this.rules) {
      rule.regex.lastIndex = pos;
      const match = rule.regex.exec(query);
      if (match && match[0].length > 0) {
        return {
          value: match[0],
          kind: rule.kind,
          span: [pos, pos + match[0].length],
        };
      }
    }

    return { value: query[pos], kind: 'UNKNOWN', span: [pos, pos + 1] };
  }
}

/**
 * Merge adjacent TERM tokens into one token spanning all of them. The merged
 * value is the verbatim slice of the query.
 */
export function combineSubsequentTerms(tokens: Token[], query: string): Token[] {
  const combined: Token[] = [];

  for (const token of tokens) {
    const previous = combined[combined.length - 1];
    if (previous && previous.kind === 'TERM' && token.kind === 'TERM') {
      const span: Span = [previous.span[0], token.span[1]];
      combined[combined.length - 1] = {
        value: query.slice(span[0], span[1]),
        kind: 'TERM',
        span,
      };
      continue;
    }
    combined.push(token);
  }

  return combined;
}
