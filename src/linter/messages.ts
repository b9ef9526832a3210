import { Span } from '../query/types.js';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export interface MessageDefinition {
  code: string;
  label: string;
  severity: Severity;
  message: string;
}

/**
 * Catalog of linter findings. Codes are stable and namespaced by concern:
 * PARSE (token stream), STRUCT (operators and grouping), FIELD (search fields),
 * QUALITY (style), TERM (term values), LINT (syntax versions), platform
 * prefixes for platform-only rules, TRANSLATE (lossy translation).
 */
export const QUERY_ERROR_CODES = {
  TOKENIZING_FAILED: {
    code: 'PARSE_0001',
    label: 'tokenizing-failed',
    severity: 'FATAL',
    message: 'Fatal error during tokenization',
  },
  UNBALANCED_PARENTHESES: {
    code: 'PARSE_0002',
    label: 'unbalanced-parentheses',
    severity: 'FATAL',
    message: 'Parentheses are unbalanced in the query',
  },
  UNBALANCED_QUOTES: {
    code: 'PARSE_0003',
    label: 'unbalanced-quotes',
    severity: 'FATAL',
    message: 'Quotes are unbalanced in the query',
  },
  INVALID_TOKEN_SEQUENCE: {
    code: 'PARSE_0004',
    label: 'invalid-token-sequence',
    severity: 'FATAL',
    message: 'The sequence of tokens is invalid.',
  },
  INVALID_SYNTAX: {
    code: 'PARSE_0006',
    label: 'invalid-syntax',
    severity: 'FATAL',
    message: 'Query contains invalid syntax',
  },
  LIST_QUERY_MISSING_ROOT_NODE: {
    code: 'PARSE_1001',
    label: 'list-query-missing-root-node',
    severity: 'FATAL',
    message: 'List format query without root node (typically containing operators)',
  },
  LIST_QUERY_INVALID_REFERENCE: {
    code: 'PARSE_1002',
    label: 'list-query-invalid-reference',
    severity: 'FATAL',
    message: 'Invalid list reference in list query',
  },
  IMPLICIT_PRECEDENCE: {
    code: 'STRUCT_0001',
    label: 'implicit-precedence',
    severity: 'WARNING',
    message: 'Operator changed at the same level (explicit parentheses are recommended)',
  },
  OPERATOR_CAPITALIZATION: {
    code: 'STRUCT_0002',
    label: 'operator-capitalization',
    severity: 'WARNING',
    message: 'Operators should be capitalized',
  },
  INVALID_PROXIMITY_USE: {
    code: 'STRUCT_0004',
    label: 'invalid-proximity-use',
    severity: 'ERROR',
    message: 'Invalid use of the proximity operator',
  },
  NESTED_QUERY_WITH_FIELD: {
    code: 'STRUCT_0005',
    label: 'nested-query-with-field',
    severity: 'ERROR',
    message: 'A nested query cannot have a search field',
  },
  NEAR_DISTANCE_TOO_LARGE: {
    code: 'STRUCT_0007',
    label: 'near-distance-too-large',
    severity: 'FATAL',
    message: 'NEAR distance is larger than the platform allows',
  },
  IMPLICIT_NEAR_VALUE: {
    code: 'STRUCT_0008',
    label: 'implicit-near-value',
    severity: 'WARNING',
    message: 'The value of NEAR operator is implicit',
  },
  FIELD_UNSUPPORTED: {
    code: 'FIELD_0001',
    label: 'field-unsupported',
    severity: 'ERROR',
    message: 'Search field is not supported for this database',
  },
  FIELD_MISSING: {
    code: 'FIELD_0002',
    label: 'field-missing',
    severity: 'ERROR',
    message: 'Search field is missing',
  },
  FIELD_EXTRACTED: {
    code: 'FIELD_0003',
    label: 'field-extracted',
    severity: 'WARNING',
    message: 'Recommend explicitly specifying the search field in the string',
  },
  FIELD_IMPLICIT: {
    code: 'FIELD_0004',
    label: 'field-implicit',
    severity: 'WARNING',
    message: 'Search field is implicitly specified',
  },
  FIELD_REDUNDANT: {
    code: 'FIELD_0005',
    label: 'field-redundant',
    severity: 'WARNING',
    message: 'Search field is specified in the string and as general field',
  },
  FIELD_CONTRADICTION: {
    code: 'FIELD_0006',
    label: 'field-contradiction',
    severity: 'ERROR',
    message: 'Search field in the string contradicts the general field',
  },
  DATE_FILTER_IN_SUBQUERY: {
    code: 'QUALITY_0001',
    label: 'date-filter-in-subquery',
    severity: 'WARNING',
    message: 'Date filter in a subquery',
  },
  JOURNAL_FILTER_IN_SUBQUERY: {
    code: 'QUALITY_0002',
    label: 'journal-filter-in-subquery',
    severity: 'WARNING',
    message: 'Journal or publication name filter in a subquery',
  },
  UNNECESSARY_PARENTHESES: {
    code: 'QUALITY_0004',
    label: 'unnecessary-parentheses',
    severity: 'WARNING',
    message: 'Unnecessary parentheses in the query',
  },
  REDUNDANT_TERM: {
    code: 'QUALITY_0005',
    label: 'redundant-term',
    severity: 'WARNING',
    message: 'Redundant term in the query',
  },
  NON_STANDARD_QUOTES: {
    code: 'TERM_0001',
    label: 'non-standard-quotes',
    severity: 'WARNING',
    message: 'Non-standard quotes',
  },
  YEAR_FORMAT_INVALID: {
    code: 'TERM_0002',
    label: 'year-format-invalid',
    severity: 'FATAL',
    message: 'Invalid year format',
  },
  DOI_FORMAT_INVALID: {
    code: 'TERM_0003',
    label: 'doi-format-invalid',
    severity: 'FATAL',
    message: 'Invalid DOI format',
  },
  ISBN_FORMAT_INVALID: {
    code: 'TERM_0004',
    label: 'isbn-format-invalid',
    severity: 'FATAL',
    message: 'Invalid ISBN format',
  },
  INVALID_CHARACTER: {
    code: 'TERM_0005',
    label: 'invalid-character',
    severity: 'ERROR',
    message: 'Search term contains invalid character',
  },
  WILDCARD_STANDALONE: {
    code: 'TERM_0006',
    label: 'wildcard-standalone',
    severity: 'FATAL',
    message: 'Wildcard cannot be used as a standalone character',
  },
  WILDCARD_AFTER_SPECIAL_CHAR: {
    code: 'TERM_0007',
    label: 'wildcard-after-special-char',
    severity: 'FATAL',
    message: 'Wildcard cannot follow a special character',
  },
  WILDCARD_RIGHT_SHORT_LENGTH: {
    code: 'TERM_0008',
    label: 'wildcard-right-short-length',
    severity: 'FATAL',
    message: 'Right-hand wildcard needs at least three characters before it',
  },
  WILDCARD_LEFT_SHORT_LENGTH: {
    code: 'TERM_0009',
    label: 'wildcard-left-short-length',
    severity: 'FATAL',
    message: 'Left-hand wildcard needs at least three characters after it',
  },
  DEPRECATED_SYNTAX: {
    code: 'LINT_2001',
    label: 'deprecated-syntax',
    severity: 'ERROR',
    message: 'Search field tag is deprecated in this syntax version',
  },
  PUBMED_INVALID_WILDCARD_USE: {
    code: 'PUBMED_0003',
    label: 'invalid-wildcard-use',
    severity: 'ERROR',
    message: 'Invalid use of the wildcard operator *',
  },
  WOS_WILDCARD_UNSUPPORTED: {
    code: 'WOS_0001',
    label: 'wildcard-unsupported',
    severity: 'FATAL',
    message: 'Unsupported wildcard in search string',
  },
  EBSCO_WILDCARD_UNSUPPORTED: {
    code: 'EBSCO_0001',
    label: 'wildcard-unsupported',
    severity: 'FATAL',
    message: 'Unsupported wildcard in search string',
  },
  FIELD_SUBSTITUTED: {
    code: 'TRANSLATE_0001',
    label: 'field-substituted',
    severity: 'WARNING',
    message: 'Search field has no exact equivalent on the target platform',
  },
  TERM_DROPPED: {
    code: 'TRANSLATE_0002',
    label: 'term-dropped',
    severity: 'WARNING',
    message: 'Search term was dropped during translation',
  },
  PROXIMITY_DEGRADED: {
    code: 'TRANSLATE_0003',
    label: 'proximity-degraded',
    severity: 'WARNING',
    message: 'Proximity search is not supported here and was replaced by AND',
  },
} as const satisfies Record<string, MessageDefinition>;

export type QueryErrorKey = keyof typeof QUERY_ERROR_CODES;

export interface LinterMessage {
  code: string;
  label: string;
  severity: Severity;
  message: string;
  position: Span;
  details: string;
}

export function createMessage(
  key: QueryErrorKey,
  position: Span,
  details = '',
  severity?: Severity
): LinterMessage {
  const definition: MessageDefinition = QUERY_ERROR_CODES[key];
  return {
    code: definition.code,
    label: definition.label,
    severity: severity ?? definition.severity,
    message: definition.message,
    position,
    details,
  };
}

/**
 * Render a message with a caret pointer under the offending part of the query.
 *
 * ```
 * FATAL PARSE_0002 unbalanced-parentheses: Parentheses are unbalanced in the query
 *   ("a") AND ("b"
 *             ^
 * ```
 */
export function formatMessage(message: LinterMessage, query: string): string {
  const header = `${message.severity} ${message.code} ${message.label}: ${message.message}`;
  const lines = [message.details ? `${header}\n  ${message.details}` : header];

  const [start, end] = message.position;
  if (start >= 0 && query.length > 0) {
    const lineStart = query.lastIndexOf('\n', start - 1) + 1;
    const lineEndIndex = query.indexOf('\n', start);
    const lineEnd = lineEndIndex === -1 ? query.length : lineEndIndex;
    const width = Math.max(1, Math.min(end, lineEnd) - start);
    lines.push(`  ${query.slice(lineStart, lineEnd)}`);
    lines.push(`  ${' '.repeat(start - lineStart)}${'^'.repeat(width)}`);
  }

  return lines.join('\n');
}
