import { LEXER_PATTERNS, LexerRule } from '../../lexer/Lexer.js';
import { OperatorNode, SearchField } from '../../query/types.js';
import { FieldMap } from '../../translator/FieldMap.js';
import { DEFAULT_PRECEDENCE, PlatformSyntax } from '../PlatformSyntax.js';
import fields from './fields.json';

/** `"a b"[tiab:~3]`: the field and the maximum word distance */
export const PROXIMITY_FIELD = /^\[(.+):~(.*)\]$/;

/** Fields PubMed accepts a proximity distance for */
export const PROXIMITY_FIELDS: readonly string[] = ['[ti]', '[tiab]', '[ad]'];

export const PUBMED_LEXER_RULES: LexerRule[] = [
  { kind: 'PAREN_OPEN', pattern: LEXER_PATTERNS.parenOpen },
  { kind: 'PAREN_CLOSE', pattern: LEXER_PATTERNS.parenClose },
  { kind: 'LOGIC_OP', pattern: LEXER_PATTERNS.logicOperator, caseInsensitive: true },
  { kind: 'FIELD', pattern: LEXER_PATTERNS.bracketField },
  { kind: 'FIELD', pattern: LEXER_PATTERNS.equalsField },
  { kind: 'TERM', pattern: LEXER_PATTERNS.term },
];

export const PUBMED_SYNTAX: PlatformSyntax = {
  platform: 'pubmed',
  version: '1',
  label: 'PubMed',
  fields: FieldMap.fromJson(fields, 'pubmed/fields.json'),
  fieldPlacement: 'suffix',
  fieldRequired: false,
  defaultField: '[all]',
  fallbackField: '[all]',
  operatorFields: false,
  precedence: DEFAULT_PRECEDENCE,
  maxNearDistance: null,
  transitions: {
    START: ['PAREN_OPEN', 'TERM'],
    PAREN_OPEN: ['PAREN_OPEN', 'TERM'],
    PAREN_CLOSE: ['PAREN_CLOSE', 'LOGIC_OP', 'END'],
    LOGIC_OP: ['PAREN_OPEN', 'TERM'],
    PROXIMITY_OP: [],
    FIELD: ['PAREN_CLOSE', 'LOGIC_OP', 'END'],
    TERM: ['FIELD', 'PAREN_CLOSE', 'LOGIC_OP', 'END'],
    UNKNOWN: [],
  },
  listReference: /#(\d+)\b/,
};

/** Unquoted words of a term value, `"a b"` gives `a` and `b` */
export function phraseWords(value: string): string[] {
  return value.replace(/"/g, ' ').split(/\s+/).filter((word) => word !== '');
}

/**
 * Field of a NEAR node PubMed can write as `"a b"[field:~n]`: every child is a
 * single-word term under the same proximity field. Null otherwise.
 */
export function phraseProximityField(node: OperatorNode, inherited: SearchField | null = null): SearchField | null {
  if (node.operator !== 'NEAR') {
    return null;
  }

  let shared: SearchField | null = null;
  for (const child of node.children) {
    if (child.type !== 'term' || phraseWords(child.value).length !== 1) {
      return null;
    }
    const field = child.field ?? node.field ?? inherited;
    if (field === null || !PROXIMITY_FIELDS.includes(field.raw)) {
      return null;
    }
    if (shared !== null && shared.raw !== field.raw) {
      return null;
    }
    shared = field;
  }
  return shared;
}
