import { LEXER_PATTERNS, LexerRule } from '../../lexer/Lexer.js';
import { FieldMap } from '../../translator/FieldMap.js';
import { PlatformSyntax, PREFIX_FIELD_TRANSITIONS, PROXIMITY_FIRST_PRECEDENCE } from '../PlatformSyntax.js';
import fields from './fields.json';

/** Field codes are two capital letters followed by whitespace: `TI diabetes` */
export const EBSCO_FIELD_CODE = /^[A-Z]{2}$/;

export const EBSCO_LEXER_RULES: LexerRule[] = [
  { kind: 'PAREN_OPEN', pattern: LEXER_PATTERNS.parenOpen },
  { kind: 'PAREN_CLOSE', pattern: LEXER_PATTERNS.parenClose },
  { kind: 'LOGIC_OP', pattern: LEXER_PATTERNS.logicOperator, caseInsensitive: true },
  { kind: 'PROXIMITY_OP', pattern: `(?:[NW]\\d+|NEAR/\\d+|WITHIN/\\d+)${LEXER_PATTERNS.wordEnd}`, caseInsensitive: true },
  { kind: 'FIELD', pattern: '[A-Z]{2}(?=\\s)' },
  { kind: 'FIELD', pattern: LEXER_PATTERNS.equalsField },
  { kind: 'FIELD', pattern: LEXER_PATTERNS.bracketField },
  { kind: 'TERM', pattern: LEXER_PATTERNS.term },
];

export const EBSCO_SYNTAX: PlatformSyntax = {
  platform: 'ebsco',
  version: '1',
  label: 'EBSCOHost',
  fields: FieldMap.fromJson(fields, 'ebsco/fields.json'),
  fieldPlacement: 'prefix',
  fieldRequired: false,
  defaultField: null,
  fallbackField: 'TX',
  operatorFields: true,
  precedence: PROXIMITY_FIRST_PRECEDENCE,
  maxNearDistance: null,
  transitions: PREFIX_FIELD_TRANSITIONS,
  // EBSCOHost numbers its search history S1, S2, ...
  listReference: /(?:#|\bS)(\d+)\b/,
};
