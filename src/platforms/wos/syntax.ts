import { LEXER_PATTERNS, LexerRule } from '../../lexer/Lexer.js';
import { FieldMap } from '../../translator/FieldMap.js';
import {
  PlatformSyntax,
  PREFIX_FIELD_TRANSITIONS,
  PROXIMITY_FIRST_PRECEDENCE,
} from '../PlatformSyntax.js';
import fields from './fields.json';
import legacyFields from './fields.v0.json';

export const WOS_MAX_NEAR_DISTANCE = 15;

export const WOS_LEXER_RULES: LexerRule[] = [
  { kind: 'PAREN_OPEN', pattern: LEXER_PATTERNS.parenOpen },
  { kind: 'PAREN_CLOSE', pattern: LEXER_PATTERNS.parenClose },
  { kind: 'LOGIC_OP', pattern: LEXER_PATTERNS.logicOperator, caseInsensitive: true },
  { kind: 'PROXIMITY_OP', pattern: `NEAR(?:/\\d+)?${LEXER_PATTERNS.wordEnd}`, caseInsensitive: true },
  { kind: 'FIELD', pattern: LEXER_PATTERNS.equalsField },
  { kind: 'FIELD', pattern: LEXER_PATTERNS.bracketField },
  { kind: 'TERM', pattern: LEXER_PATTERNS.term },
];

/** Current Web of Science syntax */
export const WOS_SYNTAX: PlatformSyntax = {
  platform: 'wos',
  version: '1',
  label: 'Web of Science',
  fields: FieldMap.fromJson(fields, 'wos/fields.json'),
  fieldPlacement: 'prefix',
  fieldRequired: true,
  defaultField: 'TS=',
  fallbackField: 'ALL=',
  operatorFields: true,
  precedence: PROXIMITY_FIRST_PRECEDENCE,
  maxNearDistance: WOS_MAX_NEAR_DISTANCE,
  transitions: PREFIX_FIELD_TRANSITIONS,
  listReference: /#(\d+)\b/,
};

/** Syntax accepting the field tags Web of Science has since retired (`DI=`, `DE=`, `PU=`, ...) */
export const WOS_V0_SYNTAX: PlatformSyntax = {
  ...WOS_SYNTAX,
  version: '0',
  label: 'Web of Science (legacy tags)',
  fields: FieldMap.fromJson(legacyFields, 'wos/fields.v0.json'),
};
