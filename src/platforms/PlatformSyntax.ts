import { OperatorKind, Platform, TokenKind } from '../query/types.js';
import { FieldMap } from '../translator/FieldMap.js';

/** Token kinds allowed to follow each kind; `START` and `END` mark the query edges */
export type TokenTransitions = Record<TokenKind | 'START', ReadonlyArray<TokenKind | 'END'>>;

/**
 * Declarative description of one platform syntax version. Parsers, linters,
 * translators and serializers read their platform rules from here.
 */
export interface PlatformSyntax {
  platform: Platform;
  version: string;
  /** Display name used in messages */
  label: string;
  fields: FieldMap;
  /** Where the field token sits relative to its term or group */
  fieldPlacement: 'prefix' | 'suffix';
  /** Whether every term must be restricted to a field */
  fieldRequired: boolean;
  /** Field applied when a term has none, null when the platform searches its own default set */
  defaultField: string | null;
  /** Replacement for generic fields the platform cannot express */
  fallbackField: string;
  /** Whether a parenthesized group may carry a field (`TI=(a OR b)`) */
  operatorFields: boolean;
  /** Binding strength per operator; higher binds tighter */
  precedence: Record<OperatorKind, number>;
  maxNearDistance: number | null;
  transitions: TokenTransitions;
  /** Line reference in list queries; the first group is the line number */
  listReference: RegExp;
}

export const DEFAULT_PRECEDENCE: Record<OperatorKind, number> = {
  NOT: 2,
  AND: 1,
  NEAR: 1,
  OR: 0,
};

export const PROXIMITY_FIRST_PRECEDENCE: Record<OperatorKind, number> = {
  NEAR: 3,
  NOT: 2,
  AND: 1,
  OR: 0,
};

/** Prefix-field platforms: a field precedes its term or its group */
export const PREFIX_FIELD_TRANSITIONS: TokenTransitions = {
  START: ['PAREN_OPEN', 'TERM', 'FIELD'],
  PAREN_OPEN: ['PAREN_OPEN', 'TERM', 'FIELD'],
  PAREN_CLOSE: ['PAREN_CLOSE', 'LOGIC_OP', 'PROXIMITY_OP', 'END'],
  LOGIC_OP: ['PAREN_OPEN', 'TERM', 'FIELD'],
  PROXIMITY_OP: ['PAREN_OPEN', 'TERM', 'FIELD'],
  FIELD: ['TERM', 'PAREN_OPEN'],
  TERM: ['PAREN_CLOSE', 'LOGIC_OP', 'PROXIMITY_OP', 'END'],
  UNKNOWN: [],
};

/** Render a field token next to a value the way the platform writes it */
export function attachField(syntax: PlatformSyntax, field: string, content: string): string {
  if (syntax.fieldPlacement === 'suffix') {
    return `${content}${field}`;
  }
  return field.endsWith('=') ? `${field}${content}` : `${field} ${content}`;
}
