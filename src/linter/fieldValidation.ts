/**
 * Search-field decision table.
 *
 * For each term the linter knows whether the platform requires a field, whether
 * the query string gives one (on the term or an enclosing group) and how the
 * separately supplied general field relates to it. The ten recognized
 * combinations map to an outcome here; the linter applies it.
 */

import { QueryErrorKey } from './messages.js';

export type GeneralFieldRelation = 'none' | 'equal' | 'contradictory';

export interface FieldSituation {
  required: boolean;
  inString: boolean;
  /** Relation of the general field to the string field; `equal`/`contradictory` need a string field */
  general: GeneralFieldRelation | 'set';
}

export type FieldOutcome =
  | { kind: 'ok' }
  | { kind: 'warning'; key: QueryErrorKey; apply: 'general' | 'default' | null }
  | { kind: 'error'; key: QueryErrorKey; correction: 'keep-string' | 'default' };

interface FieldRule {
  required: boolean;
  inString: boolean;
  general: FieldSituation['general'];
  outcome: FieldOutcome;
}

export const FIELD_DECISION_TABLE: readonly FieldRule[] = [
  { required: true, inString: true, general: 'none', outcome: { kind: 'ok' } },
  {
    required: true,
    inString: true,
    general: 'equal',
    outcome: { kind: 'warning', key: 'FIELD_REDUNDANT', apply: null },
  },
  {
    required: true,
    inString: true,
    general: 'contradictory',
    outcome: { kind: 'error', key: 'FIELD_CONTRADICTION', correction: 'keep-string' },
  },
  {
    required: true,
    inString: false,
    general: 'set',
    outcome: { kind: 'warning', key: 'FIELD_EXTRACTED', apply: 'general' },
  },
  {
    required: true,
    inString: false,
    general: 'none',
    outcome: { kind: 'error', key: 'FIELD_MISSING', correction: 'default' },
  },
  { required: false, inString: true, general: 'none', outcome: { kind: 'ok' } },
  {
    required: false,
    inString: true,
    general: 'equal',
    outcome: { kind: 'warning', key: 'FIELD_REDUNDANT', apply: null },
  },
  {
    required: false,
    inString: true,
    general: 'contradictory',
    outcome: { kind: 'error', key: 'FIELD_CONTRADICTION', correction: 'keep-string' },
  },
  {
    required: false,
    inString: false,
    general: 'set',
    outcome: { kind: 'warning', key: 'FIELD_EXTRACTED', apply: 'general' },
  },
  {
    required: false,
    inString: false,
    general: 'none',
    outcome: { kind: 'warning', key: 'FIELD_IMPLICIT', apply: 'default' },
  },
];

export function decideField(situation: FieldSituation): FieldOutcome {
  const rule = FIELD_DECISION_TABLE.find(
    (candidate) =>
      candidate.required === situation.required &&
      candidate.inString === situation.inString &&
      candidate.general === situation.general
  );

  if (!rule) {
    throw new Error(
      `Unrecognized field situation: required=${situation.required}, ` +
        `inString=${situation.inString}, general=${situation.general}`
    );
  }
  return rule.outcome;
}

/**
 * Relation between the general field and a string field, both given as generic
 * field sets. `[tiab]` against `Title` is a contradiction: the sets differ.
 */
export function relateGeneralField(
  general: readonly string[] | null,
  inString: readonly string[] | null
): FieldSituation['general'] {
  if (general === null) {
    return 'none';
  }
  if (inString === null) {
    return 'set';
  }
  const sameSize = general.length === inString.length;
  return sameSize && general.every((field) => inString.includes(field)) ? 'equal' : 'contradictory';
}
