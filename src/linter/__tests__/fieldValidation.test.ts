import { describe, it, expect } from '@jest/globals';
import { decideField, FIELD_DECISION_TABLE, relateGeneralField } from '../fieldValidation.js';

describe('field decision table', () => {
  it('should cover ten situations', () => {
    expect(FIELD_DECISION_TABLE).toHaveLength(10);
  });

  it('should require a field where the platform demands one', () => {
    expect(decideField({ required: true, inString: false, general: 'none' })).toEqual({
      kind: 'error',
      key: 'FIELD_MISSING',
      correction: 'default',
    });
  });

  it('should apply the default field with a warning where fields are optional', () => {
    expect(decideField({ required: false, inString: false, general: 'none' })).toEqual({
      kind: 'warning',
      key: 'FIELD_IMPLICIT',
      apply: 'default',
    });
  });

  it('should take the general field when the string has none', () => {
    expect(decideField({ required: true, inString: false, general: 'set' })).toEqual({
      kind: 'warning',
      key: 'FIELD_EXTRACTED',
      apply: 'general',
    });
  });

  it('should keep the string field on a contradiction', () => {
    expect(decideField({ required: false, inString: true, general: 'contradictory' })).toEqual({
      kind: 'error',
      key: 'FIELD_CONTRADICTION',
      correction: 'keep-string',
    });
  });

  it('should reject situations the table does not describe', () => {
    expect(() => decideField({ required: true, inString: false, general: 'equal' })).toThrow(
      'Unrecognized field situation: required=true, inString=false, general=equal'
    );
  });

  describe('relateGeneralField', () => {
    it('should report no general field', () => {
      expect(relateGeneralField(null, ['Title'])).toBe('none');
    });

    it('should report a general field without a string field', () => {
      expect(relateGeneralField(['Title'], null)).toBe('set');
    });

    it('should compare generic sets regardless of order', () => {
      expect(relateGeneralField(['Title', 'Abstract'], ['Abstract', 'Title'])).toBe('equal');
    });

    it('should treat a combined field against one of its parts as a contradiction', () => {
      expect(relateGeneralField(['Title'], ['Title', 'Abstract'])).toBe('contradictory');
    });
  });
});
