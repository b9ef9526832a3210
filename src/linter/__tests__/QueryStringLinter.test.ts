import { describe, it, expect } from '@jest/globals';
import { LinterOptions } from '../QueryStringLinter.js';
import { PubmedParser } from '../../platforms/pubmed/PubmedParser.js';
import { captureSyntaxError, codesOf as codes } from '../../__tests__/helpers.js';

const parse = (query: string, options: LinterOptions = {}) =>
  new PubmedParser(query, { mode: 'lenient', ...options }).parse();

const parseError = (query: string, options: LinterOptions = {}) =>
  captureSyntaxError(() => parse(query, options));

describe('QueryStringLinter', () => {
  describe('token checks', () => {
    it('should report an unmatched opening parenthesis', () => {
      const error = parseError('("a") AND ("b"');

      expect(error.messages).toEqual([
        expect.objectContaining({ code: 'PARSE_0002', position: [10, 11], severity: 'FATAL' }),
      ]);
    });

    it('should report unmatched quotes', () => {
      const error = parseError('"heart attack');

      expect(codes(error.messages)).toContain('PARSE_0003');
    });

    it('should report a query ending with an operator', () => {
      const error = parseError('a AND');

      expect(error.messages).toEqual([
        expect.objectContaining({
          code: 'PARSE_0004',
          position: [2, 5],
          details: 'Query cannot end with operator AND',
        }),
      ]);
    });

    it('should reject an empty query', () => {
      const error = parseError('   ');

      expect(codes(error.messages)).toEqual(['PARSE_0006']);
    });

    it('should capitalize operators with a warning', () => {
      const result = parse('a and b');

      expect(result.messages[0]).toMatchObject({
        code: 'STRUCT_0002',
        position: [2, 5],
        details: 'Write AND instead of and',
      });
      expect(result.tree.root).toMatchObject({ type: 'operator', operator: 'AND' });
    });

    it('should replace typographic quotes', () => {
      const result = parse('“heart attack”');

      expect(result.messages.filter((message) => message.code === 'TERM_0001').map((m) => m.position)).toEqual([
        [0, 1],
        [13, 14],
      ]);
      expect(result.tree.root).toMatchObject({ type: 'term', value: '"heart attack"' });
    });

    it('should flag parentheses around a single term', () => {
      const result = parse('(a) AND b');

      expect(result.messages[0]).toMatchObject({
        code: 'QUALITY_0004',
        position: [0, 3],
        details: 'Parentheses enclose a single term',
      });
    });

    it('should group mixed operators by precedence with a warning', () => {
      const result = parse('"x" OR "y" AND "z"');

      expect(result.messages[0]).toMatchObject({ code: 'STRUCT_0001', position: [4, 14] });
      expect(result.tree.root).toMatchObject({
        operator: 'OR',
        children: [{ value: '"x"' }, { operator: 'AND', children: [{ value: '"y"' }, { value: '"z"' }] }],
      });
    });
  });

  describe('modes', () => {
    it('should correct a foreign field shape in lenient mode', () => {
      const result = parse('TI=diabetes');

      expect(result.messages).toEqual([
        expect.objectContaining({
          code: 'FIELD_0001',
          severity: 'ERROR',
          details: 'Search field TI= is not supported by PubMed. Corrected: TI= replaced by [ti]',
        }),
      ]);
      expect(result.tree.root).toMatchObject({ type: 'term', value: 'diabetes', field: { raw: '[ti]' } });
    });

    it('should abort on the same field in strict mode', () => {
      const error = parseError('TI=diabetes', { mode: 'strict' });

      expect(error.messages[0]).toMatchObject({ code: 'FIELD_0001', severity: 'ERROR' });
    });

    it('should escalate to fatal when no correction exists', () => {
      const error = parseError('diabetes[xyz]');

      expect(error.messages[0]).toMatchObject({ code: 'FIELD_0001', severity: 'FATAL' });
    });

    it('should still return warnings when silent', () => {
      const result = parse('diabetes', { silent: true });

      expect(codes(result.messages)).toEqual(['FIELD_0004']);
    });
  });

  describe('search fields', () => {
    it('should apply the default field to terms without one', () => {
      const result = parse('diabetes[ti] AND insulin');

      expect(result.messages).toEqual([
        expect.objectContaining({
          code: 'FIELD_0004',
          position: [17, 24],
          details: 'No field for "insulin"; [all] applied',
        }),
      ]);
      expect(result.tree.root).toMatchObject({
        operator: 'AND',
        children: [{ field: { raw: '[ti]' } }, { field: { raw: '[all]', generic: 'All' } }],
      });
    });

    it('should take the general field for terms without one', () => {
      const result = parse('diabetes', { fieldGeneral: '[ti]' });

      expect(result.messages).toEqual([
        expect.objectContaining({ code: 'FIELD_0003', details: 'No field for "diabetes"; [ti] applied' }),
      ]);
      expect(result.tree.root.field).toMatchObject({ raw: '[ti]', generic: 'Title' });
    });

    it('should report a field repeated as general field', () => {
      const result = parse('diabetes[ti]', { fieldGeneral: '[title]' });

      expect(result.messages).toEqual([
        expect.objectContaining({
          code: 'FIELD_0005',
          position: [8, 12],
          details: '[ti] is also the general field',
        }),
      ]);
    });

    it('should keep the string field when it contradicts the general field', () => {
      const result = parse('diabetes[tiab]', { fieldGeneral: '[ti]' });

      expect(codes(result.messages)).toEqual(['FIELD_0006']);
      expect(result.tree.root.field?.raw).toBe('[tiab]');
    });

    it('should abort on a contradiction in strict mode', () => {
      const error = parseError('diabetes[tiab]', { fieldGeneral: '[ti]', mode: 'strict' });

      expect(codes(error.blocking)).toEqual(['FIELD_0006']);
    });
  });

  describe('tree checks', () => {
    it('should flag the same term twice in a group', () => {
      const result = parse('a[ti] OR a[ti]');

      expect(result.messages).toEqual([
        expect.objectContaining({ code: 'QUALITY_0005', position: [9, 10], details: '"a" appears twice in OR' }),
      ]);
    });

    it('should reject a value that is not a year', () => {
      const error = parseError('recent[dp]');

      expect(error.messages).toEqual([
        expect.objectContaining({ code: 'TERM_0002', details: 'recent is not a year or a year range' }),
      ]);
    });

    it('should accept a year range', () => {
      expect(parse('2010-2020[dp]').messages).toEqual([]);
    });

    it('should flag a date filter inside a nested group', () => {
      const result = parse('diabetes[ti] AND (insulin[ti] OR 2010[dp])');

      expect(result.messages).toEqual([
        expect.objectContaining({
          code: 'QUALITY_0001',
          severity: 'WARNING',
          position: [33, 37],
          details: 'Check whether date filters should apply to the entire query',
        }),
      ]);
    });

    it('should accept a date filter on the top-level operator', () => {
      expect(parse('diabetes[ti] AND 2010[dp]').messages).toEqual([]);
    });

    it('should flag a journal filter combined with other terms', () => {
      const result = parse('diabetes[ti] AND Lancet[ta]');

      expect(result.messages).toEqual([
        expect.objectContaining({
          code: 'QUALITY_0002',
          position: [17, 23],
          details: 'Check whether [ta] filters should apply to the entire query',
        }),
      ]);
    });

    it('should reject an ISBN with the wrong number of digits', () => {
      const error = parseError('12345[isbn]');

      expect(codes(error.messages)).toEqual(['TERM_0004']);
    });
  });
});
