import { describe, it, expect } from '@jest/globals';
import { LinterOptions } from '../../../linter/QueryStringLinter.js';
import { WosParser } from '../WosParser.js';
import { WosSerializer } from '../WosSerializer.js';
import { WOS_V0_SYNTAX } from '../syntax.js';
import { captureSyntaxError, codesOf } from '../../../__tests__/helpers.js';

const parse = (query: string, options: LinterOptions = {}) =>
  new WosParser(query, { mode: 'lenient', ...options }).parse();

describe('WosParser', () => {
  it('should read fields on terms and groups', () => {
    const result = parse('TI=(a OR b) AND AU=smith');

    expect(result.messages).toEqual([]);
    expect(result.tree.root).toMatchObject({
      operator: 'AND',
      children: [
        { operator: 'OR', field: { raw: 'TI=' }, children: [{ value: 'a', field: null }, { value: 'b', field: null }] },
        { value: 'smith', field: { raw: 'AU=', generic: 'Author' } },
      ],
    });
  });

  it('should apply the topic field to terms without one in lenient mode', () => {
    const result = parse('TI=robot* NEAR/5 ethics');

    expect(result.messages).toEqual([
      expect.objectContaining({
        code: 'FIELD_0002',
        severity: 'ERROR',
        position: [17, 23],
        details: 'Web of Science requires a search field for "ethics". Corrected: default field TS= applied',
      }),
    ]);
    expect(result.tree.root).toMatchObject({
      operator: 'NEAR',
      distance: 5,
      children: [{ field: { raw: 'TI=' } }, { field: { raw: 'TS=' } }],
    });
  });

  it('should reject terms without a field in strict mode', () => {
    const error = captureSyntaxError(() => parse('TI=robot* NEAR/5 ethics', { mode: 'strict' }));

    expect(codesOf(error.blocking)).toEqual(['FIELD_0002']);
  });

  it('should take the general field for terms without one', () => {
    const result = parse('robot*', { fieldGeneral: 'TI=' });

    expect(codesOf(result.messages)).toEqual(['FIELD_0003']);
    expect(result.tree.root.field?.raw).toBe('TI=');
  });

  describe('NEAR', () => {
    it('should make an implicit distance explicit', () => {
      const result = parse('TS=(a NEAR b)');

      expect(result.messages).toEqual([
        expect.objectContaining({
          code: 'STRUCT_0008',
          position: [6, 10],
          details: 'NEAR without distance searches within 15 words; NEAR/15 used',
        }),
      ]);
      expect(result.tree.root).toMatchObject({ operator: 'NEAR', distance: 15 });
    });

    it('should reject distances above the maximum without correcting them', () => {
      const error = captureSyntaxError(() => parse('TS=(a NEAR/20 b)'));

      expect(error.messages).toEqual([
        expect.objectContaining({
          code: 'STRUCT_0007',
          severity: 'FATAL',
          position: [6, 13],
          details: 'NEAR/20 exceeds the maximum distance of 15',
        }),
      ]);
    });

    it('should reject distances above the maximum in strict mode', () => {
      const error = captureSyntaxError(() => parse('TS=(a NEAR/20 b)', { mode: 'strict' }));

      expect(codesOf(error.messages)).toEqual(['STRUCT_0007']);
    });

    it('should bind NEAR before AND', () => {
      const result = parse('TS=a AND TS=b NEAR/2 TS=c');

      expect(codesOf(result.messages)).toEqual(['STRUCT_0001']);
      expect(result.tree.root).toMatchObject({
        operator: 'AND',
        children: [{ value: 'a' }, { operator: 'NEAR', children: [{ value: 'b' }, { value: 'c' }] }],
      });
    });
  });

  describe('wildcards', () => {
    it('should reject the ! character', () => {
      const error = captureSyntaxError(() => parse('TI=term1 AND TI=!term2'));

      expect(error.messages).toEqual([
        expect.objectContaining({
          code: 'WOS_0001',
          severity: 'FATAL',
          position: [16, 17],
          details: 'The ! character is not supported by Web of Science',
        }),
      ]);
    });

    it('should reject a wildcard on its own', () => {
      const error = captureSyntaxError(() => parse('TI=term1 AND TI="?"'));

      expect(error.messages).toEqual([
        expect.objectContaining({
          code: 'TERM_0006',
          position: [16, 19],
          details: 'Wildcard ? cannot be used as a standalone character',
        }),
      ]);
    });

    it('should require three characters before a right-hand wildcard', () => {
      const error = captureSyntaxError(() => parse('TI=ab*'));

      expect(error.messages).toEqual([
        expect.objectContaining({
          code: 'TERM_0008',
          position: [3, 6],
          details: 'Right-hand wildcard in ab* needs three preceding characters',
        }),
      ]);
    });

    it('should require three characters after a left-hand wildcard', () => {
      const error = captureSyntaxError(() => parse('TI=$ab'));

      expect(codesOf(error.messages)).toEqual(['TERM_0009']);
    });

    it('should reject a wildcard after a special character', () => {
      const error = captureSyntaxError(() => parse('TI=robot.*'));

      expect(error.messages).toEqual([
        expect.objectContaining({ code: 'TERM_0007', details: 'Wildcard * follows . in robot.*' }),
      ]);
    });

    it('should accept a right-hand wildcard after a word stem', () => {
      expect(parse('TI=robot*').messages).toEqual([]);
    });
  });

  describe('retired field tags', () => {
    it('should replace a retired tag by its current equivalent', () => {
      const result = parse('DI=10.1000/xyz123');

      expect(result.messages).toEqual([
        expect.objectContaining({
          code: 'LINT_2001',
          severity: 'ERROR',
          details: 'The DI= field tag is no longer supported by Web of Science. Corrected: DI= replaced by DO=',
        }),
      ]);
      expect(result.tree.root.field?.raw).toBe('DO=');
    });

    it('should fail on a retired tag without equivalent', () => {
      const error = captureSyntaxError(() => parse('PU=Springer'));

      expect(error.messages[0]).toMatchObject({ code: 'LINT_2001', severity: 'FATAL' });
    });

    it('should accept retired tags in the legacy syntax', () => {
      const result = new WosParser('DI=10.1000/xyz123 AND DE=robotics', {}, WOS_V0_SYNTAX).parse();

      expect(result.messages).toEqual([]);
      expect(result.tree.version).toBe('0');
    });
  });

  it('should reject a DOI value that is not a DOI', () => {
    const error = captureSyntaxError(() => parse('DO=robots'));

    expect(codesOf(error.messages)).toEqual(['TERM_0003']);
  });

  it('should remove invalid characters', () => {
    const result = parse('TS=robot#');

    expect(codesOf(result.messages)).toEqual(['TERM_0005']);
    expect(result.tree.root).toMatchObject({ value: 'robot' });
  });
});

describe('WosSerializer', () => {
  const serializer = new WosSerializer();
  const roundTrip = (query: string) => serializer.serialize(parse(query).tree.root);

  it('should write prefix fields on terms and groups', () => {
    expect(roundTrip('TI=(a OR b) AND AU=smith')).toBe('TI=(a OR b) AND AU=smith');
  });

  it('should write explicit NEAR distances', () => {
    expect(roundTrip('TS=(a NEAR b)')).toBe('TS=(a NEAR/15 b)');
  });

  it('should make implicit grouping explicit', () => {
    expect(roundTrip('TS=a AND TS=b NEAR/2 TS=c')).toBe('TS=a AND (TS=b NEAR/2 TS=c)');
  });
});
