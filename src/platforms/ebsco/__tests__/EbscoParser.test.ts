import { describe, it, expect } from '@jest/globals';
import { EbscoParser } from '../EbscoParser.js';
import { EbscoSerializer } from '../EbscoSerializer.js';
import { QueryListParser } from '../../../parser/QueryListParser.js';
import { EBSCO_SYNTAX } from '../syntax.js';
import { captureSyntaxError, codesOf } from '../../../__tests__/helpers.js';

const parse = (query: string) => new EbscoParser(query, { mode: 'lenient' }).parse();

describe('EbscoParser', () => {
  it('should read field codes and N proximity', () => {
    const result = parse('TI diabetes N3 insulin');

    expect(result.tree.root).toMatchObject({
      operator: 'NEAR',
      distance: 3,
      ordered: false,
      children: [
        { value: 'diabetes', field: { raw: 'TI', generic: 'Title' } },
        { value: 'insulin', field: null },
      ],
    });
    expect(result.messages).toEqual([
      expect.objectContaining({ code: 'FIELD_0004', position: [15, 22], details: 'No field for "insulin"' }),
    ]);
  });

  it('should read W proximity as ordered', () => {
    const result = parse('TI (heart W2 attack)');

    expect(result.tree.root).toMatchObject({
      operator: 'NEAR',
      distance: 2,
      ordered: true,
      field: { raw: 'TI' },
    });
    expect(result.messages).toEqual([]);
  });

  it('should keep capitalized words before operators as terms', () => {
    const result = parse('AI AND robots');

    expect(result.tree.root).toMatchObject({
      operator: 'AND',
      children: [{ value: 'AI', field: null }, { value: 'robots', field: null }],
    });
  });

  it('should search a capitalized word that follows a field code', () => {
    const result = parse('TI AI robots');

    expect(result.tree.root).toMatchObject({ type: 'term', value: 'AI robots', field: { raw: 'TI' } });
    expect(result.messages).toEqual([]);
  });

  it('should apply each field code to its own capitalized word', () => {
    const result = parse('TI AI AND AB robots');

    expect(result.tree.root).toMatchObject({
      operator: 'AND',
      children: [
        { value: 'AI', field: { raw: 'TI' } },
        { value: 'robots', field: { raw: 'AB' } },
      ],
    });
    expect(result.messages).toEqual([]);
  });

  describe('wildcards', () => {
    it('should reject a wildcard at the start of a term', () => {
      const error = captureSyntaxError(() => parse('TI *tal'));

      expect(error.messages).toEqual([
        expect.objectContaining({
          code: 'EBSCO_0001',
          severity: 'FATAL',
          position: [3, 4],
          details: 'Wildcard not allowed at the beginning of a term',
        }),
      ]);
    });

    it('should reject * in the second position', () => {
      const error = captureSyntaxError(() => parse('TI f*tal'));

      expect(error.messages).toEqual([
        expect.objectContaining({
          code: 'EBSCO_0001',
          position: [3, 8],
          details: 'Do not use * in the second position of f*tal; use ? or # instead (f?tal)',
        }),
      ]);
    });

    it('should reject ? when fewer than two letters start the term', () => {
      const error = captureSyntaxError(() => parse('TI f??'));

      expect(error.messages).toEqual([
        expect.objectContaining({
          code: 'EBSCO_0001',
          position: [3, 6],
          details: 'f?? needs two characters other than wildcards among its first four',
        }),
      ]);
    });

    it('should accept ? between letters', () => {
      expect(parse('TI f?tal').messages).toEqual([]);
    });
  });

  it('should convert NEAR/n to Nn', () => {
    const result = parse('TI a NEAR/3 TI b');

    expect(result.messages).toEqual([
      expect.objectContaining({
        code: 'STRUCT_0004',
        details: 'NEAR/3 is not supported by EBSCOHost; use N3. Corrected: NEAR/3 replaced by N3',
      }),
    ]);
    expect(result.tree.root).toMatchObject({ operator: 'NEAR', distance: 3, ordered: false });
  });

  it('should bind proximity before NOT', () => {
    const result = parse('TI a NOT TI b N2 TI c');

    expect(codesOf(result.messages)).toEqual(['STRUCT_0001']);
    expect(result.tree.root).toMatchObject({
      operator: 'NOT',
      children: [{ value: 'a' }, { operator: 'NEAR', distance: 2 }],
    });
  });

  it('should resolve S-numbered list references', () => {
    const list = '1. TI diabetes\n2. AB insulin\n3. S1 AND S2';
    const result = new QueryListParser(list, EBSCO_SYNTAX, (query) => new EbscoParser(query)).parse();

    expect(result.tree.root).toMatchObject({
      operator: 'AND',
      children: [
        { value: 'diabetes', field: { raw: 'TI' } },
        { value: 'insulin', field: { raw: 'AB' } },
      ],
    });
    expect(result.messages).toEqual([]);
  });
});

describe('EbscoSerializer', () => {
  const serializer = new EbscoSerializer();
  const roundTrip = (query: string) => serializer.serialize(parse(query).tree.root);

  it('should write field codes before terms and groups', () => {
    expect(roundTrip('TI (heart W2 attack) AND AU smith')).toBe('TI (heart W2 attack) AND AU smith');
  });

  it('should write unordered proximity as N', () => {
    expect(roundTrip('TI a NEAR/3 TI b')).toBe('TI a N3 TI b');
  });

  it('should leave terms without a field unqualified', () => {
    expect(roundTrip('AI AND robots')).toBe('AI AND robots');
  });
});
