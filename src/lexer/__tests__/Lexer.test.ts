import { describe, it, expect } from '@jest/globals';
import { combineSubsequentTerms, Lexer } from '../Lexer.js';
import { EbscoLexer } from '../../platforms/ebsco/EbscoLexer.js';
import { PUBMED_LEXER_RULES } from '../../platforms/pubmed/syntax.js';
import { WOS_LEXER_RULES } from '../../platforms/wos/syntax.js';
import { Token } from '../../query/types.js';

const simplify = (tokens: Token[]) => tokens.map((token) => [token.kind, token.value, token.span]);

describe('Lexer', () => {
  describe('PubMed rules', () => {
    const lexer = new Lexer(PUBMED_LEXER_RULES);

    it('should split terms, suffix fields, operators and parentheses with positions', () => {
      const tokens = lexer.tokenize('diabetes[ti] AND (heart attack OR "stroke")');

      expect(simplify(tokens)).toEqual([
        ['TERM', 'diabetes', [0, 8]],
        ['FIELD', '[ti]', [8, 12]],
        ['LOGIC_OP', 'AND', [13, 16]],
        ['PAREN_OPEN', '(', [17, 18]],
        ['TERM', 'heart attack', [18, 30]],
        ['LOGIC_OP', 'OR', [31, 33]],
        ['TERM', '"stroke"', [34, 42]],
        ['PAREN_CLOSE', ')', [42, 43]],
      ]);
    });

    it('should recognize lowercase operators as operators', () => {
      const tokens = lexer.tokenize('a or b');

      expect(tokens[1]).toEqual({ kind: 'LOGIC_OP', value: 'or', span: [2, 4] });
    });

    it('should not split words that start with an operator', () => {
      const tokens = lexer.tokenize('android');

      expect(simplify(tokens)).toEqual([['TERM', 'android', [0, 7]]]);
    });

    it('should report characters no rule accepts as unknown tokens', () => {
      const tokens = lexer.tokenize('a ] b');

      expect(simplify(tokens)).toEqual([
        ['TERM', 'a', [0, 1]],
        ['UNKNOWN', ']', [2, 3]],
        ['TERM', 'b', [4, 5]],
      ]);
    });
  });

  describe('Web of Science rules', () => {
    const lexer = new Lexer(WOS_LEXER_RULES);

    it('should read prefix fields and NEAR operators', () => {
      const tokens = lexer.tokenize('TI=robot* NEAR/5 ethics');

      expect(simplify(tokens)).toEqual([
        ['FIELD', 'TI=', [0, 3]],
        ['TERM', 'robot*', [3, 9]],
        ['PROXIMITY_OP', 'NEAR/5', [10, 16]],
        ['TERM', 'ethics', [17, 23]],
      ]);
    });

    it('should read NEAR without a distance', () => {
      const tokens = lexer.tokenize('a NEAR b');

      expect(tokens[1]).toEqual({ kind: 'PROXIMITY_OP', value: 'NEAR', span: [2, 6] });
    });
  });

  describe('EBSCOHost lexer', () => {
    const lexer = new EbscoLexer();

    it('should read two capital letters before a term as a field', () => {
      const tokens = lexer.tokenize('TI diabetes N3 insulin');

      expect(simplify(tokens)).toEqual([
        ['FIELD', 'TI', [0, 2]],
        ['TERM', 'diabetes', [3, 11]],
        ['PROXIMITY_OP', 'N3', [12, 14]],
        ['TERM', 'insulin', [15, 22]],
      ]);
    });

    it('should keep a field code before a parenthesized group', () => {
      const tokens = lexer.tokenize('AB (a OR b)');

      expect(tokens[0]).toEqual({ kind: 'FIELD', value: 'AB', span: [0, 2] });
    });

    it('should treat two capitals before an operator as a term', () => {
      const tokens = lexer.tokenize('AI AND robots');

      expect(simplify(tokens)).toEqual([
        ['TERM', 'AI', [0, 2]],
        ['LOGIC_OP', 'AND', [3, 6]],
        ['TERM', 'robots', [7, 13]],
      ]);
    });

    it('should merge a reclassified code with the words around it', () => {
      const tokens = lexer.tokenize('TX machine AI OR robots');

      expect(simplify(tokens)).toEqual([
        ['FIELD', 'TX', [0, 2]],
        ['TERM', 'machine AI', [3, 13]],
        ['LOGIC_OP', 'OR', [14, 16]],
        ['TERM', 'robots', [17, 23]],
      ]);
    });

    it('should read the second of two codes as a term', () => {
      const tokens = lexer.tokenize('TI AI robots');

      expect(simplify(tokens)).toEqual([
        ['FIELD', 'TI', [0, 2]],
        ['TERM', 'AI robots', [3, 12]],
      ]);
    });
  });

  describe('combineSubsequentTerms', () => {
    it('should merge adjacent terms into the verbatim slice', () => {
      const query = 'heart   attack';
      const merged = combineSubsequentTerms(
        [
          { kind: 'TERM', value: 'heart', span: [0, 5] },
          { kind: 'TERM', value: 'attack', span: [8, 14] },
        ],
        query
      );

      expect(merged).toEqual([{ kind: 'TERM', value: 'heart   attack', span: [0, 14] }]);
    });
  });
});
