import { combineSubsequentTerms, Lexer } from '../../lexer/Lexer.js';
import { Token } from '../../query/types.js';
import { EBSCO_FIELD_CODE, EBSCO_LEXER_RULES } from './syntax.js';

const isFieldCode = (token: Token | undefined): boolean =>
  token !== undefined && token.kind === 'FIELD' && EBSCO_FIELD_CODE.test(token.value);

/**
 * Two capital letters are only a field code when a term or a group follows;
 * otherwise they are part of the search terms (`AI AND robots`). Of two codes
 * in a row the second is the search word (`TI AI robots`).
 */
export class EbscoLexer extends Lexer {
  constructor() {
    super(EBSCO_LEXER_RULES);
  }

  protected postProcess(tokens: Token[], query: string): Token[] {
    const reclassified = [...tokens];
    reclassified.forEach((token, index) => {
      if (!isFieldCode(token)) {
        return;
      }
      const next = reclassified[index + 1];
      if (next && isFieldCode(next)) {
        reclassified[index + 1] = { ...next, kind: 'TERM' };
        return;
      }
      if (next && (next.kind === 'TERM' || next.kind === 'PAREN_OPEN')) {
        return;
      }
      // before an operator, a closing parenthesis or the end of the query
      reclassified[index] = { ...token, kind: 'TERM' };
    });
    return combineSubsequentTerms(reclassified, query);
  }
}
