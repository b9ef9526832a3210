import { Lexer } from '../../lexer/Lexer.js';
import { LinterOptions } from '../../linter/QueryStringLinter.js';
import { QueryStringParser } from '../../parser/QueryStringParser.js';
import { near, term } from '../../query/Query.js';
import { QueryNode, Token } from '../../query/types.js';
import { PubmedLinter } from './PubmedLinter.js';
import { PROXIMITY_FIELD, PUBMED_LEXER_RULES, PUBMED_SYNTAX } from './syntax.js';

export class PubmedParser extends QueryStringParser {
  protected readonly lexer = new Lexer(PUBMED_LEXER_RULES);

  constructor(query: string, options: LinterOptions = {}) {
    super(PUBMED_SYNTAX, new PubmedLinter(options), query);
  }

  /** `"a b"[tiab:~3]` becomes NEAR/3 over the words, each under `[tiab]` */
  protected termWithSuffix(termToken: Token, fieldToken: Token): QueryNode {
    const proximity = PROXIMITY_FIELD.exec(fieldToken.value);
    if (!proximity) {
      return super.termWithSuffix(termToken, fieldToken);
    }

    const field = this.fieldFromToken({ ...fieldToken, value: `[${proximity[1]}]` });
    const words: QueryNode[] = [];
    const pattern = /[^\s"]+/g;
    let match: RegExpExecArray | null;
    while ((match = pattern.exec(termToken.value)) !== null) {
      const start = termToken.span[0] + match.index;
      words.push(term(match[0], { field: { ...field }, span: [start, start + match[0].length] }));
    }

    if (words.length < 2) {
      this.fail(fieldToken.span, 'Proximity search needs at least two words');
    }
    return near(parseInt(proximity[2], 10), words, { span: termToken.span });
  }
}
