import { LinterOptions } from '../../linter/QueryStringLinter.js';
import { ParseStrategy, QueryStringParser } from '../../parser/QueryStringParser.js';
import { EbscoLexer } from './EbscoLexer.js';
import { EbscoLinter } from './EbscoLinter.js';
import { EBSCO_SYNTAX } from './syntax.js';

export class EbscoParser extends QueryStringParser {
  protected readonly lexer = new EbscoLexer();
  protected readonly strategy: ParseStrategy = 'bottom-up';

  constructor(query: string, options: LinterOptions = {}) {
    super(EBSCO_SYNTAX, new EbscoLinter(options), query);
  }
}
