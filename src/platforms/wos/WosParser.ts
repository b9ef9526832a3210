import { Lexer } from '../../lexer/Lexer.js';
import { LinterOptions } from '../../linter/QueryStringLinter.js';
import { QueryStringParser } from '../../parser/QueryStringParser.js';
import { PlatformSyntax } from '../PlatformSyntax.js';
import { WosLinter } from './WosLinter.js';
import { WOS_LEXER_RULES, WOS_SYNTAX } from './syntax.js';

export class WosParser extends QueryStringParser {
  protected readonly lexer = new Lexer(WOS_LEXER_RULES);

  constructor(query: string, options: LinterOptions = {}, syntax: PlatformSyntax = WOS_SYNTAX) {
    super(syntax, new WosLinter(options, syntax), query);
  }
}
