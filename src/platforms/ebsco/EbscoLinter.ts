import { corrected } from '../../linter/Correction.js';
import { LinterOptions, QueryStringLinter } from '../../linter/QueryStringLinter.js';
import { forEachTerm } from '../../query/Query.js';
import { QueryNode, TermNode, Token } from '../../query/types.js';
import { PlatformSyntax } from '../PlatformSyntax.js';
import { EBSCO_SYNTAX } from './syntax.js';

const FOREIGN_PROXIMITY = /^(NEAR|WITHIN)\/(\d+)$/;

const WILDCARD = /[*?#]/;

export class EbscoLinter extends QueryStringLinter {
  constructor(options: LinterOptions = {}, syntax: PlatformSyntax = EBSCO_SYNTAX) {
    super(syntax, options);
  }

  /** `NEAR/3` and `WITHIN/3` are written `N3` and `W3` */
  protected checkPlatformTokens(tokens: Token[]): Token[] {
    return tokens.map((token) => {
      const foreign = token.kind === 'PROXIMITY_OP' ? FOREIGN_PROXIMITY.exec(token.value) : null;
      if (!foreign) {
        return token;
      }

      const value = `${foreign[1] === 'NEAR' ? 'N' : 'W'}${foreign[2]}`;
      const replacement = this.correct(
        'INVALID_PROXIMITY_USE',
        token.span,
        `${token.value} is not supported by ${this.syntax.label}; use ${value}`,
        () => corrected(value, `${token.value} replaced by ${value}`)
      );
      return replacement === null ? token : { ...token, value: replacement };
    });
  }

  protected checkPlatformTree(root: QueryNode): QueryNode {
    forEachTerm(root, (term) => this.checkWildcards(term));
    return root;
  }

  /** Wildcards may not start a term, and `?` or `#` need two letters among the first four characters */
  private checkWildcards(term: TermNode): void {
    const value = term.value;
    const [start] = term.span;

    if (WILDCARD.test(value.charAt(0))) {
      this.addMessage(
        'EBSCO_WILDCARD_UNSUPPORTED',
        start === -1 ? term.span : [start, start + 1],
        'Wildcard not allowed at the beginning of a term'
      );
      return;
    }
    if (value.charAt(1) === '*') {
      this.addMessage(
        'EBSCO_WILDCARD_UNSUPPORTED',
        term.span,
        `Do not use * in the second position of ${value}; use ? or # instead (f?tal)`
      );
      return;
    }

    const letters = [...value.slice(0, 4)].filter((character) => !WILDCARD.test(character));
    if (/^.[?#]/.test(value) && letters.length < 2) {
      this.addMessage(
        'EBSCO_WILDCARD_UNSUPPORTED',
        term.span,
        `${value} needs two characters other than wildcards among its first four`
      );
    }
  }
}
