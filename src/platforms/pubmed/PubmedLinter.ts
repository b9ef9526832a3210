import { corrected, uncorrectable } from '../../linter/Correction.js';
import { LinterOptions, QueryStringLinter } from '../../linter/QueryStringLinter.js';
import { operator } from '../../query/Query.js';
import { QueryNode, Token } from '../../query/types.js';
import { PlatformSyntax } from '../PlatformSyntax.js';
import {
  phraseProximityField,
  phraseWords,
  PROXIMITY_FIELD,
  PROXIMITY_FIELDS,
  PUBMED_SYNTAX,
} from './syntax.js';

export class PubmedLinter extends QueryStringLinter {
  protected readonly invalidCharacters = /[!#$%+;<>?\\^_{}~]/;

  constructor(options: LinterOptions = {}, syntax: PlatformSyntax = PUBMED_SYNTAX) {
    super(syntax, options);
  }

  /** `[Title/Abstract:~3]` normalizes to `[tiab:~3]` */
  protected canonicalField(value: string): string | null {
    const proximity = PROXIMITY_FIELD.exec(value);
    if (!proximity) {
      return super.canonicalField(value);
    }
    const base = this.syntax.fields.normalize(`[${proximity[1]}]`);
    return base === null ? null : `${base.slice(0, -1)}:~${proximity[2].trim()}]`;
  }

  protected checkPlatformTokens(tokens: Token[]): Token[] {
    return tokens.map((token, index) => {
      if (token.kind === 'FIELD') {
        return this.checkProximityField(token, tokens[index - 1]);
      }
      if (token.kind === 'TERM') {
        return this.checkWildcard(token);
      }
      return token;
    });
  }

  private checkProximityField(token: Token, phrase: Token | undefined): Token {
    const proximity = PROXIMITY_FIELD.exec(token.value);
    if (!proximity) {
      return token;
    }

    const base = `[${proximity[1]}]`;
    const problems: string[] = [];
    if (!/^\d+$/.test(proximity[2])) {
      problems.push(`the distance ${proximity[2]} is not a number`);
    }
    if (!phrase || phrase.kind !== 'TERM' || !phrase.value.startsWith('"') || phraseWords(phrase.value).length < 2) {
      problems.push('proximity needs a quoted phrase of at least two words');
    }
    if (!PROXIMITY_FIELDS.includes(base)) {
      problems.push(`proximity is only available for ${PROXIMITY_FIELDS.join(', ')}`);
    }
    if (problems.length === 0) {
      return token;
    }

    const replacement = this.correct(
      'INVALID_PROXIMITY_USE',
      token.span,
      `Invalid proximity search ${token.value}: ${problems.join('; ')}`,
      () => corrected(base, `proximity removed, ${base} kept`)
    );
    return replacement === null ? token : { ...token, value: replacement };
  }

  /** PubMed ignores `*` unless at least four characters precede it */
  private checkWildcard(token: Token): Token {
    const prefixLength = token.value.startsWith('"') ? 5 : 4;
    if (!token.value.slice(0, prefixLength).includes('*')) {
      return token;
    }

    const cleaned = token.value.replace(/\*/g, '');
    const replacement = this.correct(
      'PUBMED_INVALID_WILDCARD_USE',
      token.span,
      `Wildcards need at least four leading characters in ${token.value}`,
      () =>
        phraseWords(cleaned).length === 0
          ? uncorrectable<string>('Nothing is left of the term')
          : corrected(cleaned, `wildcard removed from ${token.value}`)
    );
    return replacement === null ? token : { ...token, value: replacement };
  }

  /** NEAR nodes on built trees must have the `"a b"[field:~n]` shape */
  protected checkPlatformTree(root: QueryNode): QueryNode {
    const visit = (node: QueryNode): QueryNode => {
      if (node.type === 'term') {
        return node;
      }
      node.children = node.children.map(visit);
      if (node.operator !== 'NEAR' || phraseProximityField(node) !== null) {
        return node;
      }

      const replacement = this.correct(
        'INVALID_PROXIMITY_USE',
        node.span,
        `PubMed proximity needs single words under one of ${PROXIMITY_FIELDS.join(', ')}`,
        () =>
          corrected(
            operator('AND', node.children, { field: node.field, span: node.span }),
            'NEAR replaced by AND'
          )
      );
      return replacement ?? node;
    };

    return visit(root);
  }
}
