import { corrected, uncorrectable } from '../../linter/Correction.js';
import { LinterOptions, QueryStringLinter } from '../../linter/QueryStringLinter.js';
import { forEachTerm } from '../../query/Query.js';
import { QueryNode, TermNode, Token } from '../../query/types.js';
import { FieldMap } from '../../translator/FieldMap.js';
import { PlatformSyntax } from '../PlatformSyntax.js';
import { WOS_MAX_NEAR_DISTANCE, WOS_SYNTAX, WOS_V0_SYNTAX } from './syntax.js';

const WILDCARDS = ['*', '?', '$'];

const SPECIAL_CHARACTERS = ['/', '@', '#', '.', ':', ';', '!'];

/**
 * Web of Science linter. On the current syntax, retired field tags are
 * reported as deprecated and replaced by their current equivalent.
 */
export class WosLinter extends QueryStringLinter {
  protected readonly invalidCharacters = /[@%^~\\<>{}#]/;

  private readonly retiredFields: FieldMap | null;

  constructor(
    options: LinterOptions = {},
    syntax: PlatformSyntax = WOS_SYNTAX,
    legacyFields: FieldMap | null = syntax.version === WOS_SYNTAX.version ? WOS_V0_SYNTAX.fields : null
  ) {
    super(syntax, options);
    this.retiredFields = legacyFields
      ? new FieldMap(legacyFields.missingFrom(syntax.fields))
      : null;
  }

  protected checkFieldTokens(tokens: Token[]): Token[] {
    const retired = this.retiredFields;
    if (retired === null) {
      return super.checkFieldTokens(tokens);
    }

    const upgraded = tokens.map((token) => {
      if (token.kind !== 'FIELD' || !retired.has(token.value) || this.syntax.fields.has(token.value)) {
        return token;
      }
      const replacement = this.correct(
        'DEPRECATED_SYNTAX',
        token.span,
        `The ${token.value} field tag is no longer supported by ${this.syntax.label}`,
        () => this.currentEquivalent(retired, token.value)
      );
      return replacement === null ? token : { ...token, value: replacement };
    });

    return super.checkFieldTokens(upgraded);
  }

  private currentEquivalent(retired: FieldMap, raw: string) {
    const generic = retired.genericSet(raw) ?? [];
    const replacement =
      generic.length === 0
        ? null
        : this.syntax.fields.fromGenericSet(generic) ?? this.syntax.fields.closest(generic[0]);
    return replacement === null
      ? uncorrectable<string>(`${raw} has no current equivalent`)
      : corrected(replacement, `${raw} replaced by ${replacement}`);
  }

  /** NEAR distances are explicit and within the platform maximum */
  protected checkPlatformTokens(tokens: Token[]): Token[] {
    const maximum = this.syntax.maxNearDistance ?? WOS_MAX_NEAR_DISTANCE;

    return tokens.map((token) => {
      if (token.kind !== 'PROXIMITY_OP') {
        return token;
      }

      const distance = token.value.match(/\/(\d+)$/);
      if (!distance) {
        this.addMessage('IMPLICIT_NEAR_VALUE', token.span, `NEAR without distance searches within ${maximum} words; NEAR/${maximum} used`);
        return { ...token, value: `NEAR/${maximum}` };
      }

      if (parseInt(distance[1], 10) > maximum) {
        this.addMessage(
          'NEAR_DISTANCE_TOO_LARGE',
          token.span,
          `${token.value} exceeds the maximum distance of ${maximum}`
        );
      }
      return token;
    });
  }

  protected checkPlatformTree(root: QueryNode): QueryNode {
    forEachTerm(root, (term) => {
      this.checkUnsupportedWildcard(term);
      this.checkWildcardPlacement(term);
    });
    return root;
  }

  private checkUnsupportedWildcard(term: TermNode): void {
    const [start] = term.span;
    for (let index = term.value.indexOf('!'); index !== -1; index = term.value.indexOf('!', index + 1)) {
      this.addMessage(
        'WOS_WILDCARD_UNSUPPORTED',
        start === -1 ? term.span : [start + index, start + index + 1],
        `The ! character is not supported by ${this.syntax.label}`
      );
    }
  }

  /** `*`, `?` and `$` need three other characters on their side of the term */
  private checkWildcardPlacement(term: TermNode): void {
    const value = term.value.replace(/^"|"$/g, '');

    [...value].forEach((character, index) => {
      if (!WILDCARDS.includes(character)) {
        return;
      }
      if (value.length === 1) {
        this.addMessage(
          'WILDCARD_STANDALONE',
          term.span,
          `Wildcard ${character} cannot be used as a standalone character`
        );
        return;
      }

      if (index === value.length - 1) {
        const previous = value[index - 1];
        if (SPECIAL_CHARACTERS.includes(previous)) {
          this.addMessage('WILDCARD_AFTER_SPECIAL_CHAR', term.span, `Wildcard ${character} follows ${previous} in ${value}`);
        }
        if (value.length < 4) {
          this.addMessage(
            'WILDCARD_RIGHT_SHORT_LENGTH',
            term.span,
            `Right-hand wildcard in ${value} needs three preceding characters`
          );
        }
      } else if (index === 0 && value.length < 4) {
        this.addMessage(
          'WILDCARD_LEFT_SHORT_LENGTH',
          term.span,
          `Left-hand wildcard in ${value} needs three following characters`
        );
      }
    });
  }
}
