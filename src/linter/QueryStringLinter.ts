/**
 * Query String Linter
 *
 * Base class for platform linters. A linter instance serves a single parse: it
 * collects messages in detection order, applies auto-corrections according to
 * the mode, and decides whether the parse may continue.
 *
 * @remarks
 * **Modes:**
 * - `strict`: every ERROR and FATAL finding aborts the parse
 * - `lenient`: only FATAL findings abort; ERROR findings run their correction
 *   step and are escalated to FATAL when no correction exists
 *
 * `silent` only affects logging: WARNING findings are still returned.
 *
 * **Token-level pipeline** (`validateTokens`):
 * unknown tokens, quotes, parentheses, operator capitalization, field tokens,
 * invalid characters, platform checks, token sequence, unnecessary parentheses,
 * implicit precedence.
 *
 * **Tree-level pipeline** (`validateQueryTree`):
 * field tokens on programmatic trees, fields on nested queries, the search-field
 * decision table, redundant terms, term formats, filters in subqueries,
 * platform checks.
 */

import { LintMode, loadLinterConfig } from '../config/linter.js';
import { forEachOperator, forEachTerm, searchField, spanOf } from '../query/Query.js';
import {
  GenericField,
  NO_SPAN,
  QueryNode,
  SearchField,
  Span,
  TermNode,
  Token,
  TokenKind,
} from '../query/types.js';
import { PlatformSyntax } from '../platforms/PlatformSyntax.js';
import { moveFieldFromOperatorToTerms } from '../translator/structure.js';
import { logger } from '../utils/logger.js';
import { Correction, corrected, uncorrectable } from './Correction.js';
import { decideField, relateGeneralField } from './fieldValidation.js';
import { createMessage, LinterMessage, QueryErrorKey, Severity } from './messages.js';
import { insertArtificialParentheses, isOperatorToken } from './precedence.js';
import { QuerySyntaxError } from './QuerySyntaxError.js';

export interface LinterOptions {
  mode?: LintMode;
  silent?: boolean;
  /** Field applied to the whole query, given separately from the string */
  fieldGeneral?: string;
}

const NON_STANDARD_QUOTES = /[“”„‟«»]/g;

const JOURNAL_FIELDS: ReadonlySet<GenericField> = new Set<GenericField>(['Journal', 'Publication Name', 'Source']);

const KIND_LABELS: Record<TokenKind | 'START' | 'END', string> = {
  PAREN_OPEN: 'opening parenthesis',
  PAREN_CLOSE: 'closing parenthesis',
  LOGIC_OP: 'operator',
  PROXIMITY_OP: 'proximity operator',
  FIELD: 'search field',
  TERM: 'search term',
  UNKNOWN: 'unknown token',
  START: 'start of query',
  END: 'end of query',
};

export abstract class QueryStringLinter {
  readonly syntax: PlatformSyntax;
  readonly mode: LintMode;
  readonly silent: boolean;
  readonly fieldGeneral: string | null;
  readonly messages: LinterMessage[] = [];

  /** Query the token positions refer to */
  protected query = '';

  /** Characters not allowed in unquoted search terms, if the platform restricts any */
  protected readonly invalidCharacters: RegExp | null = null;

  constructor(syntax: PlatformSyntax, options: LinterOptions = {}) {
    const defaults = loadLinterConfig();
    this.syntax = syntax;
    this.mode = options.mode ?? defaults.mode;
    this.silent = options.silent ?? defaults.silent;
    this.fieldGeneral = options.fieldGeneral?.trim() || null;
  }

  // ==========================================================================
  // Message handling
  // ==========================================================================

  addMessage(key: QueryErrorKey, position: Span, details = '', severity?: Severity): void {
    const message = createMessage(key, position, details, severity);
    const duplicate = this.messages.some(
      (existing) =>
        existing.code === message.code &&
        existing.position[0] === message.position[0] &&
        existing.position[1] === message.position[1] &&
        existing.details === message.details
    );
    if (duplicate) {
      return;
    }

    this.messages.push(message);
    this.log(message);
  }

  /**
   * Record an ERROR finding and, in lenient mode, run its correction.
   * Returns the corrected value, or null when nothing was corrected.
   */
  correct<T>(
    key: QueryErrorKey,
    position: Span,
    details: string,
    attempt: () => Correction<T>
  ): T | null {
    if (this.mode === 'strict') {
      this.addMessage(key, position, details, 'ERROR');
      return null;
    }

    const outcome = attempt();
    if (outcome.ok) {
      this.addMessage(key, position, joinDetails(details, `Corrected: ${outcome.note}`), 'ERROR');
      return outcome.value;
    }

    this.addMessage(key, position, joinDetails(details, outcome.reason), 'FATAL');
    return null;
  }

  hasFatal(): boolean {
    return this.messages.some((message) => message.severity === 'FATAL');
  }

  isBlocked(): boolean {
    if (this.hasFatal()) {
      return true;
    }
    return this.mode === 'strict' && this.messages.some((message) => message.severity === 'ERROR');
  }

  /** Raise when the findings so far block the parse */
  checkStatus(): void {
    if (this.isBlocked()) {
      throw new QuerySyntaxError({
        query: this.query,
        platform: this.syntax.platform,
        messages: this.messages,
      });
    }
  }

  private log(message: LinterMessage): void {
    const payload = {
      platform: this.syntax.platform,
      code: message.code,
      label: message.label,
      position: message.position,
      details: message.details,
    };

    if (message.severity === 'FATAL') {
      logger.debug('linting', message.message, payload);
      return;
    }
    if (message.severity === 'WARNING' && this.silent) {
      return;
    }
    logger.warn(message.message, payload);
  }

  // ==========================================================================
  // Pre-tokenization
  // ==========================================================================

  /**
   * Replace typographic quotes by plain double quotes. The replacement keeps
   * the string length, so positions stay valid.
   */
  preprocess(query: string): string {
    this.query = query;
    let match: RegExpExecArray | null;
    NON_STANDARD_QUOTES.lastIndex = 0;
    while ((match = NON_STANDARD_QUOTES.exec(query)) !== null) {
      this.addMessage(
        'NON_STANDARD_QUOTES',
        [match.index, match.index + 1],
        `Replace ${match[0]} with "`
      );
    }
    this.query = query.replace(NON_STANDARD_QUOTES, '"');
    return this.query;
  }

  // ==========================================================================
  // Token-level validation
  // ==========================================================================

  validateTokens(tokens: Token[], query: string): Token[] {
    this.query = query;

    if (tokens.length === 0) {
      this.addMessage('INVALID_SYNTAX', NO_SPAN, 'The query is empty');
      return tokens;
    }

    this.checkUnknownTokens(tokens);
    this.checkUnbalancedQuotes(query);
    this.checkUnbalancedParentheses(tokens);
    if (this.hasFatal()) {
      return tokens;
    }

    let result = this.normalizeOperatorCapitalization(tokens);
    result = this.checkFieldTokens(result);
    result = this.checkInvalidCharacters(result);
    result = this.checkPlatformTokens(result);
    this.checkTokenSequence(result);
    if (this.hasFatal()) {
      return result;
    }

    this.checkUnnecessaryParentheses(result);
    return this.resolvePrecedence(result);
  }

  /** Hook for platform-specific token rules, run before the sequence check */
  protected checkPlatformTokens(tokens: Token[]): Token[] {
    return tokens;
  }

  protected checkUnknownTokens(tokens: Token[]): void {
    for (const token of tokens) {
      // Stray quotes are reported by the quote check
      if (token.kind === 'UNKNOWN' && token.value !== '"') {
        this.addMessage('TOKENIZING_FAILED', token.span, `Unexpected character ${token.value}`);
      }
    }
  }

  protected checkUnbalancedQuotes(query: string): void {
    const positions: number[] = [];
    for (let i = 0; i < query.length; i++) {
      if (query[i] === '"') {
        positions.push(i);
      }
    }
    if (positions.length % 2 === 1) {
      const last = positions[positions.length - 1];
      this.addMessage('UNBALANCED_QUOTES', [last, last + 1], 'Unmatched quote');
    }
  }

  protected checkUnbalancedParentheses(tokens: Token[]): void {
    const open: Token[] = [];
    for (const token of tokens) {
      if (token.kind === 'PAREN_OPEN') {
        open.push(token);
      } else if (token.kind === 'PAREN_CLOSE') {
        if (open.length === 0) {
          this.addMessage('UNBALANCED_PARENTHESES', token.span, 'Unmatched closing parenthesis');
        } else {
          open.pop();
        }
      }
    }
    for (const token of open) {
      this.addMessage('UNBALANCED_PARENTHESES', token.span, 'Unmatched opening parenthesis');
    }
  }

  protected normalizeOperatorCapitalization(tokens: Token[]): Token[] {
    return tokens.map((token) => {
      if (!isOperatorToken(token) || token.value === token.value.toUpperCase()) {
        return token;
      }
      const value = token.value.toUpperCase();
      this.addMessage('OPERATOR_CAPITALIZATION', token.span, `Write ${value} instead of ${token.value}`);
      return { ...token, value };
    });
  }

  // --------------------------------------------------------------------------
  // Field tokens
  // --------------------------------------------------------------------------

  /**
   * Canonical spelling for a field token, null when the platform does not know
   * it. Platforms with field suffixes that carry parameters override this.
   */
  protected canonicalField(value: string): string | null {
    return this.syntax.fields.normalize(value);
  }

  /**
   * Validate every field token. Unknown fields are ERRORs; the correction
   * converts another platform's field shape (`[ti]` for `TI=`) and moves the
   * field to the side of its term where this platform expects it.
   */
  protected checkFieldTokens(tokens: Token[]): Token[] {
    const result = [...tokens];

    for (let i = 0; i < result.length; i++) {
      const token = result[i];
      if (token.kind !== 'FIELD') {
        continue;
      }

      const canonical = this.canonicalField(token.value);
      if (canonical !== null) {
        result[i] = { ...token, value: canonical };
        continue;
      }

      const replacement = this.correct(
        'FIELD_UNSUPPORTED',
        token.span,
        `Search field ${token.value} is not supported by ${this.syntax.label}`,
        () => this.convertForeignField(token.value)
      );
      if (replacement === null) {
        continue;
      }

      result[i] = { ...token, value: replacement };
      i = this.moveFieldToPlacement(result, i);
    }

    return result;
  }

  /** Map `[ti]`, `TI=` and `TI` shapes onto this platform's spelling of the same tag */
  protected convertForeignField(value: string): Correction<string> {
    const tag = value.replace(/^\[|\]$|=$/g, '').trim();
    if (tag === '') {
      return uncorrectable('The field is empty');
    }

    const candidates = [`[${tag.toLowerCase()}]`, `${tag.toUpperCase()}=`, tag.toUpperCase()];
    for (const candidate of candidates) {
      const canonical = this.syntax.fields.normalize(candidate);
      if (canonical !== null) {
        return corrected(canonical, `${value} replaced by ${canonical}`);
      }
    }
    return uncorrectable(`${this.syntax.label} has no equivalent for ${value}`);
  }

  /**
   * After a foreign field was converted, swap it with its neighbouring term when
   * it sits on the wrong side. Returns the index to continue scanning from.
   */
  private moveFieldToPlacement(tokens: Token[], index: number): number {
    const field = tokens[index];
    if (this.syntax.fieldPlacement === 'prefix') {
      const previous = tokens[index - 1];
      if (previous && previous.kind === 'TERM') {
        tokens[index - 1] = field;
        tokens[index] = previous;
      }
      return index;
    }

    const next = tokens[index + 1];
    if (next && next.kind === 'TERM') {
      tokens[index] = next;
      tokens[index + 1] = field;
      return index + 1;
    }
    return index;
  }

  protected checkInvalidCharacters(tokens: Token[]): Token[] {
    const pattern = this.invalidCharacters;
    if (pattern === null) {
      return tokens;
    }

    return tokens.map((token) => {
      if (token.kind !== 'TERM' || token.value.startsWith('"')) {
        return token;
      }
      const found = token.value.match(new RegExp(pattern.source, 'g'));
      if (!found) {
        return token;
      }

      const cleaned = token.value.replace(new RegExp(pattern.source, 'g'), '').trim();
      const replacement = this.correct(
        'INVALID_CHARACTER',
        token.span,
        `Invalid characters ${[...new Set(found)].join('')} in ${token.value}`,
        () =>
          cleaned === ''
            ? uncorrectable<string>('Nothing is left of the term')
            : corrected(cleaned, `term changed to ${cleaned}`)
      );
      return replacement === null ? token : { ...token, value: replacement };
    });
  }

  // --------------------------------------------------------------------------
  // Sequence and grouping
  // --------------------------------------------------------------------------

  protected checkTokenSequence(tokens: Token[]): void {
    let previous: TokenKind | 'START' = 'START';

    for (const token of tokens) {
      if (!this.syntax.transitions[previous].includes(token.kind)) {
        this.addMessage(
          'INVALID_TOKEN_SEQUENCE',
          token.span,
          `${capitalize(KIND_LABELS[previous])} followed by ${KIND_LABELS[token.kind]} ${token.value}`
        );
      }
      previous = token.kind;
    }

    if (!this.syntax.transitions[previous].includes('END')) {
      const last = tokens[tokens.length - 1];
      this.addMessage(
        'INVALID_TOKEN_SEQUENCE',
        last.span,
        `Query cannot end with ${KIND_LABELS[previous]} ${last.value}`
      );
    }
  }

  /** Parentheses around a single term, or doubled parentheses */
  protected checkUnnecessaryParentheses(tokens: Token[]): void {
    const stack: number[] = [];
    for (let i = 0; i < tokens.length; i++) {
      if (tokens[i].kind === 'PAREN_OPEN') {
        stack.push(i);
        continue;
      }
      if (tokens[i].kind !== 'PAREN_CLOSE') {
        continue;
      }

      const open = stack.pop();
      if (open === undefined) {
        continue;
      }
      const inner = tokens.slice(open + 1, i);
      const doubled =
        inner.length > 0 &&
        inner[0].kind === 'PAREN_OPEN' &&
        inner[inner.length - 1].kind === 'PAREN_CLOSE' &&
        enclosesAll(inner);
      const singleTerm = inner.every((token) => token.kind !== 'PAREN_OPEN' && !isOperatorToken(token));

      if (doubled || singleTerm) {
        this.addMessage(
          'UNNECESSARY_PARENTHESES',
          [tokens[open].span[0], tokens[i].span[1]],
          doubled ? 'Parentheses are doubled' : 'Parentheses enclose a single term'
        );
      }
    }
  }

  protected resolvePrecedence(tokens: Token[]): Token[] {
    const result = insertArtificialParentheses(tokens, this.syntax.precedence);
    for (const level of result.ambiguousLevels) {
      const operators = this.query.slice(level[0], level[1]);
      this.addMessage(
        'IMPLICIT_PRECEDENCE',
        level,
        `Operators are mixed without parentheses in "${operators}"; grouped by precedence`
      );
    }
    return result.tokens;
  }

  // ==========================================================================
  // Tree-level validation
  // ==========================================================================

  validateQueryTree(root: QueryNode): QueryNode {
    let result = this.checkTreeFieldTokens(root);
    result = this.checkNestedFields(result);
    result = this.validateFields(result);
    this.checkRedundantTerms(result);
    this.checkTermFormats(result);
    this.checkFiltersInSubqueries(result);
    return this.checkPlatformTree(result);
  }

  /** Hook for platform-specific tree rules */
  protected checkPlatformTree(root: QueryNode): QueryNode {
    return root;
  }

  /**
   * Fields on programmatically built trees have not been through the token
   * checks; normalize them or report them as unsupported.
   */
  protected checkTreeFieldTokens(root: QueryNode): QueryNode {
    const visit = (node: QueryNode): void => {
      if (node.field !== null) {
        const field = node.field;
        const known = this.syntax.fields.toSearchField(field.raw, field.span);
        if (known) {
          node.field = known;
        } else {
          node.field =
            this.correct(
              'FIELD_UNSUPPORTED',
              field.span[0] === -1 ? spanOf(node) : field.span,
              `Search field ${field.raw} is not supported by ${this.syntax.label}`,
              () => {
                const conversion = this.convertForeignField(field.raw);
                return conversion.ok
                  ? corrected(this.fieldFor(conversion.value, field.span), conversion.note)
                  : uncorrectable<SearchField>(conversion.reason);
              }
            ) ?? field;
        }
      }
      if (node.type === 'operator') {
        node.children.forEach(visit);
      }
    };

    visit(root);
    return root;
  }

  /** Push fields on nested queries down to their terms where only terms may carry one */
  protected checkNestedFields(root: QueryNode): QueryNode {
    if (this.syntax.operatorFields) {
      return root;
    }

    forEachOperator(root, (node) => {
      if (node.field === null) {
        return;
      }
      const fixed = this.correct(
        'NESTED_QUERY_WITH_FIELD',
        spanOf(node),
        `${this.syntax.label} only accepts fields on search terms (found ${node.field.raw})`,
        () => corrected(node, `field ${node.field?.raw} moved to the terms`)
      );
      if (fixed !== null) {
        // Rewrites in place: the node keeps its identity
        moveFieldFromOperatorToTerms(fixed);
      }
    });
    return root;
  }

  protected fieldFor(raw: string, span: Span = NO_SPAN): SearchField {
    return this.syntax.fields.toSearchField(raw, span) ?? searchField(raw, null, span);
  }

  /** General field as canonical spelling and generic set, null when none or unusable */
  protected resolveGeneralField(): { raw: string; generic: GenericField[] } | null {
    if (this.fieldGeneral === null) {
      return null;
    }

    const direct = this.syntax.fields.normalize(this.fieldGeneral);
    if (direct !== null) {
      return { raw: direct, generic: this.syntax.fields.genericSet(direct) ?? [] };
    }

    const raw = this.correct(
      'FIELD_UNSUPPORTED',
      NO_SPAN,
      `General search field ${this.fieldGeneral} is not supported by ${this.syntax.label}`,
      () => this.convertForeignField(this.fieldGeneral ?? '')
    );
    if (raw === null) {
      return null;
    }
    return { raw, generic: this.syntax.fields.genericSet(raw) ?? [] };
  }

  /**
   * Apply the search-field decision table to every term, using the field it
   * carries or inherits and the general field.
   */
  protected validateFields(root: QueryNode): QueryNode {
    const general = this.resolveGeneralField();
    const terms: Array<{ term: TermNode; field: SearchField | null }> = [];
    forEachTerm(root, (term, field) => terms.push({ term, field }));

    for (const { term, field } of terms) {
      const inString = field === null ? null : this.syntax.fields.genericSet(field.raw);
      const outcome = decideField({
        required: this.syntax.fieldRequired,
        inString: field !== null,
        general: relateGeneralField(general?.generic ?? null, inString),
      });
      const fieldPosition = field && field.span[0] !== -1 ? field.span : term.span;

      switch (outcome.kind) {
        case 'ok':
          break;
        case 'warning': {
          const applied =
            outcome.apply === 'general'
              ? general?.raw ?? null
              : outcome.apply === 'default'
                ? this.syntax.defaultField
                : null;
          const position = outcome.key === 'FIELD_REDUNDANT' ? fieldPosition : term.span;
          const details =
            outcome.key === 'FIELD_REDUNDANT'
              ? `${field?.raw} is also the general field`
              : applied
                ? `No field for "${term.value}"; ${applied} applied`
                : `No field for "${term.value}"`;
          this.addMessage(outcome.key, position, details);
          if (applied !== null) {
            term.field = this.fieldFor(applied);
          }
          break;
        }
        case 'error': {
          if (outcome.correction === 'keep-string') {
            this.correct(
              outcome.key,
              fieldPosition,
              `${field?.raw} in the query differs from the general field ${general?.raw}`,
              () => corrected(field, `kept ${field?.raw} from the query`)
            );
            break;
          }
          const defaultField = this.syntax.defaultField;
          const applied = this.correct(
            outcome.key,
            term.span,
            `${this.syntax.label} requires a search field for "${term.value}"`,
            () =>
              defaultField === null
                ? uncorrectable<SearchField>('No default field is declared')
                : corrected(this.fieldFor(defaultField), `default field ${defaultField} applied`)
          );
          if (applied !== null) {
            term.field = applied;
          }
          break;
        }
      }
    }

    return root;
  }

  /** The same term under the same field twice in one AND/OR group */
  protected checkRedundantTerms(root: QueryNode): void {
    forEachOperator(root, (node) => {
      if (node.operator !== 'AND' && node.operator !== 'OR') {
        return;
      }
      const seen = new Set<string>();
      for (const child of node.children) {
        if (child.type !== 'term') {
          continue;
        }
        const key = `${normalizeTerm(child.value)}|${child.field?.raw ?? node.field?.raw ?? ''}`;
        if (seen.has(key)) {
          this.addMessage('REDUNDANT_TERM', child.span, `"${child.value}" appears twice in ${node.operator}`);
        }
        seen.add(key);
      }
    });
  }

  /** Year, DOI and ISBN values under the matching fields */
  protected checkTermFormats(root: QueryNode): void {
    forEachTerm(root, (term, field) => {
      if (field === null) {
        return;
      }
      const generic = this.syntax.fields.genericSet(field.raw) ?? [];
      const value = term.value.replace(/^"|"$/g, '').trim();

      if (generic.length === 1 && generic[0] === 'Year Published' && !/^\d{4}(\s*-\s*\d{4})?$/.test(value)) {
        this.addMessage('YEAR_FORMAT_INVALID', term.span, `${value} is not a year or a year range`);
      }
      if (generic.includes('DOI') && !/^10\.\d{4,9}\/\S+$/i.test(value)) {
        this.addMessage('DOI_FORMAT_INVALID', term.span, `${value} is not a DOI (10.xxxx/...)`);
      }
      if (generic.includes('ISBN') && !generic.includes('ISSN')) {
        const digits = value.replace(/[-\s]/g, '');
        if (!/^(\d{9}[\dX]|\d{13})$/i.test(digits)) {
          this.addMessage('ISBN_FORMAT_INVALID', term.span, `${value} is not a 10 or 13 digit ISBN`);
        }
      }
    });
  }

  /**
   * Date filters nested below the top-level operator, and journal filters below
   * the root, usually belong to the whole query.
   */
  protected checkFiltersInSubqueries(root: QueryNode): void {
    const visit = (node: QueryNode, inherited: SearchField | null, depth: number): void => {
      const field = node.field ?? inherited;
      if (node.type === 'operator') {
        node.children.forEach((child) => visit(child, field, depth + 1));
        return;
      }
      if (field === null) {
        return;
      }
      const generic = this.syntax.fields.genericSet(field.raw) ?? [];

      if (depth >= 2 && generic.includes('Year Published')) {
        this.addMessage(
          'DATE_FILTER_IN_SUBQUERY',
          node.span,
          'Check whether date filters should apply to the entire query'
        );
      }
      if (depth >= 1 && generic.some((entry) => JOURNAL_FIELDS.has(entry))) {
        this.addMessage(
          'JOURNAL_FILTER_IN_SUBQUERY',
          node.span,
          `Check whether ${field.raw} filters should apply to the entire query`
        );
      }
    };

    visit(root, null, 0);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function joinDetails(details: string, addition: string): string {
  return details ? `${details}. ${addition}` : addition;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

function normalizeTerm(value: string): string {
  return value.replace(/^"|"$/g, '').trim().toLowerCase();
}

/** True when the first token's parenthesis closes at the last token */
function enclosesAll(tokens: Token[]): boolean {
  let depth = 0;
  for (let i = 0; i < tokens.length; i++) {
    if (tokens[i].kind === 'PAREN_OPEN') {
      depth++;
    } else if (tokens[i].kind === 'PAREN_CLOSE') {
      depth--;
      if (depth === 0 && i < tokens.length - 1) {
        return false;
      }
    }
  }
  return true;
}
