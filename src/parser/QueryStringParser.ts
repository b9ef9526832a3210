/**
 * Query String Parser
 *
 * Drives one parse: pre-processing, lexing, token-level linting, tree
 * construction and tree-level linting. Platform parsers provide the lexer and
 * linter, and may override how operands and proximity operators are read.
 *
 * @remarks
 * Two tree builders are available and produce the same shape:
 * - **top-down**: strip enclosing parentheses, split on the level's operators,
 *   recurse into the parts
 * - **bottom-up**: scan once with a stack of open groups, collecting operands
 *   and folding each group when its parenthesis closes
 *
 * Both rely on the linter having inserted artificial parentheses, so every
 * nesting level uses a single operator. NOT levels fold to the left:
 * `a NOT b NOT c` is `NOT[NOT[a, b], c]`.
 */

import { Lexer } from '../lexer/Lexer.js';
import { QueryStringLinter } from '../linter/QueryStringLinter.js';
import { LinterMessage } from '../linter/messages.js';
import { isOperatorToken, operatorKey, operatorKindOf } from '../linter/precedence.js';
import { QuerySyntaxError } from '../linter/QuerySyntaxError.js';
import { PlatformSyntax } from '../platforms/PlatformSyntax.js';
import { near, not, operator, searchField, spanOf, term } from '../query/Query.js';
import { QueryNode, QueryTree, SearchField, Span, Token } from '../query/types.js';
import { trackOperation } from '../utils/logger.js';

export interface ParseResult {
  tree: QueryTree;
  messages: LinterMessage[];
}

export type ParseStrategy = 'top-down' | 'bottom-up';

interface Frame {
  operands: QueryNode[];
  operators: Token[];
  run: Token[];
  field: Token | null;
}

export abstract class QueryStringParser {
  readonly syntax: PlatformSyntax;
  readonly linter: QueryStringLinter;
  protected readonly query: string;

  protected abstract readonly lexer: Lexer;
  protected readonly strategy: ParseStrategy = 'top-down';

  constructor(syntax: PlatformSyntax, linter: QueryStringLinter, query: string) {
    this.syntax = syntax;
    this.linter = linter;
    this.query = query;
  }

  parse(): ParseResult {
    const finish = trackOperation<number>('parsing', `parse:${this.syntax.platform}`, {
      version: this.syntax.version,
      strategy: this.strategy,
      length: this.query.length,
    });

    const query = this.linter.preprocess(this.query);
    const tokens = this.linter.validateTokens(this.lexer.tokenize(query), query);
    this.linter.checkStatus();

    const built = this.buildTree(tokens);
    const root = this.linter.validateQueryTree(built);
    this.linter.checkStatus();

    finish(this.linter.messages.length);
    return {
      tree: { platform: this.syntax.platform, version: this.syntax.version, root },
      messages: [...this.linter.messages],
    };
  }

  buildTree(tokens: Token[]): QueryNode {
    return this.strategy === 'bottom-up' ? this.parseBottomUp(tokens) : this.parseTopDown(tokens);
  }

  // ==========================================================================
  // Top-down
  // ==========================================================================

  protected parseTopDown(tokens: Token[]): QueryNode {
    let inner = tokens;
    while (
      inner.length >= 2 &&
      inner[0].kind === 'PAREN_OPEN' &&
      closingIndex(inner, 0) === inner.length - 1
    ) {
      inner = inner.slice(1, -1);
    }

    const operands: Token[][] = [];
    const operators: Token[] = [];
    let current: Token[] = [];
    let depth = 0;

    for (const token of inner) {
      if (token.kind === 'PAREN_OPEN') {
        depth++;
      } else if (token.kind === 'PAREN_CLOSE') {
        depth--;
      }

      if (depth === 0 && isOperatorToken(token)) {
        operands.push(current);
        operators.push(token);
        current = [];
      } else {
        current.push(token);
      }
    }
    operands.push(current);

    if (operators.length === 0) {
      return this.parseOperand(inner, (group) => this.parseTopDown(group));
    }
    return this.combine(
      operators,
      operands.map((operand) => this.parseTopDown(operand))
    );
  }

  // ==========================================================================
  // Bottom-up
  // ==========================================================================

  protected parseBottomUp(tokens: Token[]): QueryNode {
    const newFrame = (field: Token | null): Frame => ({ operands: [], operators: [], run: [], field });
    const stack: Frame[] = [newFrame(null)];
    const top = () => stack[stack.length - 1];

    const flush = (frame: Frame) => {
      if (frame.run.length > 0) {
        frame.operands.push(this.parseOperand(frame.run, (group) => this.parseBottomUp(group)));
        frame.run = [];
      }
    };

    for (const token of tokens) {
      const frame = top();
      if (token.kind === 'PAREN_OPEN') {
        const last = frame.run[frame.run.length - 1];
        const field = last && last.kind === 'FIELD' ? last : null;
        if (field) {
          frame.run.pop();
        }
        flush(frame);
        stack.push(newFrame(field));
      } else if (token.kind === 'PAREN_CLOSE') {
        flush(frame);
        stack.pop();
        const node = this.reduce(frame);
        if (frame.field) {
          this.applyField(node, this.fieldFromToken(frame.field));
        }
        top().operands.push(node);
      } else if (isOperatorToken(token)) {
        flush(frame);
        frame.operators.push(token);
      } else {
        frame.run.push(token);
      }
    }

    const root = top();
    flush(root);
    return this.reduce(root);
  }

  private reduce(frame: Frame): QueryNode {
    if (frame.operators.length === 0) {
      if (frame.operands.length !== 1) {
        this.fail(frameSpan(frame), 'Expected a single operand in the group');
      }
      return frame.operands[0];
    }
    return this.combine(frame.operators, frame.operands);
  }

  // ==========================================================================
  // Shared construction
  // ==========================================================================

  /**
   * Read one operand: a term with an optional field, or a fielded group.
   * `parseGroup` builds the node for a parenthesized group.
   */
  protected parseOperand(tokens: Token[], parseGroup: (group: Token[]) => QueryNode): QueryNode {
    const [first, second] = tokens;
    if (!first) {
      this.fail([-1, -1], 'Missing search term');
    }

    if (this.syntax.fieldPlacement === 'prefix' && first.kind === 'FIELD') {
      const rest = tokens.slice(1);
      if (rest.length === 0) {
        this.fail(first.span, `Search field ${first.value} without a term`);
      }
      const field = this.fieldFromToken(first);
      if (rest[0].kind === 'PAREN_OPEN') {
        const node = parseGroup(rest);
        this.applyField(node, field);
        return node;
      }
      if (rest.length !== 1 || rest[0].kind !== 'TERM') {
        this.fail(rest[0].span, `Unexpected ${rest[0].value} after ${first.value}`);
      }
      return term(rest[0].value, { field, span: rest[0].span });
    }

    if (first.kind === 'PAREN_OPEN') {
      return parseGroup(tokens);
    }

    if (first.kind !== 'TERM') {
      this.fail(first.span, `Expected a search term, found ${first.value}`);
    }

    if (second === undefined) {
      return term(first.value, { span: first.span });
    }
    if (this.syntax.fieldPlacement === 'suffix' && second.kind === 'FIELD' && tokens.length === 2) {
      return this.termWithSuffix(first, second);
    }
    this.fail(second.span, `Unexpected ${second.value} after ${first.value}`);
  }

  /** Term followed by its field token; platforms with parameterized suffixes override */
  protected termWithSuffix(termToken: Token, fieldToken: Token): QueryNode {
    return term(termToken.value, { field: this.fieldFromToken(fieldToken), span: termToken.span });
  }

  protected fieldFromToken(token: Token): SearchField {
    return (
      this.syntax.fields.toSearchField(token.value, token.span) ??
      searchField(token.value, null, token.span)
    );
  }

  protected applyField(node: QueryNode, field: SearchField): void {
    if (node.field === null) {
      node.field = field;
    }
  }

  /** Distance and order of a proximity token such as `NEAR/3`, `N3` or `W3` */
  protected parseProximity(token: Token): { distance: number; ordered: boolean } {
    const digits = token.value.match(/\d+/);
    return {
      distance: digits ? parseInt(digits[0], 10) : this.syntax.maxNearDistance ?? 0,
      ordered: token.value.toUpperCase().startsWith('W'),
    };
  }

  protected combine(operators: Token[], children: QueryNode[]): QueryNode {
    const keys = new Set(operators.map(operatorKey));
    if (keys.size > 1) {
      this.fail(operators[1].span, 'Operators at one level must be identical after grouping');
    }

    const first = operators[0];
    const kind = operatorKindOf(first);
    const span = coverSpan(children);

    if (kind === 'NOT') {
      let node = children[0];
      for (const excluded of children.slice(1)) {
        node = not(node, excluded, { span: coverSpan([node, excluded]) });
      }
      return node;
    }

    if (kind === 'NEAR') {
      const { distance, ordered } = this.parseProximity(first);
      return near(distance, children, { ordered, span });
    }

    return operator(kind, children, { span });
  }

  protected fail(position: Span, details: string): never {
    this.linter.addMessage('INVALID_SYNTAX', position, details);
    throw new QuerySyntaxError({
      query: this.query,
      platform: this.syntax.platform,
      messages: this.linter.messages,
    });
  }
}

// ============================================================================
// Helpers
// ============================================================================

function closingIndex(tokens: Token[], openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < tokens.length; i++) {
    if (tokens[i].kind === 'PAREN_OPEN') {
      depth++;
    } else if (tokens[i].kind === 'PAREN_CLOSE') {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}

function coverSpan(nodes: QueryNode[]): Span {
  const spans = nodes.map(spanOf).filter(([start]) => start !== -1);
  if (spans.length === 0) {
    return [-1, -1];
  }
  return [Math.min(...spans.map(([start]) => start)), Math.max(...spans.map(([, end]) => end))];
}

function frameSpan(frame: Frame): Span {
  const token = frame.operators[0] ?? frame.run[0];
  return token ? token.span : [-1, -1];
}
