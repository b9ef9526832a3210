import { PlatformSyntax, attachField } from '../platforms/PlatformSyntax.js';
import { OperatorNode, QueryNode, SearchField, TermNode } from '../query/types.js';

/**
 * Renders a platform tree as a query string. Nested operators are always
 * parenthesized, so the output never depends on operator precedence.
 * Serializers never raise.
 */
export abstract class QuerySerializer {
  readonly syntax: PlatformSyntax;

  constructor(syntax: PlatformSyntax) {
    this.syntax = syntax;
  }

  serialize(root: QueryNode): string {
    return this.render(root, null, true);
  }

  protected abstract operatorLabel(node: OperatorNode): string;

  protected render(node: QueryNode, inherited: SearchField | null, top: boolean): string {
    if (node.type === 'term') {
      return this.renderTerm(node, node.field);
    }

    const body = node.children
      .map((child) => this.render(child, node.field ?? inherited, false))
      .join(` ${this.operatorLabel(node)} `);

    if (node.field !== null) {
      return attachField(this.syntax, node.field.raw, `(${body})`);
    }
    return top ? body : `(${body})`;
  }

  protected renderTerm(term: TermNode, field: SearchField | null): string {
    return field === null ? term.value : attachField(this.syntax, field.raw, term.value);
  }
}
