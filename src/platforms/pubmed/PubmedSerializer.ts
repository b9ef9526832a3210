import { QuerySerializer } from '../../serializer/QuerySerializer.js';
import { OperatorNode, QueryNode, SearchField } from '../../query/types.js';
import { PlatformSyntax } from '../PlatformSyntax.js';
import { phraseProximityField, phraseWords, PUBMED_SYNTAX } from './syntax.js';

/**
 * PubMed writes fields after each term (`diabetes[ti]`), so a field found on an
 * operator is pushed down to the terms while rendering. Proximity is written
 * as a phrase: `"a b"[tiab:~3]`.
 */
export class PubmedSerializer extends QuerySerializer {
  constructor(syntax: PlatformSyntax = PUBMED_SYNTAX) {
    super(syntax);
  }

  protected operatorLabel(node: OperatorNode): string {
    // NEAR only gets here when it cannot be written as a phrase
    return node.operator === 'NEAR' ? 'AND' : node.operator;
  }

  protected render(node: QueryNode, inherited: SearchField | null, top: boolean): string {
    if (node.type === 'term') {
      return this.renderTerm(node, node.field ?? inherited);
    }

    const proximityField = phraseProximityField(node, inherited);
    if (node.operator === 'NEAR' && proximityField !== null) {
      const words = node.children.flatMap((child) => (child.type === 'term' ? phraseWords(child.value) : []));
      return `"${words.join(' ')}"${proximityField.raw.slice(0, -1)}:~${node.distance}]`;
    }

    const body = node.children
      .map((child) => this.render(child, node.field ?? inherited, false))
      .join(` ${this.operatorLabel(node)} `);
    return top ? body : `(${body})`;
  }
}
