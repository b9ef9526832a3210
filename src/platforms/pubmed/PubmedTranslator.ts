import { operator, spanOf } from '../../query/Query.js';
import { QueryNode } from '../../query/types.js';
import { QueryTranslator, TranslationContext } from '../../translator/QueryTranslator.js';
import { PlatformSyntax } from '../PlatformSyntax.js';
import { phraseProximityField, PUBMED_SYNTAX } from './syntax.js';

export class PubmedTranslator extends QueryTranslator {
  constructor(syntax: PlatformSyntax = PUBMED_SYNTAX) {
    super(syntax);
  }

  /** NEAR groups PubMed cannot write as a phrase search become AND */
  protected adaptSpecific(root: QueryNode, context: TranslationContext): QueryNode {
    const visit = (node: QueryNode): QueryNode => {
      if (node.type === 'term') {
        return node;
      }
      node.children = node.children.map(visit);
      if (node.operator !== 'NEAR' || phraseProximityField(node) !== null) {
        return node;
      }

      this.warn(
        context,
        'PROXIMITY_DEGRADED',
        spanOf(node),
        `NEAR/${node.distance} cannot be expressed in PubMed for these terms; AND used`
      );
      return operator('AND', node.children, { field: node.field, span: node.span });
    };

    return visit(root);
  }
}
