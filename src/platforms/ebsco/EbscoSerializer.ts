import { QuerySerializer } from '../../serializer/QuerySerializer.js';
import { OperatorNode } from '../../query/types.js';
import { PlatformSyntax } from '../PlatformSyntax.js';
import { EBSCO_SYNTAX } from './syntax.js';

/** `TI term`, `TI (a OR b)`, `a N3 b`, `a W3 b` */
export class EbscoSerializer extends QuerySerializer {
  constructor(syntax: PlatformSyntax = EBSCO_SYNTAX) {
    super(syntax);
  }

  protected operatorLabel(node: OperatorNode): string {
    if (node.operator !== 'NEAR') {
      return node.operator;
    }
    return `${node.ordered ? 'W' : 'N'}${node.distance}`;
  }
}
