import { QuerySerializer } from '../../serializer/QuerySerializer.js';
import { OperatorNode } from '../../query/types.js';
import { PlatformSyntax } from '../PlatformSyntax.js';
import { WOS_SYNTAX } from './syntax.js';

/** `TI=term`, `TI=(a OR b)`, `a NEAR/3 b` */
export class WosSerializer extends QuerySerializer {
  constructor(syntax: PlatformSyntax = WOS_SYNTAX) {
    super(syntax);
  }

  protected operatorLabel(node: OperatorNode): string {
    return node.operator === 'NEAR' ? `NEAR/${node.distance}` : node.operator;
  }
}
