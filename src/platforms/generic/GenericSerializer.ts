import { QuerySerializer } from '../../serializer/QuerySerializer.js';
import { OperatorNode, QueryNode, SearchField } from '../../query/types.js';
import { GENERIC_SYNTAX } from './syntax.js';

/**
 * Pre-notation rendering of generic trees:
 * `AND[diabetes[Title], NEAR/3[heart[Abstract], attack[Abstract]]]`.
 */
export class GenericSerializer extends QuerySerializer {
  constructor() {
    super(GENERIC_SYNTAX);
  }

  protected operatorLabel(node: OperatorNode): string {
    if (node.operator !== 'NEAR') {
      return node.operator;
    }
    return node.ordered ? `WITHIN/${node.distance}` : `NEAR/${node.distance}`;
  }

  protected render(node: QueryNode, _inherited: SearchField | null, _top: boolean): string {
    if (node.type === 'term') {
      return node.field === null ? node.value : `${node.value}[${node.field.raw}]`;
    }
    const children = node.children.map((child) => this.render(child, null, false)).join(', ');
    const rendered = `${this.operatorLabel(node)}[${children}]`;
    return node.field === null ? rendered : `${rendered}[${node.field.raw}]`;
  }
}
