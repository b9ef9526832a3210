import { QueryNode } from '../../query/types.js';
import { QueryTranslator, TranslationContext } from '../../translator/QueryTranslator.js';
import { flattenNestedOperators, moveFieldFromOperatorToTerms } from '../../translator/structure.js';
import { GENERIC_SYNTAX } from './syntax.js';

/** Generic trees are already in the intermediate form; only the shape is normalized */
export class GenericTranslator extends QueryTranslator {
  constructor() {
    super(GENERIC_SYNTAX);
  }

  toGeneric(root: QueryNode, _context: TranslationContext): QueryNode {
    return flattenNestedOperators(moveFieldFromOperatorToTerms(root));
  }

  toSpecific(root: QueryNode, _context: TranslationContext): QueryNode {
    return flattenNestedOperators(moveFieldFromOperatorToTerms(root));
  }
}
