import { LinterOptions, QueryStringLinter } from '../../linter/QueryStringLinter.js';
import { GENERIC_SYNTAX } from './syntax.js';

/** Tree-level checks for generic trees built in code */
export class GenericLinter extends QueryStringLinter {
  constructor(options: LinterOptions = {}) {
    super(GENERIC_SYNTAX, options);
  }
}
