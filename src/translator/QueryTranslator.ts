/**
 * Query Translator
 *
 * Converts platform trees to the generic intermediate representation and back.
 * Platform trees carry the platform's own field tokens; generic trees carry one
 * generic field per term.
 *
 * @remarks
 * **Field cardinalities:**
 * - 1:1 fields map directly
 * - combined (1:n) fields such as `[tiab]` expand into an OR of atomic copies,
 *   and are recombined on the way back when an OR's branches share one value
 *   over exactly a known combination
 * - n:1 spellings (EBSCOHost `KW`/`ZW`) emit the first declared spelling
 * - legacy tags without a generic equivalent are dropped with a warning
 *
 * A generic field the target lacks is broadened to the narrowest field
 * containing it, or to the platform's fallback field.
 */

import { createMessage, LinterMessage, QueryErrorKey } from '../linter/messages.js';
import { PlatformSyntax } from '../platforms/PlatformSyntax.js';
import { cloneNode, forEachOperator, near, operator, searchField, spanOf } from '../query/Query.js';
import { QueryStructureError } from '../query/QueryStructureError.js';
import {
  GenericField,
  isGenericField,
  NearNode,
  NO_SPAN,
  QueryNode,
  SearchField,
  Span,
  TermNode,
} from '../query/types.js';
import { debugLog } from '../utils/logger.js';
import {
  flattenNestedOperators,
  moveFieldFromOperatorToTerms,
  moveFieldsToOperator,
  pruneTerms,
} from './structure.js';

export interface TranslationContext {
  /** Receives the warnings for lossy steps */
  messages: LinterMessage[];
  /** Field applied to terms that carry none */
  fieldGeneral?: string | null;
}

/** A term or a NEAR group of terms that share one generic field */
interface FieldUnit {
  index: number;
  key: string;
  field: GenericField;
}

export class QueryTranslator {
  readonly syntax: PlatformSyntax;

  constructor(syntax: PlatformSyntax) {
    this.syntax = syntax;
  }

  protected warn(context: TranslationContext, key: QueryErrorKey, position: Span, details: string): void {
    context.messages.push(createMessage(key, position, details));
    debugLog('translation', details, { platform: this.syntax.platform, key });
  }

  // ==========================================================================
  // Platform → generic
  // ==========================================================================

  toGeneric(root: QueryNode, context: TranslationContext): QueryNode {
    if (!this.syntax.operatorFields) {
      forEachOperator(root, (node) => {
        if (node.field !== null) {
          throw new QueryStructureError(
            `${this.syntax.label} does not support fields on nested queries (found ${node.field.raw})`,
            { platform: this.syntax.platform, node: node.operator }
          );
        }
      });
    }

    const general = this.generalField(context.fieldGeneral ?? null);
    let result = moveFieldFromOperatorToTerms(root, general);

    const pruned = pruneTerms(result, (term) => {
      const set = term.field ? this.genericSetOf(term.field) : null;
      return set !== null && set.length === 0;
    });
    for (const dropped of pruned.removed) {
      this.warn(
        context,
        'TERM_DROPPED',
        spanOf(dropped),
        `"${dropped.value}" (${dropped.field?.raw ?? 'no field'}) has no equivalent and was removed`
      );
    }
    if (pruned.node === null) {
      throw new QueryStructureError('No search terms are left after translation', {
        platform: this.syntax.platform,
      });
    }

    result = this.expandCombinedFields(pruned.node);
    return flattenNestedOperators(result);
  }

  private generalField(raw: string | null): SearchField | null {
    if (raw === null || raw.trim() === '') {
      return null;
    }
    return this.syntax.fields.toSearchField(raw, NO_SPAN);
  }

  protected genericSetOf(field: SearchField): GenericField[] {
    const set = this.syntax.fields.genericSet(field.raw);
    if (set === null) {
      throw new QueryStructureError(`Unknown search field ${field.raw} for ${this.syntax.label}`, {
        platform: this.syntax.platform,
      });
    }
    return set;
  }

  private expandCombinedFields(node: QueryNode): QueryNode {
    if (node.type === 'term') {
      if (node.field === null) {
        return node;
      }
      const set = this.genericSetOf(node.field);
      if (set.length === 1) {
        node.field = genericField(set[0], node.field.span);
        return node;
      }
      return operator(
        'OR',
        set.map((generic) => ({ ...node, field: genericField(generic, node.field?.span ?? NO_SPAN) })),
        { span: node.span }
      );
    }

    if (node.operator === 'NEAR') {
      const shared = sharedTermField(node);
      if (shared !== null) {
        const set = this.genericSetOf(shared);
        const copies = set.map((generic) => {
          const copy = cloneNode(node);
          for (const child of copy.children) {
            child.field = genericField(generic, child.field?.span ?? NO_SPAN);
          }
          return copy;
        });
        return copies.length === 1 ? copies[0] : operator('OR', copies, { span: node.span });
      }
    }

    node.children = node.children.map((child) => this.expandCombinedFields(child));
    return node;
  }

  // ==========================================================================
  // Generic → platform
  // ==========================================================================

  toSpecific(root: QueryNode, context: TranslationContext): QueryNode {
    let result = moveFieldFromOperatorToTerms(root);
    result = this.convert(result, context);
    result = this.adaptSpecific(result, context);
    result = flattenNestedOperators(result);
    return this.syntax.operatorFields ? moveFieldsToOperator(result) : result;
  }

  /** Hook for platform rules applied after the fields were mapped */
  protected adaptSpecific(root: QueryNode, _context: TranslationContext): QueryNode {
    return root;
  }

  private convert(node: QueryNode, context: TranslationContext): QueryNode {
    if (node.type === 'term') {
      node.field = this.mapField(node, context);
      return node;
    }

    if (node.operator !== 'OR') {
      node.children = node.children.map((child) => this.convert(child, context));
      return node;
    }

    const done = new Set<QueryNode>();
    const children = this.recombine(node.children, done).map((child) =>
      done.has(child) ? child : this.convert(child, context)
    );
    if (children.length === 1) {
      const [only] = children;
      if (node.field !== null && only.field === null) {
        only.field = node.field;
      }
      return only;
    }
    node.children = children;
    return node;
  }

  /**
   * Merge OR branches that repeat one value over the generic fields of a
   * combined platform field. Merged nodes are added to `done`.
   */
  private recombine(children: QueryNode[], done: Set<QueryNode>): QueryNode[] {
    const combinations = this.syntax.fields.combinations();
    if (combinations.length === 0) {
      return children;
    }

    const units = children.flatMap((child, index) => {
      const unit = fieldUnit(child, index);
      return unit ? [unit] : [];
    });
    const byKey = new Map<string, FieldUnit[]>();
    for (const unit of units) {
      byKey.set(unit.key, [...(byKey.get(unit.key) ?? []), unit]);
    }

    const replaced = new Map<number, QueryNode>();
    const removed = new Set<number>();

    for (const group of byKey.values()) {
      let remaining = group;
      for (const combination of combinations) {
        const members = combination.generic.map((generic) =>
          remaining.find((unit) => unit.field === generic)
        );
        if (!members.every((member): member is FieldUnit => member !== undefined)) {
          continue;
        }

        const [first, ...others] = members.sort((a, b) => a.index - b.index);
        const merged = withPlatformField(children[first.index], this.syntax.fields.toSearchField(combination.syntax, NO_SPAN));
        replaced.set(first.index, merged);
        done.add(merged);
        for (const other of others) {
          removed.add(other.index);
        }
        remaining = remaining.filter((unit) => !members.includes(unit));
      }
    }

    return children.flatMap((child, index) => {
      if (removed.has(index)) {
        return [];
      }
      return [replaced.get(index) ?? child];
    });
  }

  private mapField(term: TermNode, context: TranslationContext): SearchField | null {
    const field = term.field;
    if (field === null) {
      const fallback = this.syntax.defaultField;
      if (!this.syntax.fieldRequired || fallback === null) {
        return null;
      }
      this.warn(
        context,
        'FIELD_IMPLICIT',
        spanOf(term),
        `No field for "${term.value}"; ${fallback} applied`
      );
      return this.platformField(fallback, field);
    }

    const generic = field.generic ?? (isGenericField(field.raw) ? field.raw : null);
    if (generic === null) {
      throw new QueryStructureError(`${field.raw} is not a generic search field`, {
        platform: this.syntax.platform,
      });
    }

    const exact = this.syntax.fields.fromGenericSet([generic]);
    if (exact !== null) {
      return this.platformField(exact, field);
    }

    const replacement = this.syntax.fields.closest(generic) ?? this.syntax.fallbackField;
    this.warn(
      context,
      'FIELD_SUBSTITUTED',
      spanOf(term),
      `${this.syntax.label} has no ${generic} field; ${replacement} used for "${term.value}"`
    );
    return this.platformField(replacement, field);
  }

  private platformField(raw: string, original: SearchField | null): SearchField {
    const span = original?.span ?? NO_SPAN;
    return this.syntax.fields.toSearchField(raw, span) ?? searchField(raw, null, span);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function genericField(field: GenericField, span: Span): SearchField {
  return searchField(field, field, span);
}

function sharedTermField(node: NearNode): SearchField | null {
  const first = node.children[0];
  if (first.type !== 'term' || first.field === null) {
    return null;
  }
  const raw = first.field.raw;
  const shared = node.children.every((child) => child.type === 'term' && child.field?.raw === raw);
  return shared ? first.field : null;
}

function unitField(field: SearchField | null): GenericField | null {
  if (field === null) {
    return null;
  }
  return field.generic ?? (isGenericField(field.raw) ? field.raw : null);
}

function fieldUnit(node: QueryNode, index: number): FieldUnit | null {
  if (node.type === 'term') {
    const field = unitField(node.field);
    return field ? { index, key: `term:${node.value}`, field } : null;
  }

  if (node.operator !== 'NEAR') {
    return null;
  }
  const shared = sharedTermField(node);
  const field = unitField(shared);
  if (field === null) {
    return null;
  }
  const values = node.children.flatMap((child) => (child.type === 'term' ? [child.value] : []));
  return {
    index,
    key: `near:${node.distance}:${node.ordered}:${values.join('\u0000')}`,
    field,
  };
}

function withPlatformField(node: QueryNode, field: SearchField | null): QueryNode {
  if (field === null) {
    return node;
  }
  if (node.type === 'term') {
    return { ...node, field: { ...field } };
  }
  if (node.operator !== 'NEAR') {
    return node;
  }
  return near(
    node.distance,
    node.children.map((child) => ({ ...cloneNode(child), field: { ...field } })),
    { ordered: node.ordered, span: node.span }
  );
}
