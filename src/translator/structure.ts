/**
 * Structural rewrites shared by translators and linter corrections. All of them
 * return the (possibly new) root; nodes are modified in place where the shape
 * allows it.
 */

import { withChildren } from '../query/Query.js';
import { OperatorNode, QueryNode, SearchField, TermNode } from '../query/types.js';

/**
 * Push operator-level fields down to the terms below that have none, then clear
 * them on the operators. `TI=(a OR b)` becomes `OR[TI=a, TI=b]`.
 */
export function moveFieldFromOperatorToTerms(
  node: QueryNode,
  inherited: SearchField | null = null
): QueryNode {
  if (node.type === 'term') {
    if (node.field === null && inherited !== null) {
      node.field = { ...inherited };
    }
    return node;
  }

  const field = node.field ?? inherited;
  node.field = null;
  node.children = node.children.map((child) => moveFieldFromOperatorToTerms(child, field));
  return node;
}

/**
 * Hoist a field shared by all children to the parent. Only applies when every
 * child is a term carrying the identical field; runs bottom-up.
 */
export function moveFieldsToOperator(node: QueryNode): QueryNode {
  if (node.type === 'term') {
    return node;
  }

  node.children = node.children.map(moveFieldsToOperator);

  if (node.field !== null) {
    return node;
  }

  const terms = node.children.filter((child): child is TermNode => child.type === 'term');
  if (terms.length !== node.children.length) {
    return node;
  }

  const first = terms[0].field;
  if (first === null || !terms.every((child) => child.field?.raw === first.raw)) {
    return node;
  }

  node.field = { ...first };
  for (const child of terms) {
    child.field = null;
  }
  return node;
}

function canMerge(parent: OperatorNode, child: QueryNode): boolean {
  if (child.type === 'term' || child.operator !== parent.operator) {
    return false;
  }
  if (parent.operator !== 'AND' && parent.operator !== 'OR') {
    return false;
  }
  if (child.field?.raw !== parent.field?.raw) {
    return false;
  }
  return true;
}

/**
 * Merge same-kind associative operators: `AND[AND[x, y], z]` becomes
 * `AND[x, y, z]`. NOT and NEAR are never merged.
 */
export function flattenNestedOperators(node: QueryNode): QueryNode {
  if (node.type === 'term') {
    return node;
  }

  const children: QueryNode[] = [];
  for (const child of node.children.map(flattenNestedOperators)) {
    if (canMerge(node, child) && child.type === 'operator') {
      children.push(...child.children);
    } else {
      children.push(child);
    }
  }
  node.children = children;
  return node;
}

export interface PruneResult {
  node: QueryNode | null;
  /** Terms removed, including those lost with an unrepresentable NOT */
  removed: TermNode[];
}

function termsOf(node: QueryNode): TermNode[] {
  if (node.type === 'term') {
    return [node];
  }
  return node.children.flatMap(termsOf);
}

/**
 * Remove the terms matching `shouldRemove`. Operators left with one child
 * collapse into that child; a NOT whose included part disappears is removed
 * entirely, one whose excluded part disappears collapses into the included part.
 */
export function pruneTerms(
  node: QueryNode,
  shouldRemove: (term: TermNode) => boolean
): PruneResult {
  if (node.type === 'term') {
    return shouldRemove(node) ? { node: null, removed: [node] } : { node, removed: [] };
  }

  const results = node.children.map((child) => pruneTerms(child, shouldRemove));
  const removed = results.flatMap((result) => result.removed);

  if (node.operator === 'NOT') {
    const [included, excluded] = results;
    if (included.node === null) {
      const lost = excluded.node ? termsOf(excluded.node) : [];
      return { node: null, removed: [...removed, ...lost] };
    }
    if (excluded.node === null) {
      return { node: inheritField(node, included.node), removed };
    }
    return { node: withChildren(node, [included.node, excluded.node]), removed };
  }

  const kept = results.flatMap((result) => (result.node ? [result.node] : []));
  if (kept.length === 0) {
    return { node: null, removed };
  }
  if (kept.length === 1) {
    return { node: inheritField(node, kept[0]), removed };
  }
  return { node: withChildren(node, kept), removed };
}

function inheritField(parent: OperatorNode, child: QueryNode): QueryNode {
  if (parent.field !== null && child.field === null) {
    child.field = parent.field;
  }
  return child;
}
