/**
 * Query tree construction and traversal helpers.
 *
 * Every operator node is created through {@link operator} or {@link near}, which
 * enforce the structural invariants:
 * - AND, OR and NEAR combine at least two children
 * - NOT has exactly two children and means "first AND NOT second"
 * - NEAR distance is a non-negative integer
 *
 * Constructors copy the children array so a parent owns its children exclusively.
 */

import { QueryStructureError } from './QueryStructureError.js';
import {
  GenericField,
  LogicalNode,
  LogicalOperator,
  NearNode,
  NO_SPAN,
  OperatorKind,
  OperatorNode,
  QueryNode,
  QueryTree,
  SearchField,
  Span,
  TermNode,
} from './types.js';

export interface NodeOptions {
  field?: SearchField | null;
  span?: Span;
}

// ============================================================================
// Constructors
// ============================================================================

export function searchField(
  raw: string,
  generic: GenericField | null = null,
  span: Span = NO_SPAN
): SearchField {
  return { raw, generic, span };
}

export function term(value: string, options: NodeOptions = {}): TermNode {
  if (value.trim() === '') {
    throw new QueryStructureError('Search terms cannot be empty');
  }

  return {
    type: 'term',
    value,
    field: options.field ?? null,
    span: options.span ?? NO_SPAN,
  };
}

export function assertArity(kind: OperatorKind, childCount: number): void {
  if (kind === 'NOT' && childCount !== 2) {
    throw new QueryStructureError(
      `NOT requires exactly two children (first AND NOT second), got ${childCount}`,
      { node: kind }
    );
  }

  if (childCount < 2) {
    throw new QueryStructureError(`${kind} requires at least two children, got ${childCount}`, {
      node: kind,
    });
  }
}

export function operator(
  kind: LogicalOperator,
  children: QueryNode[],
  options: NodeOptions = {}
): LogicalNode {
  assertArity(kind, children.length);

  return {
    type: 'operator',
    operator: kind,
    field: options.field ?? null,
    children: [...children],
    span: options.span ?? NO_SPAN,
  };
}

export function near(
  distance: number,
  children: QueryNode[],
  options: NodeOptions & { ordered?: boolean } = {}
): NearNode {
  if (!Number.isInteger(distance) || distance < 0) {
    throw new QueryStructureError(
      `NEAR distance must be a non-negative integer, got ${distance}`,
      { node: 'NEAR' }
    );
  }
  assertArity('NEAR', children.length);

  return {
    type: 'operator',
    operator: 'NEAR',
    distance,
    ordered: options.ordered ?? false,
    field: options.field ?? null,
    children: [...children],
    span: options.span ?? NO_SPAN,
  };
}

export function and(children: QueryNode[], options?: NodeOptions): LogicalNode {
  return operator('AND', children, options);
}

export function or(children: QueryNode[], options?: NodeOptions): LogicalNode {
  return operator('OR', children, options);
}

export function not(included: QueryNode, excluded: QueryNode, options?: NodeOptions): LogicalNode {
  return operator('NOT', [included, excluded], options);
}

/**
 * Rebuild an operator node with new children, keeping kind, distance and field.
 * Goes through the constructors so the invariants are checked again.
 */
export function withChildren(node: OperatorNode, children: QueryNode[]): OperatorNode {
  if (node.operator === 'NEAR') {
    return near(node.distance, children, {
      ordered: node.ordered,
      field: node.field,
      span: node.span,
    });
  }
  return operator(node.operator, children, { field: node.field, span: node.span });
}

// ============================================================================
// Copying and comparison
// ============================================================================

function cloneField(field: SearchField | null): SearchField | null {
  return field ? { ...field } : null;
}

export function cloneNode(node: TermNode): TermNode;
export function cloneNode(node: OperatorNode): OperatorNode;
export function cloneNode(node: QueryNode): QueryNode;
export function cloneNode(node: QueryNode): QueryNode {
  if (node.type === 'term') {
    return { ...node, field: cloneField(node.field) };
  }
  return {
    ...node,
    field: cloneField(node.field),
    children: node.children.map((child) => cloneNode(child)),
  };
}

export function cloneTree(tree: QueryTree): QueryTree {
  return { ...tree, root: cloneNode(tree.root) };
}

function fieldsEqual(a: SearchField | null, b: SearchField | null): boolean {
  if (a === null || b === null) {
    return a === b;
  }
  return a.raw === b.raw;
}

/**
 * Structural equality: operators, distances, values and field tokens.
 * Spans are ignored.
 */
export function nodesEqual(a: QueryNode, b: QueryNode): boolean {
  if (!fieldsEqual(a.field, b.field)) {
    return false;
  }

  if (a.type === 'term' || b.type === 'term') {
    return a.type === 'term' && b.type === 'term' && a.value === b.value;
  }

  if (a.operator !== b.operator || a.children.length !== b.children.length) {
    return false;
  }

  if (a.operator === 'NEAR' && b.operator === 'NEAR') {
    if (a.distance !== b.distance || a.ordered !== b.ordered) {
      return false;
    }
  }

  return a.children.every((child, index) => nodesEqual(child, b.children[index]));
}

// ============================================================================
// Traversal
// ============================================================================

/**
 * Visit every term with the field it carries or inherits from the closest
 * ancestor operator.
 */
export function forEachTerm(
  node: QueryNode,
  visit: (term: TermNode, inherited: SearchField | null) => void,
  inherited: SearchField | null = null
): void {
  if (node.type === 'term') {
    visit(node, node.field ?? inherited);
    return;
  }

  const field = node.field ?? inherited;
  for (const child of node.children) {
    forEachTerm(child, visit, field);
  }
}

export function collectTerms(node: QueryNode): TermNode[] {
  const terms: TermNode[] = [];
  forEachTerm(node, (found) => terms.push(found));
  return terms;
}

export function forEachOperator(node: QueryNode, visit: (operatorNode: OperatorNode) => void): void {
  if (node.type === 'term') {
    return;
  }
  visit(node);
  for (const child of node.children) {
    forEachOperator(child, visit);
  }
}

export function operatorLabel(node: OperatorNode): string {
  return node.operator === 'NEAR' ? `NEAR/${node.distance}` : node.operator;
}

export function nodeLabel(node: QueryNode): string {
  if (node.type === 'term') {
    return node.field ? `${node.value} (${node.field.raw})` : node.value;
  }
  return `${operatorLabel(node)} with ${node.children.length} children`;
}

/** Smallest span covering all user-written parts of a node */
export function spanOf(node: QueryNode): Span {
  if (node.span[0] !== -1) {
    return node.span;
  }
  if (node.type === 'term') {
    return node.span;
  }

  let start = -1;
  let end = -1;
  for (const child of node.children) {
    const [childStart, childEnd] = spanOf(child);
    if (childStart === -1) {
      continue;
    }
    start = start === -1 ? childStart : Math.min(start, childStart);
    end = Math.max(end, childEnd);
  }
  return [start, end];
}
