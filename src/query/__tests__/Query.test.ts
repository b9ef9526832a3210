import { describe, it, expect } from '@jest/globals';
import {
  and,
  cloneNode,
  collectTerms,
  forEachTerm,
  near,
  nodeLabel,
  nodesEqual,
  not,
  operator,
  or,
  searchField,
  spanOf,
  term,
  withChildren,
} from '../Query.js';
import { QueryStructureError } from '../QueryStructureError.js';
import { SearchField, TermNode } from '../types.js';

const title = searchField('[ti]', 'Title');

describe('Query', () => {
  describe('constructors', () => {
    it('should build a term with defaults', () => {
      const node = term('diabetes');

      expect(node).toEqual({ type: 'term', value: 'diabetes', field: null, span: [-1, -1] });
    });

    it('should reject empty terms', () => {
      expect(() => term('  ')).toThrow(QueryStructureError);
    });

    it('should require two children for AND and OR', () => {
      expect(() => and([term('a')])).toThrow('AND requires at least two children, got 1');
      expect(() => or([])).toThrow(QueryStructureError);
    });

    it('should require exactly two children for NOT', () => {
      expect(() => operator('NOT', [term('a'), term('b'), term('c')])).toThrow(
        'NOT requires exactly two children (first AND NOT second), got 3'
      );
    });

    it('should reject negative or fractional NEAR distances', () => {
      expect(() => near(-1, [term('a'), term('b')])).toThrow(QueryStructureError);
      expect(() => near(1.5, [term('a'), term('b')])).toThrow(QueryStructureError);
    });

    it('should copy the children array', () => {
      const children = [term('a'), term('b')];
      const node = or(children);
      children.push(term('c'));

      expect(node.children).toHaveLength(2);
    });

    it('should keep distance and order when rebuilding a NEAR node', () => {
      const node = near(3, [term('a'), term('b')], { ordered: true, field: title });
      const rebuilt = withChildren(node, [term('x'), term('y')]);

      expect(rebuilt).toMatchObject({ operator: 'NEAR', distance: 3, ordered: true, field: title });
    });
  });

  describe('cloneNode', () => {
    it('should produce an independent deep copy', () => {
      const original = and([term('a', { field: title }), or([term('b'), term('c')])]);
      const copy = cloneNode(original);

      const firstCopy = copy.children[0];
      if (firstCopy.type === 'term' && firstCopy.field) {
        firstCopy.field.raw = '[tiab]';
      }

      expect(nodesEqual(original, copy)).toBe(false);
      const firstOriginal = original.children[0];
      expect(firstOriginal.field?.raw).toBe('[ti]');
    });
  });

  describe('nodesEqual', () => {
    it('should ignore spans', () => {
      const a = or([term('a', { span: [0, 1] }), term('b', { span: [5, 6] })], { span: [0, 6] });
      const b = or([term('a'), term('b')]);

      expect(nodesEqual(a, b)).toBe(true);
    });

    it('should compare fields by token', () => {
      expect(nodesEqual(term('a', { field: title }), term('a', { field: searchField('[ti]') }))).toBe(true);
      expect(nodesEqual(term('a', { field: title }), term('a'))).toBe(false);
    });

    it('should distinguish NEAR distance and order', () => {
      const base = near(3, [term('a'), term('b')]);

      expect(nodesEqual(base, near(4, [term('a'), term('b')]))).toBe(false);
      expect(nodesEqual(base, near(3, [term('a'), term('b')], { ordered: true }))).toBe(false);
    });

    it('should respect child order', () => {
      expect(nodesEqual(and([term('a'), term('b')]), and([term('b'), term('a')]))).toBe(false);
    });
  });

  describe('traversal', () => {
    it('should pass inherited fields to terms', () => {
      const tree = and([term('a'), or([term('b'), term('c', { field: title })], { field: searchField('AB=') })]);
      const seen: Array<[string, string | null]> = [];
      forEachTerm(tree, (found: TermNode, field: SearchField | null) => seen.push([found.value, field?.raw ?? null]));

      expect(seen).toEqual([
        ['a', null],
        ['b', 'AB='],
        ['c', '[ti]'],
      ]);
    });

    it('should collect terms left to right', () => {
      const tree = not(or([term('a'), term('b')]), term('c'));

      expect(collectTerms(tree).map((found) => found.value)).toEqual(['a', 'b', 'c']);
    });

    it('should cover the written children when an operator has no span', () => {
      const tree = and([term('a', { span: [4, 5] }), term('b'), term('c', { span: [12, 15] })]);

      expect(spanOf(tree)).toEqual([4, 15]);
    });

    it('should label nodes for messages', () => {
      expect(nodeLabel(term('a', { field: title }))).toBe('a ([ti])');
      expect(nodeLabel(near(2, [term('a'), term('b')]))).toBe('NEAR/2 with 2 children');
    });
  });
});
