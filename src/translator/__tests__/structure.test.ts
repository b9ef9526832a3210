import { describe, it, expect } from '@jest/globals';
import {
  flattenNestedOperators,
  moveFieldFromOperatorToTerms,
  moveFieldsToOperator,
  pruneTerms,
} from '../structure.js';
import { and, near, nodesEqual, not, or, searchField, term } from '../../query/Query.js';

const ti = searchField('TI=');
const ab = searchField('AB=');

describe('structure rewrites', () => {
  it('should push operator fields down to terms without one', () => {
    const tree = or([term('a'), term('b', { field: ab })], { field: ti });
    const result = moveFieldFromOperatorToTerms(tree);

    expect(nodesEqual(result, or([term('a', { field: ti }), term('b', { field: ab })]))).toBe(true);
  });

  it('should hoist a field all terms share', () => {
    const result = moveFieldsToOperator(or([term('a', { field: ti }), term('b', { field: ti })]));

    expect(nodesEqual(result, or([term('a'), term('b')], { field: ti }))).toBe(true);
  });

  it('should not hoist when fields differ or children are operators', () => {
    const mixed = or([term('a', { field: ti }), term('b', { field: ab })]);
    const nested = and([or([term('a', { field: ti }), term('b', { field: ti })]), term('c', { field: ti })]);

    expect(moveFieldsToOperator(mixed).field).toBeNull();
    expect(moveFieldsToOperator(nested).field).toBeNull();
  });

  it('should merge nested operators of the same kind', () => {
    const tree = and([and([term('a'), term('b')]), or([term('c'), term('d')]), term('e')]);

    expect(nodesEqual(flattenNestedOperators(tree), and([term('a'), term('b'), or([term('c'), term('d')]), term('e')]))).toBe(true);
  });

  it('should never merge NOT or NEAR', () => {
    const tree = not(not(term('a'), term('b')), term('c'));
    const proximity = near(2, [near(2, [term('a'), term('b')]), term('c')]);

    expect(nodesEqual(flattenNestedOperators(tree), not(not(term('a'), term('b')), term('c')))).toBe(true);
    expect(nodesEqual(flattenNestedOperators(proximity), near(2, [near(2, [term('a'), term('b')]), term('c')]))).toBe(true);
  });

  describe('pruneTerms', () => {
    const isDropped = (value: string) => value.startsWith('x');

    it('should collapse an operator left with one child', () => {
      const result = pruneTerms(and([term('a'), term('x1')]), (found) => isDropped(found.value));

      expect(result.node).toEqual(term('a'));
      expect(result.removed.map((found) => found.value)).toEqual(['x1']);
    });

    it('should keep the included part when the excluded part disappears', () => {
      const result = pruneTerms(not(term('a'), term('x1')), (found) => isDropped(found.value));

      expect(result.node).toEqual(term('a'));
    });

    it('should drop a NOT whose included part disappears', () => {
      const result = pruneTerms(or([term('b'), not(term('x1'), term('c'))]), (found) => isDropped(found.value));

      expect(result.node).toEqual(term('b'));
      expect(result.removed.map((found) => found.value)).toEqual(['x1', 'c']);
    });

    it('should return no node when every term is removed', () => {
      expect(pruneTerms(or([term('x1'), term('x2')]), (found) => isDropped(found.value)).node).toBeNull();
    });
  });
});
