import { describe, it, expect } from 'vitest';
import { symbolic } from '../src/symbolic';
import { search } from '../src/search';

const n = (i: number) => symbolic.from(i);
const x = symbolic.variable('x');

describe('search', () => {
	it('returns a tree whose immediate children include the branch', () => {
		const tree = symbolic.list(1, 2, 3);
		const found = search(n(2), tree);
		expect(found).toHaveLength(1);
		expect(found[0]).toBe(tree);
	});

	it('returns the tree once for repeated children', () => {
		const tree = symbolic.list(1, 2, 2, 3);
		const found = search(n(2), tree);
		expect(found).toHaveLength(1);
		expect(found[0]).toBe(tree);
	});

	it('finds nested subtrees', () => {
		const found = search(n(2), symbolic.list(1, symbolic.list(2), 3));
		expect(found).toHaveLength(1);
		expect(found[0]).toBe(symbolic.list(2));
	});

	it('returns nothing when the branch is absent', () => {
		expect(search(n(4), symbolic.list(1, symbolic.list(2), 3))).toEqual([]);
	});

	it('returns every matching sibling in child order', () => {
		const found = search(n(2), symbolic.list(1, symbolic.list(2), 3, symbolic.list(2)));
		expect(found).toHaveLength(2);
		expect(found[0]).toBe(symbolic.list(2));
		expect(found[1]).toBe(symbolic.list(2));
	});

	it('does not search inside a match', () => {
		const inner	= symbolic.list(2);
		const tree	= symbolic.list(2, inner);
		const found	= search(n(2), tree);
		expect(found).toHaveLength(1);
		expect(found[0]).toBe(tree);
	});

	it('returns nothing for atoms', () => {
		expect(search(x, x)).toEqual([]);
		expect(search(n(2), n(2))).toEqual([]);
	});

	it('searches expression trees', () => {
		const sinx = symbolic.sin(x);
		const tree = sinx.add(symbolic.cos(sinx));
		const found = search(sinx, tree);
		expect(found).toHaveLength(1);
		expect(found[0]).toBe(tree);
	});

	it('reports a derivative marker holding the branch', () => {
		const f = symbolic.call('f', x);
		const marker = symbolic.derivative(f, 'x');
		const found = search(f, marker.mul(x));
		expect(found).toHaveLength(1);
		expect(found[0]).toBe(marker);
	});

	it('takes a custom equality', () => {
		const double = (a: symbolic, b: symbolic) => a.evaluate() === 2 * b.evaluate();
		const found = search(n(2), symbolic.list(1, symbolic.list(4), 3), double);
		expect(found).toHaveLength(1);
		expect(found[0]).toBe(symbolic.list(4));
	});
});
