import { describe, it, expect } from 'vitest';
import { symbolic, isIndeterminate, isDerivativeMarker } from '../src/symbolic';

const x = symbolic.variable('x');
const y = symbolic.variable('y');
const f = symbolic.call('f', x);

describe('canonical forms', () => {
	it('combines like terms', () => {
		expect(x.add(x)).toBe(x.scale(2));
		expect(x.sub(x)).toBe(symbolic.zero);
		expect(x.add(y).sub(y)).toBe(x);
	});

	it('combines like factors', () => {
		expect(x.mul(x)).toBe(x.npow(2));
		expect(x.div(x)).toBe(symbolic.one);
		expect(x.npow(2).mul(x.npow(-1))).toBe(x);
	});

	it('folds integer powers of numbers into the multiplier', () => {
		const root2 = symbolic.sqrt(2);
		expect(root2.mul(root2)).toBe(symbolic.from(2));
		expect(root2.mul(root2).mul(x)).toBe(x.scale(2));
		expect(root2.mul(x).mul(root2)).toBe(x.scale(2));
		expect(root2.npow(4).op).toBe('number');
	});

	it('keeps numbers exact', () => {
		expect(symbolic.from(1).div(3).add(symbolic.from(2).div(3))).toBe(symbolic.one);
	});

	it('folds known function values', () => {
		expect(symbolic.sin(0)).toBe(symbolic.zero);
		expect(symbolic.cos(0)).toBe(symbolic.one);
		expect(symbolic.exp(0)).toBe(symbolic.one);
		expect(symbolic.exp(1)).toBe(symbolic.e);
		expect(symbolic.log(1)).toBe(symbolic.zero);
		expect(symbolic.abs(-3)).toBe(symbolic.from(3));
		expect(symbolic.sign(-3)).toBe(symbolic.from(-1));
	});

	it('rejects inexact numbers', () => {
		expect(() => symbolic.from(0.5)).toThrow('Cannot convert 0.5 to an exact number');
	});
});

describe('indeterminate forms', () => {
	it('produces und for division by zero and log(0)', () => {
		expect(symbolic.one.div(symbolic.zero)).toBe(symbolic.und);
		expect(symbolic.log(0)).toBe(symbolic.und);
	});

	it('absorbs operations on und', () => {
		expect(x.add(symbolic.und)).toBe(symbolic.und);
		expect(x.mul(symbolic.und)).toBe(symbolic.und);
		expect(symbolic.sin(symbolic.und)).toBe(symbolic.und);
	});

	it('finds und anywhere in a tree', () => {
		expect(isIndeterminate(symbolic.call('f', symbolic.und))).toBe(true);
		expect(isIndeterminate(f)).toBe(false);
	});

	it('evaluates sin(x)/|sin(x)| at 0 as indeterminate', () => {
		const e = symbolic.sin(x).div(symbolic.abs(symbolic.sin(x)));
		expect(e.substitute({ x: symbolic.zero })).toBe(symbolic.und);
	});
});

describe('derivative', () => {
	it('differentiates elementary functions', () => {
		expect(symbolic.sin(x).derivative('x')).toBe(symbolic.cos(x));
		expect(symbolic.exp(x.scale(2)).derivative('x')).toBe(symbolic.exp(x.scale(2)).scale(2));
		expect(symbolic.cos(y).derivative('x')).toBe(symbolic.zero);
	});

	it('applies the power and product rules', () => {
		expect(x.npow(3).derivative('x')).toBe(x.npow(2).scale(3));
		expect(x.mul(symbolic.sin(x)).derivative('x')).toBe(symbolic.sin(x).add(x.mul(symbolic.cos(x))));
	});

	it('takes repeated derivatives', () => {
		expect(symbolic.sin(x).nthDerivative('x', 2)).toBe(symbolic.sin(x).neg());
		expect(x.npow(2).nthDerivative('x', 3)).toBe(symbolic.zero);
		expect(x.nthDerivative('x', 0)).toBe(x);
	});
});

describe('substitute', () => {
	it('replaces variables and simplifies', () => {
		expect(x.add(y).substitute({ x: symbolic.one })).toBe(y.add(1));
		expect(symbolic.sin(x).substitute({ x: symbolic.zero })).toBe(symbolic.zero);
		expect(x.npow(2).substitute({ x: symbolic.from(3) })).toBe(symbolic.from(9));
	});
});

describe('derivative marker', () => {
	it('leaves derivatives of unknown functions symbolic', () => {
		const d = f.derivative('x');
		expect(isDerivativeMarker(d)).toBe(true);
		expect(d).toBe(symbolic.derivative(f, 'x', 1));
		expect(d.op).toBe('derivative');
		expect(f.derivative('y')).toBe(symbolic.zero);
	});

	it('raises the order on repeated differentiation', () => {
		expect(f.derivative('x').derivative('x')).toBe(symbolic.derivative(f, 'x', 2));
	});

	it('binds the variable when a point is substituted', () => {
		const d = symbolic.derivative(f, 'x').substitute({ x: symbolic.zero });
		expect(d.occurs('x')).toBe(false);
		expect(d.derivative('x')).toBe(symbolic.zero);
		expect(d.toString()).toBe('at(derivative(f(x), x, 1), x = 0)');
	});

	it('nests markers for mixed partial derivatives', () => {
		const g = symbolic.call('g', x, y);
		const d = g.derivative('x').derivative('y');
		expect(isDerivativeMarker(d)).toBe(true);
		expect(d.toString()).toBe('derivative(derivative(g(x, y), x, 1), y, 1)');
	});
});

describe('structure', () => {
	it('exposes operator tags and children', () => {
		expect(x.isAtom()).toBe(true);
		expect(symbolic.from(2).op).toBe('number');

		const square = x.npow(2);
		expect(square.op).toBe('^');
		expect(square.args[0]).toBe(x);
		expect(square.args[1]).toBe(symbolic.from(2));

		const product = x.mul(y).scale(3);
		expect(product.op).toBe('*');
		expect(product.args).toEqual([symbolic.from(3), x, y]);

		const sum = x.add(1);
		expect(sum.op).toBe('+');
		expect(sum.args[0]).toBe(x);
		expect(sum.args[1]).toBe(symbolic.one);
	});
});

describe('printing', () => {
	it('prints sums, products and powers', () => {
		expect(x.npow(2).div(2).toString()).toBe('x^2 / 2');
		expect(x.sub(1).toString()).toBe('x - 1');
		expect(x.scale(-2).toString()).toBe('-2 * x');
		expect(symbolic.sin(x).div(symbolic.abs(symbolic.sin(x))).toString()).toBe('sin(x) / |sin(x)|');
	});

	it('takes stringify options', () => {
		expect(x.mul(y).toString({ mulChar: '*' })).toBe('x*y');
	});
});

describe('evaluate', () => {
	it('evaluates numerically', () => {
		expect(x.npow(2).add(1).evaluate({ x: 3 })).toBe(10);
		expect(x.evaluate()).toBeNaN();
	});
});
