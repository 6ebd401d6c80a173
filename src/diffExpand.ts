import rational from '@isopodlabs/maths/rational';
import { symbolic, isIndeterminate } from './symbolic';
import { type ExpansionSpec, validateSpec, variableName, shift } from './expansion';
import { checkPoints } from './singularity';

// Sum of f⁽ᵏ⁾(p)/k! (v - p)ᵏ for k = 0..n in the first variable, each coefficient re-expanded in the remaining ones
export function diffExpand(e: symbolic, specs: readonly ExpansionSpec[]): symbolic {
	specs.forEach(s => validateSpec(s));
	checkPoints(specs.map(s => s.point));

	if (specs.length === 0)
		return e;

	const [first, ...rest] = specs;
	const v		= variableName(first);
	const base	= shift(first);

	let sum		= symbolic.zero;
	let deriv	= e;
	let scale	= rational(1);

	for (let k = 0; k <= first.order; k++) {
		if (k > 0) {
			deriv	= deriv.derivative(v);
			scale	= scale.mul(rational(1, k));
		}

		// an indeterminate value at the point keeps the derivative unevaluated, still in terms of v
		let coef = deriv.substitute({ [v]: first.point });
		if (isIndeterminate(coef))
			coef = deriv;

		sum = sum.add(diffExpand(coef, rest).mul(base.npow(k)).scale(scale));
	}
	return sum;
}
