import { symbolic } from './symbolic';

// one stage of a series expansion: variable, the point it is centred on, and the highest derivative kept
export interface ExpansionSpec {
	variable:	symbolic;
	point:		symbolic;
	order:		number;
}

export function expansion(variable: string | symbolic, point: number | symbolic, order: number): ExpansionSpec {
	return validateSpec({
		variable:	typeof variable === 'string' ? symbolic.variable(variable) : variable,
		point:		typeof point === 'number' ? symbolic.from(point) : point,
		order,
	});
}

// highest order whose k! is still an exact integer
export const maxOrder = (() => {
	let k = 1, fact = 1;
	while (fact * (k + 1) <= Number.MAX_SAFE_INTEGER)
		fact *= ++k;
	return k;
})();

export function validateSpec(spec: ExpansionSpec): ExpansionSpec {
	if (!spec.variable.is('var'))
		throw new Error(`cannot expand in ${spec.variable}: not a variable`);
	if (!Number.isInteger(spec.order) || spec.order < 0)
		throw new Error(`invalid expansion order ${spec.order}`);
	if (spec.order > maxOrder)
		throw new Error(`expansion order ${spec.order} exceeds ${maxOrder}`);
	return spec;
}

export function variableName(spec: ExpansionSpec): string {
	const v = spec.variable;
	if (!v.is('var'))
		throw new Error(`cannot expand in ${v}: not a variable`);
	return v.name;
}

// v - p, the base of every term of the expansion
export function shift(spec: ExpansionSpec): symbolic {
	return spec.variable.sub(spec.point);
}
