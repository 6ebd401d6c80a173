import type { symbolic } from './symbolic';

// Expansion about an infinite point
export class ExpansionPointError extends Error {
	constructor(public point: symbolic) {
		super(`cannot expand about the infinite point ${point}`);
		this.name = 'ExpansionPointError';
	}
}

// The generic expansion of an expression still contains that expression, so expanding the result again would never finish
export class DivergentExpansionError extends Error {
	constructor(public expression: symbolic, public expansion?: symbolic, message = `expansion of ${expression} reintroduces it`) {
		super(message);
		this.name = 'DivergentExpansionError';
	}
}
