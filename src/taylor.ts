import rational from '@isopodlabs/maths/rational';
import { symbolic, symbolicMul, structuralEquals, isDerivativeMarker, mulFactors, factorAsSymbolic } from './symbolic';
import { type ExpansionSpec, validateSpec, variableName, shift } from './expansion';
import { diffExpand } from './diffExpand';
import { search, type Equality } from './search';
import { checkPoints } from './singularity';
import { DivergentExpansionError, ExpansionPointError } from './errors';

export interface SeriesOptions {
	maxDepth:		number;		// nested generic expansions allowed
	knownSeries:	boolean;	// use closed-form series for elementary functions
	equals:			Equality;	// equality used to find the original expression in an expansion
}

let defaultOptions: SeriesOptions = {
	maxDepth:		32,
	knownSeries:	true,
	equals:			structuralEquals,
};

export function setDefaultSeriesOptions(opts: Partial<SeriesOptions>) {
	defaultOptions = { ...defaultOptions, ...opts };
}

export function getDefaultSeriesOptions(): Readonly<SeriesOptions> {
	return defaultOptions;
}

// trace logging: each call indents until the closure it returns is run

let traceDepth		= 0;
let traceLogging	= false;

export function setTraceLogging(enabled: boolean) {
	traceLogging = enabled;
}

function trace(log: () => string) {
	if (traceLogging) {
		console.log('  '.repeat(traceDepth++) + log());
		return () => { traceDepth--; };
	}
	return () => {};
}

//-----------------------------------------------------------------------------
// closed-form series
//-----------------------------------------------------------------------------

// k-th derivative of the function at the point, given k!
type DerivativeRule = (k: number, point: symbolic, fact: rational) => symbolic | undefined;

function cycle(...d: ((p: symbolic) => symbolic)[]): DerivativeRule {
	return (k, p) => d[k % d.length](p);
}

const knownSeries: Record<string, DerivativeRule | undefined> = {
	exp:	(_k, p) => symbolic.exp(p),
	sin:	cycle(p => symbolic.sin(p), p => symbolic.cos(p), p => symbolic.sin(p).neg(), p => symbolic.cos(p).neg()),
	cos:	cycle(p => symbolic.cos(p), p => symbolic.sin(p).neg(), p => symbolic.cos(p).neg(), p => symbolic.sin(p)),
	sinh:	cycle(p => symbolic.sinh(p), p => symbolic.cosh(p)),
	cosh:	cycle(p => symbolic.cosh(p), p => symbolic.sinh(p)),
	// log⁽ᵏ⁾(p) = (-1)ᵏ⁺¹ (k-1)! / pᵏ
	log:	(k, p, fact) => p.eq(symbolic.zero) ? undefined
		: k === 0 ? symbolic.log(p)
		: p.npow(-k).scale(fact.mul(rational(k % 2 ? 1 : -1, k))),
};

function closedForm(e: symbolic, specs: readonly ExpansionSpec[]): symbolic | undefined {
	if (!e.is('unary'))
		return;

	const arg	= e.arg;
	const rule	= knownSeries[e.name];
	const spec	= specs.find(s => arg.eq(s.variable));
	if (!rule || !spec)
		return;

	// coefficients in terms of a later variable still need expanding in it
	const point	= spec.point;
	if (specs.some(s => point.occurs(variableName(s))))
		return;

	const base	= shift(spec);
	let sum		= symbolic.zero;
	let fact	= rational(1);

	for (let k = 0; k <= spec.order; k++) {
		if (k > 0)
			fact = fact.mul(rational(k));
		const d = rule(k, point, fact);
		if (!d)
			return;
		sum = sum.add(d.mul(base.npow(k)).scale(fact.recip()));
	}
	return sum;
}

//-----------------------------------------------------------------------------
// structural rules
//-----------------------------------------------------------------------------

// (v - p)ᵏ is a term of the series itself; vᵏ about p ≠ 0 is its own expansion when k ≤ order
function monomial(e: symbolic, specs: readonly ExpansionSpec[]): symbolic | undefined {
	let item	= e;
	let k		= 1;

	if (e.is('mul')) {
		const [f] = e.factors;
		if (e.factors.length !== 1 || !e.num.is1() || !f.pow.isInteger() || f.pow.sign() < 0)
			return;
		item	= f.item;
		k		= f.pow.num;
	}

	for (const s of specs) {
		if (item.eq(shift(s)))
			return k <= s.order ? e : symbolic.zero;
		if (item.eq(s.variable))
			return k <= s.order ? e : undefined;
	}
}

function expandProduct(e: symbolicMul, specs: readonly ExpansionSpec[], opts: SeriesOptions, depth: number): symbolic | undefined {
	const names			= specs.map(variableName);
	const dependent		= e.factors.filter(f => names.some(v => f.item.occurs(v)));
	const coefficient	= mulFactors(e.num, ...e.factors.filter(f => !dependent.includes(f)));

	if (dependent.length === 1)
		return coefficient.eq(symbolic.one) ? undefined : coefficient.mul(expandAt(factorAsSymbolic(dependent[0]), specs, opts, depth));

	// factors can only be expanded separately if no variable is shared between them
	if (names.some(v => dependent.filter(f => f.item.occurs(v)).length > 1))
		return;

	return dependent.reduce((acc, f) => acc.mul(expandAt(factorAsSymbolic(f), specs, opts, depth)), coefficient);
}

//-----------------------------------------------------------------------------
// driver
//-----------------------------------------------------------------------------

function expandAt(e: symbolic, specs: readonly ExpansionSpec[], opts: SeriesOptions, depth: number): symbolic {
	const done = trace(() => `expand ${e}`);
	try {
		const names = specs.map(variableName);
		if (!names.some(v => e.occurs(v)))
			return e;

		const known = opts.knownSeries ? closedForm(e, specs) : undefined;
		if (known)
			return known;

		if (e.is('add'))
			return e.args.reduce((acc, t) => acc.add(expandAt(t, specs, opts, depth)), symbolic.zero);

		if (e.is('mul')) {
			const product = expandProduct(e, specs, opts, depth);
			if (product)
				return product;
		}

		const m = monomial(e, specs);
		if (m)
			return m;

		if (depth >= opts.maxDepth)
			throw new DivergentExpansionError(e, undefined, `expansion of ${e} exceeded ${opts.maxDepth} nested expansions`);

		const r = diffExpand(e, specs);

		// the guard must pass before expanding r again; r itself counts as an occurrence, so search from a node enclosing it
		const hits = search(e, symbolic.list(r), opts.equals).filter(hit => !isDerivativeMarker(hit));
		if (hits.length)
			throw new DivergentExpansionError(e, r);

		return expandAt(r, specs, opts, depth + 1);

	} finally {
		done();
	}
}

export function expand(e: symbolic, specs: readonly ExpansionSpec[], opts?: Partial<SeriesOptions>): symbolic {
	specs.forEach(s => validateSpec(s));
	checkPoints(specs.map(s => s.point));
	return expandAt(e, specs, { ...defaultOptions, ...opts }, 0);
}

// For callers that treat an expansion that cannot be computed as no result
export function tryExpand(e: symbolic, specs: readonly ExpansionSpec[], opts?: Partial<SeriesOptions>): symbolic | undefined {
	try {
		return expand(e, specs, opts);
	} catch (err) {
		if (err instanceof ExpansionPointError || err instanceof DivergentExpansionError)
			return undefined;
		throw err;
	}
}
