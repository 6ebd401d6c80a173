/* eslint-disable no-restricted-syntax */
import { compare } from '@isopodlabs/maths/core';
import rational from '@isopodlabs/maths/rational';

// invariants:
// - all symbolic instances are interned and unique by id
// - symbolic instances are immutable
// - symbolic instances with same id are structurally equal
//	- Numbers: exact rationals of any sign
//	- Additive:
// 		- terms are sorted and combined - no duplicate terms
//		- terms are not numbers or sums (constant term is stored separately)
//		- each term has a rational coefficient; a product term stores its multiplier in the coefficient
//	- Multiplicative:
// 		- factors are sorted and combined - no duplicate factors
//		- factors are not products; numbers only appear with a fractional power
//		- each factor has a rational power
//		- constant factor is rational
//	- und (indeterminate) absorbs any sum, product or function it is part of

class Interner<T extends object> {
	private table = new Map<string, WeakRef<T>>();
	private finalizer: FinalizationRegistry<string>;

	constructor() {
		this.finalizer = new FinalizationRegistry((key: string) => {
			const ref = this.table.get(key);
			if (ref && !ref.deref())
				this.table.delete(key);
		});
	}

	intern(key: string, factory: (key: string) => T): T {
		return this.get(key) ?? this.set(key, factory(key));
	}

	get(key: string): T | undefined {
		return this.table.get(key)?.deref();
	}

	set(key: string, value: T): T {
		this.table.set(key, new WeakRef(value));
		this.finalizer.register(value, key);
		return value;
	}
}

export type Bindings = Record<string, symbolic>;

const StringifyOptionsDefault = {
	mulChar:	' * ',
	divChar:	' / ',
	addChar:	' + ',
	subChar:	' - ',
	powChar:	'^',
};

export type StringifyOptions = typeof StringifyOptionsDefault;

type param = number | rational | symbolic;

function asRational(n: number | rational): rational {
	if (typeof n !== 'number')
		return n;
	if (!Number.isInteger(n))
		throw new Error(`Cannot convert ${n} to an exact number`);
	return rational(n);
}

function asSymbolic(i: param): symbolic {
	return i instanceof symbolic ? i : symbolic.from(i);
}

function ratValue(r: rational): number {
	return r.num / r.den;
}

function ratString(r: rational): string {
	return r.den === 1 ? `${r.num}` : `${r.num}/${r.den}`;
}

function powRational(r: rational, n: number): rational {
	let result = rational(1);
	for (let i = Math.abs(n); i > 0; i--)
		result = result.mul(r);
	return n < 0 ? result.recip() : result;
}

//-----------------------------------------------------------------------------
// symbolic
//-----------------------------------------------------------------------------

export class symbolic {
	static interner		= new Interner<symbolic>();
	static defStringify	= StringifyOptionsDefault;

	static set(key: symbolic, value: symbolic) {
		this.interner.set(key.id, value);
	}
	static setDefaultStringifyOptions(opts: Partial<StringifyOptions>) {
		this.defStringify = { ...this.defStringify, ...opts };
	}

	static from(i: number | rational): symbolic {
		return symbolicNumber.create(asRational(i));
	}
	static variable(name: string): symbolic {
		return symbolicVariable.create(name);
	}
	static call(name: string, ...args: param[]): symbolic {
		return symbolicCall.create(name, args.map(asSymbolic));
	}
	static list(...items: param[]): symbolic {
		return symbolicList.create(items.map(asSymbolic));
	}
	static derivative(arg: symbolic, v: string, order = 1): symbolic {
		return symbolicDerivative.create(arg, v, order);
	}

	static get zero()	: symbolic	{ return zero; }
	static get one()	: symbolic	{ return one; }
	static get pi()		: symbolic	{ return pi; }
	static get e()		: symbolic	{ return e; }
	static get inf()	: symbolic	{ return inf; }
	static get minf()	: symbolic	{ return minf; }
	static get und()	: symbolic	{ return und; }

	static abs(i: param)	: symbolic	{ return symbolicAbs.create(asSymbolic(i)); }
	static sign(i: param)	: symbolic	{ return symbolicSign.create(asSymbolic(i)); }
	static sin(i: param)	: symbolic	{ return symbolicSin.create(asSymbolic(i)); }
	static cos(i: param)	: symbolic	{ return symbolicCos.create(asSymbolic(i)); }
	static tan(i: param)	: symbolic	{ return symbolicTan.create(asSymbolic(i)); }
	static atan(i: param)	: symbolic	{ return symbolicAtan.create(asSymbolic(i)); }
	static exp(i: param)	: symbolic	{ return symbolicExp.create(asSymbolic(i)); }
	static log(i: param)	: symbolic	{ return symbolicLog.create(asSymbolic(i)); }
	static sinh(i: param)	: symbolic	{ return symbolicSinh.create(asSymbolic(i)); }
	static cosh(i: param)	: symbolic	{ return symbolicCosh.create(asSymbolic(i)); }
	static tanh(i: param)	: symbolic	{ return symbolicTanh.create(asSymbolic(i)); }
	static sqrt(i: param)	: symbolic	{ return asSymbolic(i).npow(rational(1, 2)); }
	static pow(a: param, b: param): symbolic	{ return asSymbolic(a).pow(b); }

	constructor(public id: string) {}

	is<T extends keyof typeof types>(type: T): this is InstanceType<(typeof types)[T]> {
		return this instanceof types[type];
	}

	// operator tag and immediate children
	get op(): string					{ return this.id; }
	get args(): readonly symbolic[]		{ return []; }
	isAtom(): boolean					{ return true; }

	eq(b: symbolic): boolean			{ return this.id === b.id; }

	add(b: param): symbolic		{ return addTerms(rational(0), term(this), term(asSymbolic(b))); }
	sub(b: param): symbolic		{ return this.add(asSymbolic(b).neg()); }
	mul(b: param): symbolic		{ return mulFactors(rational(1), factor(this), factor(asSymbolic(b))); }
	div(b: param): symbolic		{ return this.mul(asSymbolic(b).recip()); }
	scale(b: number | rational): symbolic	{ return mulFactors(asRational(b), factor(this)); }
	npow(b: number | rational): symbolic	{ return mulFactors(rational(1), factor(this, b)); }
	neg():		symbolic		{ return this.scale(-1); }
	recip():	symbolic		{ return this.npow(-1); }
	abs():		symbolic		{ return symbolicAbs.create(this); }

	pow(b: param): symbolic {
		const s = asSymbolic(b);
		return s instanceof symbolicNumber ? this.npow(s.value) : symbolicPow.create(this, s);
	}

	derivative(_v: string):			symbolic	{ return zero; }
	substitute(_map: Bindings):		symbolic	{ return this; }
	// true if v occurs free (not bound by an evaluated derivative)
	occurs(_v: string):				boolean		{ return false; }

	nthDerivative(v: string, n: number): symbolic {
		let d: symbolic = this;
		for (let i = 0; i < n && !d.eq(zero); i++)
			d = d.derivative(v);
		return d;
	}

	evaluate(_env?: Record<string, number>):	number	{ return NaN; }
	valueOf():									number	{ return this.evaluate(); }

	_toString(_opts: StringifyOptions):			string	{ return this.id; }
	toString(opts?: Partial<StringifyOptions>):	string	{ return this._toString({ ...symbolic.defStringify, ...opts }); }
	[Symbol.for("debug.description")]():		string	{ return this.toString({}); }
}

export function structuralEquals(a: symbolic, b: symbolic): boolean {
	return a.eq(b);
}

export function isIndeterminate(e: symbolic): boolean {
	return e.eq(und) || e.args.some(isIndeterminate);
}

//-----------------------------------------------------------------------------
// number
//-----------------------------------------------------------------------------

class symbolicNumber extends symbolic {
	static create(value: rational): symbolic {
		return this.interner.intern(`n:${ratString(value)}`, id => new symbolicNumber(id, value));
	}

	constructor(id: string, public value: rational) {
		super(id);
	}
	get op()	{ return 'number'; }

	evaluate()	{ return ratValue(this.value); }
	_toString()	{ return ratString(this.value); }
}

const zero	= symbolic.from(0);
const one	= symbolic.from(1);

//-----------------------------------------------------------------------------
// variable
//-----------------------------------------------------------------------------

class symbolicVariable extends symbolic {
	static create(name: string): symbolic {
		return this.interner.intern(`v:${name}`, id => new symbolicVariable(id, name));
	}

	constructor(id: string, public name: string) {
		super(id);
	}
	get op() { return 'variable'; }

	substitute(map: Bindings): symbolic {
		return map[this.name] ?? this;
	}
	derivative(v: string): symbolic {
		return v === this.name ? one : zero;
	}
	occurs(v: string): boolean {
		return v === this.name;
	}
	evaluate(env?: Record<string, number>): number {
		return env?.[this.name] ?? NaN;
	}
	_toString(): string { return this.name; }
}

//-----------------------------------------------------------------------------
// special constants
//-----------------------------------------------------------------------------

function specialConstant(name: string, toString = name, value = NaN) {
	const C = class extends symbolic {
		constructor()	{ super(name); symbolic.set(this, this); }
		get op()		{ return name; }
		evaluate()		{ return value; }
		_toString()		{ return toString; }
	};
	return C;
}

const pi:	symbolic	= new (specialConstant('pi', 'π', Math.PI));
const e:	symbolic	= new (specialConstant('e', '𝑒', Math.E));
const inf:	symbolic	= new (specialConstant('inf', '∞', Infinity));
const minf:	symbolic	= new (specialConstant('minf', '-∞', -Infinity));
const und:	symbolic	= new (specialConstant('und'));

//-----------------------------------------------------------------------------
// add
//-----------------------------------------------------------------------------

export interface term {
	item:	symbolic;
	coef:	rational;
}
export function term(item: symbolic, coef: number | rational = 1): term {
	return { item, coef: asRational(coef) };
}
export function termAsSymbolic(t: Readonly<term>): symbolic {
	return t.coef.is1() ? t.item : mulFactors(t.coef, factor(t.item));
}

export function addTerms(num0: rational, ...a: readonly Readonly<term>[]): symbolic {
	const terms: term[] = [];
	let num = num0;
	let indeterminate = false;

	function add(item: symbolic, coef: rational) {
		if (coef.is0())
			return;

		if (item.eq(und)) {
			indeterminate = true;

		} else if (item instanceof symbolicNumber) {
			num = num.add(item.value.mul(coef));

		} else if (item instanceof symbolicAdd) {
			num = num.add(item.num.mul(coef));
			for (const j of item.terms)
				add(j.item, j.coef.mul(coef));

		} else if (item instanceof symbolicMul && !item.num.is1()) {
			// pull numeric multiplier into term coefficient
			add(mulFactors(rational(1), ...item.factors), coef.mul(item.num));

		} else {
			terms.push(term(item, coef));
		}
	}

	for (const i of a)
		add(i.item, i.coef);

	if (indeterminate)
		return und;

	// canonical order
	terms.sort((a, b) => compare(a.item.id, b.item.id));

	// combine like terms by summing coefficients
	const combined: term[] = [];
	for (const t of terms) {
		const last = combined.at(-1);
		if (last && last.item.id === t.item.id)
			last.coef = last.coef.add(t.coef);
		else
			combined.push(t);
	}

	const nonzero = combined.filter(t => !t.coef.is0());
	if (nonzero.length === 0)
		return symbolicNumber.create(num);

	if (nonzero.length === 1 && num.is0())
		return termAsSymbolic(nonzero[0]);

	return symbolicAdd.create(nonzero, num);
}

export class symbolicAdd extends symbolic {
	static create(terms: readonly term[], num: rational): symbolic {
		if (terms.length < (num.is0() ? 2 : 1))
			throw new Error('not enough terms in additive expression');
		return this.interner.intern(
			`a(${num.is0() ? '' : `${ratString(num)},`}${terms.map(t => `${t.coef.is1() ? '' : `${ratString(t.coef)}*`}${t.item.id}`).join(',')})`,
			id => new symbolicAdd(id, terms, num)
		);
	}

	private _args?: readonly symbolic[];

	constructor(id: string, public terms: readonly Readonly<term>[], public num: rational) {
		super(id);
	}
	get op()	{ return '+'; }
	get args(): readonly symbolic[] {
		return this._args ??= [
			...this.terms.map(termAsSymbolic),
			...(this.num.is0() ? [] : [symbolicNumber.create(this.num)])
		];
	}
	isAtom()	{ return false; }

	substitute(map: Bindings): symbolic {
		return addTerms(this.num, ...this.terms.map(t => term(t.item.substitute(map), t.coef)));
	}
	derivative(v: string): symbolic {
		return addTerms(rational(0), ...this.terms.map(t => term(t.item.derivative(v), t.coef)));
	}
	occurs(v: string): boolean {
		return this.terms.some(t => t.item.occurs(v));
	}
	evaluate(env?: Record<string, number>): number {
		return this.terms.reduce((acc, t) => acc + ratValue(t.coef) * t.item.evaluate(env), ratValue(this.num));
	}

	_toString(opts: StringifyOptions): string {
		let s = '';
		for (const t of this.terms) {
			const neg	= t.coef.sign() < 0;
			const body	= termAsSymbolic(term(t.item, neg ? t.coef.neg() : t.coef))._toString(opts);
			s += s ? (neg ? opts.subChar : opts.addChar) + body : (neg ? '-' : '') + body;
		}
		if (!this.num.is0())
			s += (this.num.sign() < 0 ? opts.subChar : opts.addChar) + ratString(this.num.abs());
		return s;
	}
}

//-----------------------------------------------------------------------------
// mul
//-----------------------------------------------------------------------------

export interface factor {
	item:	symbolic;
	pow:	rational;
}
export function factor(item: symbolic, pow: number | rational = 1): factor {
	return { item, pow: asRational(pow) };
}
export function factorAsSymbolic(f: Readonly<factor>): symbolic {
	return f.pow.is1() ? f.item : mulFactors(rational(1), f);
}

export function mulFactors(num0: rational, ...f: readonly Readonly<factor>[]): symbolic {
	const factors: factor[] = [];
	let num = num0;
	let indeterminate = false;

	function add(item: symbolic, pow: rational) {
		if (pow.is0())
			return;

		if (item.eq(und)) {
			indeterminate = true;

		} else if (item instanceof symbolicNumber) {
			const value = item.value;
			if (value.is0()) {
				// division by zero
				if (pow.sign() < 0)
					indeterminate = true;
				else
					num = rational(0);
			} else if (pow.isInteger()) {
				num = num.mul(powRational(value, pow.num));
			} else if (!value.is1()) {
				factors.push(factor(item, pow));
			}

		} else if (item instanceof symbolicMul && pow.isInteger()) {
			num = num.mul(powRational(item.num, pow.num));
			for (const j of item.factors)
				add(j.item, j.pow.mul(pow));

		} else {
			factors.push(factor(item, pow));
		}
	}

	for (const i of f)
		add(i.item, i.pow);

	if (indeterminate)
		return und;

	if (num.is0())
		return zero;

	// canonical order
	factors.sort((a, b) => compare(a.item.id, b.item.id));

	// combine like factors by summing powers
	const combined: factor[] = [];
	for (const f of factors) {
		const last = combined.at(-1);
		if (last && last.item.id === f.item.id)
			last.pow = last.pow.add(f.pow);
		else
			combined.push(f);
	}

	// fractional powers of a number can sum to an integer one
	const nonzero: factor[] = [];
	for (const f of combined) {
		if (f.item instanceof symbolicNumber && f.pow.isInteger())
			num = num.mul(powRational(f.item.value, f.pow.num));
		else if (!f.pow.is0())
			nonzero.push(f);
	}

	// just a constant
	if (nonzero.length === 0)
		return symbolicNumber.create(num);

	// just single factor
	if (nonzero.length === 1 && nonzero[0].pow.is1() && num.is1())
		return nonzero[0].item;

	return symbolicMul.create(nonzero, num);
}

function printFactor(item: symbolic, pow: rational, opts: StringifyOptions): string {
	const s = item._toString(opts);
	if (pow.is1())
		return item instanceof symbolicAdd ? `(${s})` : s;
	const base = item instanceof symbolicAdd || item instanceof symbolicMul ? `(${s})` : s;
	return base + opts.powChar + (pow.isInteger() ? ratString(pow) : `(${ratString(pow)})`);
}

export class symbolicMul extends symbolic {
	static create(factors: readonly factor[], num: rational): symbolic {
		for (const f of factors) {
			if (f.pow.is0())
				throw new Error('unexpected zero power in factor');
			if (f.item instanceof symbolicMul && f.pow.isInteger())
				throw new Error('unexpected multiplicative factor in factor item');
		}
		return this.interner.intern(
			`m(${num.is1() ? '' : `${ratString(num)},`}${factors.map(f => `${f.item.id}${f.pow.is1() ? '' : `^${ratString(f.pow)}`}`).join(',')})`,
			id => new symbolicMul(id, factors, num)
		);
	}

	private _args?: readonly symbolic[];

	constructor(id: string, public factors: readonly Readonly<factor>[], public num: rational) {
		super(id);
	}

	// a lone power x^k is its own node kind with children [x, k]
	private isPower() {
		return this.factors.length === 1 && this.num.is1();
	}
	get op()	{ return this.isPower() ? '^' : '*'; }
	get args(): readonly symbolic[] {
		if (!this._args) {
			this._args = this.isPower()
				? [this.factors[0].item, symbolicNumber.create(this.factors[0].pow)]
				: [...(this.num.is1() ? [] : [symbolicNumber.create(this.num)]), ...this.factors.map(factorAsSymbolic)];
		}
		return this._args;
	}
	isAtom()	{ return false; }

	substitute(map: Bindings): symbolic {
		return mulFactors(this.num, ...this.factors.map(f => factor(f.item.substitute(map), f.pow)));
	}
	derivative(v: string): symbolic {
		// product rule
		const terms: term[] = [];
		this.factors.forEach((f, i) => {
			const d = f.item.derivative(v);
			if (!d.eq(zero))
				terms.push(term(mulFactors(this.num.mul(f.pow), factor(f.item, f.pow.add(rational(-1))), factor(d), ...this.factors.filter((_, j) => j !== i))));
		});
		return addTerms(rational(0), ...terms);
	}
	occurs(v: string): boolean {
		return this.factors.some(f => f.item.occurs(v));
	}
	evaluate(env?: Record<string, number>): number {
		return this.factors.reduce((acc, f) => acc * f.item.evaluate(env) ** ratValue(f.pow), ratValue(this.num));
	}

	_toString(opts: StringifyOptions): string {
		const numer: string[] = [];
		const denom: string[] = [];
		const n = Math.abs(this.num.num);
		if (n !== 1)
			numer.push(`${n}`);
		if (this.num.den !== 1)
			denom.push(`${this.num.den}`);

		for (const f of this.factors) {
			if (f.pow.sign() < 0)
				denom.push(printFactor(f.item, f.pow.neg(), opts));
			else
				numer.push(printFactor(f.item, f.pow, opts));
		}

		const top		= numer.join(opts.mulChar) || '1';
		const bottom	= denom.length > 1 ? `(${denom.join(opts.mulChar)})` : denom[0];
		return (this.num.sign() < 0 ? '-' : '') + (bottom ? top + opts.divChar + bottom : top);
	}
}

//-----------------------------------------------------------------------------
// functions
//-----------------------------------------------------------------------------

abstract class unaryFunctionBase extends symbolic {
	constructor(id: string, public arg: symbolic) { super(id); }
	abstract get name(): string;

	get op()							{ return this.name; }
	get args(): readonly symbolic[]		{ return [this.arg]; }
	isAtom()							{ return false; }
	occurs(v: string): boolean			{ return this.arg.occurs(v); }
}

function unaryFunction(name: string,
	evaluate:	(arg: number) => number,
	derivative:	(arg: symbolic) => symbolic,
	fold?:		(arg: rational) => symbolic | undefined,
	toString =	(a: symbolic, opts: StringifyOptions) => `${name}(${a._toString(opts)})`
) {
	const C = class extends unaryFunctionBase {
		get name() { return name; }
		static create(i: symbolic): symbolic {
			if (i.eq(und))
				return und;
			if (fold && i instanceof symbolicNumber) {
				const r = fold(i.value);
				if (r)
					return r;
			}
			return this.interner.intern(`${name}:${i.id}`, id => new C(id, i));
		}
		substitute(map: Bindings): symbolic {
			return C.create(this.arg.substitute(map));
		}
		derivative(v: string): symbolic {
			const d = this.arg.derivative(v);
			return d.eq(zero) ? zero : derivative(this.arg).mul(d);
		}
		evaluate(env?: Record<string, number>): number	{ return evaluate(this.arg.evaluate(env)); }
		_toString(opts: StringifyOptions): string		{ return toString(this.arg, opts); }
	};
	return C;
}

class symbolicPow extends symbolic {
	static create(base: symbolic, exponent: symbolic): symbolic {
		if (exponent instanceof symbolicNumber)
			return base.npow(exponent.value);
		if (base.eq(und) || exponent.eq(und))
			return und;
		return this.interner.intern(`^:${base.id}:${exponent.id}`, id => new symbolicPow(id, base, exponent));
	}

	constructor(id: string, public base: symbolic, public exponent: symbolic) {
		super(id);
	}
	get op()							{ return '^'; }
	get args(): readonly symbolic[]		{ return [this.base, this.exponent]; }
	isAtom()							{ return false; }

	substitute(map: Bindings): symbolic {
		return symbolicPow.create(this.base.substitute(map), this.exponent.substitute(map));
	}
	derivative(v: string): symbolic {
		// d(a^b) = a^b * (b' * log(a) + b * a' / a)
		return this.mul(
			this.exponent.derivative(v).mul(symbolic.log(this.base))
			.add(this.exponent.mul(this.base.derivative(v)).div(this.base))
		);
	}
	occurs(v: string): boolean {
		return this.base.occurs(v) || this.exponent.occurs(v);
	}
	evaluate(env?: Record<string, number>): number {
		return this.base.evaluate(env) ** this.exponent.evaluate(env);
	}
	_toString(opts: StringifyOptions): string {
		return `(${this.base._toString(opts)})${opts.powChar}(${this.exponent._toString(opts)})`;
	}
}

//-----------------------------------------------------------------------------
// uninterpreted calls and lists
//-----------------------------------------------------------------------------

class symbolicCall extends symbolic {
	static create(name: string, args: readonly symbolic[]): symbolic {
		return this.interner.intern(`f:${name}(${args.map(a => a.id).join(',')})`, id => new symbolicCall(id, name, args));
	}

	constructor(id: string, public name: string, private items: readonly symbolic[]) {
		super(id);
	}
	get op()							{ return this.name; }
	get args(): readonly symbolic[]		{ return this.items; }
	isAtom()							{ return false; }

	substitute(map: Bindings): symbolic {
		return symbolicCall.create(this.name, this.items.map(i => i.substitute(map)));
	}
	// no closed form: leave the derivative symbolic
	derivative(v: string): symbolic {
		return this.occurs(v) ? symbolicDerivative.create(this, v, 1) : zero;
	}
	occurs(v: string): boolean {
		return this.items.some(i => i.occurs(v));
	}
	_toString(opts: StringifyOptions): string {
		return `${this.name}(${this.items.map(i => i._toString(opts)).join(', ')})`;
	}
}

class symbolicList extends symbolic {
	static create(items: readonly symbolic[]): symbolic {
		return this.interner.intern(`l[${items.map(i => i.id).join(',')}]`, id => new symbolicList(id, items));
	}

	constructor(id: string, private items: readonly symbolic[]) {
		super(id);
	}
	get op()							{ return 'list'; }
	get args(): readonly symbolic[]		{ return this.items; }
	isAtom()							{ return false; }

	substitute(map: Bindings): symbolic {
		return symbolicList.create(this.items.map(i => i.substitute(map)));
	}
	derivative(v: string): symbolic {
		return symbolicList.create(this.items.map(i => i.derivative(v)));
	}
	occurs(v: string): boolean {
		return this.items.some(i => i.occurs(v));
	}
	_toString(opts: StringifyOptions): string {
		return `[${this.items.map(i => i._toString(opts)).join(', ')}]`;
	}
}

//-----------------------------------------------------------------------------
// derivative marker
// an unresolved derivative of arg, n times in v, optionally evaluated at v = at
//-----------------------------------------------------------------------------

export class symbolicDerivative extends symbolic {
	static create(arg: symbolic, v: string, order: number, at?: symbolic): symbolic {
		if (!Number.isInteger(order) || order < 0)
			throw new Error(`invalid derivative order ${order}`);
		if (order === 0)
			return at ? arg.substitute({ [v]: at }) : arg;
		if (!at && arg instanceof symbolicDerivative && !arg.at && arg.v === v)
			return this.create(arg.arg, v, arg.order + order);
		return this.interner.intern(`d:${arg.id}:${v}:${order}${at ? `@${at.id}` : ''}`, id => new symbolicDerivative(id, arg, v, order, at));
	}

	private _args?: readonly symbolic[];

	constructor(id: string, public arg: symbolic, public v: string, public order: number, public at?: symbolic) {
		super(id);
	}
	get op()	{ return 'derivative'; }
	get args(): readonly symbolic[] {
		return this._args ??= [
			this.arg,
			symbolicVariable.create(this.v),
			symbolic.from(this.order),
			...(this.at ? [this.at] : [])
		];
	}
	isAtom()	{ return false; }

	occurs(w: string): boolean {
		return this.at
			? (w !== this.v && this.arg.occurs(w)) || this.at.occurs(w)
			: this.arg.occurs(w);
	}

	derivative(w: string): symbolic {
		if (!this.at) {
			if (w === this.v)
				return symbolicDerivative.create(this.arg, w, this.order + 1);
			return this.arg.occurs(w) ? symbolicDerivative.create(this, w, 1) : zero;
		}
		// chain rule through the evaluation point
		let result = zero;
		const da = this.at.derivative(w);
		if (!da.eq(zero))
			result = symbolicDerivative.create(this.arg, this.v, this.order + 1, this.at).mul(da);
		if (w !== this.v && this.arg.occurs(w))
			result = result.add(symbolicDerivative.create(this, w, 1));
		return result;
	}

	substitute(map: Bindings): symbolic {
		const value: symbolic | undefined = map[this.v];
		const inner = Object.fromEntries(Object.entries(map).filter(([k]) => k !== this.v));
		return symbolicDerivative.create(
			this.arg.substitute(inner),
			this.v,
			this.order,
			this.at ? this.at.substitute(map) : value
		);
	}

	_toString(opts: StringifyOptions): string {
		const d = `derivative(${this.arg._toString(opts)}, ${this.v}, ${this.order})`;
		return this.at ? `at(${d}, ${this.v} = ${this.at._toString(opts)})` : d;
	}
}

export function isDerivativeMarker(e: symbolic): e is symbolicDerivative {
	return e instanceof symbolicDerivative;
}

//-----------------------------------------------------------------------------
// elementary functions
//-----------------------------------------------------------------------------

const symbolicAbs	= unaryFunction('abs', Math.abs,
	a => symbolicSign.create(a),
	a => symbolicNumber.create(a.abs()),
	(a, opts) => `|${a._toString(opts)}|`
);
const symbolicSign	= unaryFunction('sign', Math.sign,
	_a => zero,
	a => symbolic.from(a.sign())
);

const symbolicSin	= unaryFunction('sin', Math.sin, a => symbolicCos.create(a));
const symbolicCos	= unaryFunction('cos', Math.cos, a => symbolicSin.create(a).neg());
const symbolicTan	= unaryFunction('tan', Math.tan, a => symbolicCos.create(a).npow(-2));
const symbolicAtan	= unaryFunction('atan', Math.atan, a => a.npow(2).add(one).recip());

const symbolicExp	= unaryFunction('exp', Math.exp, a => symbolicExp.create(a));
const symbolicLog	= unaryFunction('log', Math.log, a => a.recip());

const symbolicSinh	= unaryFunction('sinh', Math.sinh, a => symbolicCosh.create(a));
const symbolicCosh	= unaryFunction('cosh', Math.cosh, a => symbolicSinh.create(a));
const symbolicTanh	= unaryFunction('tanh', Math.tanh, a => symbolicCosh.create(a).npow(-2));

symbolic.set(symbolic.sin(zero), zero);
symbolic.set(symbolic.cos(zero), one);
symbolic.set(symbolic.tan(zero), zero);
symbolic.set(symbolic.atan(zero), zero);

symbolic.set(symbolic.exp(zero), one);
symbolic.set(symbolic.exp(one), e);
symbolic.set(symbolic.log(one), zero);
symbolic.set(symbolic.log(e), one);
symbolic.set(symbolic.log(zero), und);

symbolic.set(symbolic.sinh(zero), zero);
symbolic.set(symbolic.cosh(zero), one);
symbolic.set(symbolic.tanh(zero), zero);

//-----------------------------------------------------------------------------

const types = {
	number:		symbolicNumber,
	var:		symbolicVariable,
	add:		symbolicAdd,
	mul: 		symbolicMul,
	pow:		symbolicPow,
	unary:		unaryFunctionBase,
	call:		symbolicCall,
	list:		symbolicList,
	derivative:	symbolicDerivative,
} as const;
