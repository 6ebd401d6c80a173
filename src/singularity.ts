import { symbolic } from './symbolic';
import { ExpansionPointError } from './errors';

export function checkPoints(points: readonly symbolic[]): void {
	for (const p of points) {
		if (p.eq(symbolic.inf) || p.eq(symbolic.minf))
			throw new ExpansionPointError(p);
	}
}
