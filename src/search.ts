import { symbolic, structuralEquals } from './symbolic';

export type Equality = (a: symbolic, b: symbolic) => boolean;

// Finds every subtree that has branch as an immediate child.
// A matching subtree is not searched any further, but its siblings are.
export function search(branch: symbolic, tree: symbolic, eq: Equality = structuralEquals): symbolic[] {
	if (tree.isAtom())
		return [];

	if (tree.args.some(child => eq(child, branch)))
		return [tree];

	return tree.args.flatMap(child => search(branch, child, eq));
}
