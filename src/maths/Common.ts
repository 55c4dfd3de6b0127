/**
 * Common math utilities
 */

import { CoreConstants } from "../core/Constants";

export function d2r(d: number): number {
	return (d * Math.PI) / 180;
}

/**
 * Epsilon-tolerant scalar equality: `|a - b| < EPSILON`.
 */
export function feq(a: number, b: number, eps = CoreConstants.EPSILON): boolean {
	return Math.abs(a - b) < eps;
}

export function isNearZero(value: number): boolean {
	return Math.abs(value) < CoreConstants.EPSILON;
}

/**
 * Total order over numbers for sorting. NaN values are equal to one another
 * and sort after every number.
 */
export function compareNumbers(a: number, b: number): number {
	const aNaN = Number.isNaN(a);
	const bNaN = Number.isNaN(b);
	if (aNaN || bNaN) return aNaN === bNaN ? 0 : aNaN ? 1 : -1;
	if (a < b) return -1;
	if (a > b) return 1;
	return 0;
}
