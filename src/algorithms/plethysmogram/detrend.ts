// Polynomial baseline removal.

import { solveLinearSystem } from '../../utils/linalg';

/** Sample positions mapped linearly onto [-1, 1]; keeps the normal equations well scaled. */
function unitAxis(length: number): number[] {
	if (length === 1) return [0];
	return Array.from({ length }, (_, i) => (2 * i) / (length - 1) - 1);
}

/** Least-squares polynomial coefficients, lowest power first. */
export function polyfit(x: readonly number[], y: readonly number[], order: number): number[] {
	const terms = order + 1;
	const moments = new Array<number>(2 * order + 1).fill(0);
	const rhs = new Array<number>(terms).fill(0);

	for (let i = 0; i < x.length; i++) {
		let power = 1;
		for (let k = 0; k < moments.length; k++) {
			moments[k] += power;
			if (k < terms) rhs[k] += power * y[i];
			power *= x[i];
		}
	}

	const normal = Array.from({ length: terms }, (_, r) =>
		Array.from({ length: terms }, (_, c) => moments[r + c])
	);
	return solveLinearSystem(normal, rhs);
}

export function polyval(coefficients: readonly number[], x: number): number {
	let acc = 0;
	for (let k = coefficients.length - 1; k >= 0; k--) acc = acc * x + coefficients[k];
	return acc;
}

/**
 * Subtract a fitted polynomial trend. With `demean` false the fit's value at
 * the centre of the record (sample n/2) is kept, so only the slope and higher
 * terms are removed.
 */
export function detrend(samples: readonly number[], order = 1, demean = false): number[] {
	const n = samples.length;
	if (n === 0) return [];
	const effectiveOrder = Math.max(0, Math.min(Math.floor(order), n - 1));

	const x = unitAxis(n);
	const coefficients = polyfit(x, samples, effectiveOrder);

	const centre = n > 1 ? (2 * (n / 2)) / (n - 1) - 1 : 0;
	const offset = demean ? 0 : polyval(coefficients, centre);
	return samples.map((v, i) => v - (polyval(coefficients, x[i]) - offset));
}
