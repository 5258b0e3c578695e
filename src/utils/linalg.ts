// Thin wrappers over mathjs for the small dense systems the filters and detrending solve.

import { isMatrix, lusolve } from 'mathjs';

function toNumber(value: unknown): number {
	if (typeof value !== 'number') {
		throw new Error(`Expected a numeric solution, got ${typeof value}`);
	}
	return value;
}

/** Solve A·x = b for a square system and return x as a plain array. */
export function solveLinearSystem(A: number[][], b: number[]): number[] {
	if (A.length === 0) return [];
	const solution: unknown = lusolve(A, b);
	const rows: unknown = isMatrix(solution) ? solution.toArray() : solution;
	if (!Array.isArray(rows)) {
		throw new Error('Linear solve returned no rows');
	}
	return rows.map((row: unknown) => toNumber(Array.isArray(row) ? row[0] : row));
}
