// Cycle-to-template similarity (Romano et al., 2023, part D).
// Every cycle is stretched to a common length and scaled to [0, 1]; the
// average of those shapes is the template, and a cycle's quality is its
// Pearson correlation with that template.

import { InsufficientCyclesError, InvalidConfigurationError } from '../../errors';
import type { CycleRecord, CycleSegment } from '../../types/sqi.types';
import { resampleLinear } from '../filtering';

export type ScoringOptions = {
	/** Canonical cycle length (default: 100) */
	templateLength?: number;
};

export const DEFAULT_TEMPLATE_LENGTH = 100;

/** Min-max scale to [0, 1]; a flat input maps to all zeros. */
export function minMaxNormalize(values: readonly number[]): number[] {
	let lo = Infinity;
	let hi = -Infinity;
	for (const v of values) {
		if (v < lo) lo = v;
		if (v > hi) hi = v;
	}
	const span = hi - lo;
	return values.map(v => (span > 0 ? (v - lo) / span : 0));
}

/** Pearson correlation; 0 when either side has no variance. */
export function pearson(x: readonly number[], y: readonly number[]): number {
	const n = Math.min(x.length, y.length);
	if (n < 2) return 0;
	let mx = 0;
	let my = 0;
	for (let i = 0; i < n; i++) {
		mx += x[i];
		my += y[i];
	}
	mx /= n;
	my /= n;
	let sxy = 0;
	let sxx = 0;
	let syy = 0;
	for (let i = 0; i < n; i++) {
		const dx = x[i] - mx;
		const dy = y[i] - my;
		sxy += dx * dy;
		sxx += dx * dx;
		syy += dy * dy;
	}
	if (sxx === 0 || syy === 0) return 0;
	return Math.max(-1, Math.min(1, sxy / Math.sqrt(sxx * syy)));
}

export function averageTemplate(shapes: readonly (readonly number[])[]): number[] {
	const length = shapes[0]?.length ?? 0;
	const template = new Array<number>(length).fill(0);
	for (const shape of shapes) {
		for (let i = 0; i < length; i++) template[i] += shape[i];
	}
	return template.map(v => v / shapes.length);
}

export function scoreCycles(
	segments: readonly CycleSegment[],
	sampleRate: number,
	options: ScoringOptions = {}
): CycleRecord[] {
	const templateLength = options.templateLength ?? DEFAULT_TEMPLATE_LENGTH;
	if (!Number.isInteger(templateLength) || templateLength < 2) {
		throw new InvalidConfigurationError('templateLength', templateLength, 'must be an integer of at least 2');
	}
	if (segments.length < 2) {
		throw new InsufficientCyclesError(segments.length);
	}

	const shapes = segments.map(s => minMaxNormalize(resampleLinear(s.samples, templateLength)));
	const template = averageTemplate(shapes);

	return segments.map((s, i) =>
		Object.freeze({
			startTime: s.start / sampleRate,
			endTime: s.end / sampleRate,
			centerTime: (s.start + s.end) / (2 * sampleRate),
			correlation: pearson(shapes[i], template),
		})
	);
}
