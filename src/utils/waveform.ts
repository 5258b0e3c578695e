// Waveform construction and small sample-array helpers shared by every stage.

import { InvalidConfigurationError } from '../errors';
import type { Waveform } from '../types/sqi.types';

/**
 * Build an immutable waveform. Samples are copied, so later edits to the
 * caller's array never leak into the pipeline.
 */
export function createWaveform(samples: ArrayLike<number>, sampleRate: number): Waveform {
	if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
		throw new InvalidConfigurationError('sampleRate', sampleRate, 'must be a positive finite number');
	}
	const copy = Array.from(samples);
	for (let i = 0; i < copy.length; i++) {
		if (!Number.isFinite(copy[i])) {
			throw new InvalidConfigurationError(`samples[${i}]`, copy[i], 'samples must be finite');
		}
	}
	return Object.freeze({ samples: Object.freeze(copy), sampleRate });
}

export function mean(values: readonly number[]): number {
	if (values.length === 0) return 0;
	return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Population standard deviation. */
export function std(values: readonly number[]): number {
	if (values.length === 0) return 0;
	const m = mean(values);
	return Math.sqrt(values.reduce((a, b) => a + (b - m) * (b - m), 0) / values.length);
}

/** Percentile with linear interpolation between closest ranks (q in 0-100). */
export function percentile(values: readonly number[], q: number): number {
	if (values.length === 0) return 0;
	const sorted = [...values].sort((a, b) => a - b);
	const pos = (Math.min(100, Math.max(0, q)) / 100) * (sorted.length - 1);
	const lo = Math.floor(pos);
	const hi = Math.min(sorted.length - 1, lo + 1);
	return sorted[lo] + (sorted[hi] - sorted[lo]) * (pos - lo);
}

export const demean = (values: readonly number[]): number[] => {
	const m = mean(values);
	return values.map(v => v - m);
};
