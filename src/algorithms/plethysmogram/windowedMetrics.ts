/**
 * Sliding-window plethysmogram quality indices (Elgendi, 2016).
 *
 * Each metric is evaluated in a window centred on every sample. Windows hold
 * an odd number of points and are clipped at the record edges.
 */

import { InvalidConfigurationError } from '../../errors';
import type { Waveform, WindowedMetric } from '../../types/sqi.types';
import { mean, std } from '../../utils/waveform';
import { detrend } from './detrend';

export const PLETH_CONSTANTS = {
	SKEWNESS_WINDOW_S: 5.0,   // best good/acceptable/unfit separation
	KURTOSIS_WINDOW_S: 60.0,
	ENTROPY_WINDOW_S: 1.0,
	DETREND_ORDER: 8,
	ENTROPY_M: 2,
	ENTROPY_R_FRACTION: 0.2,  // tolerance, in window standard deviations
} as const;

export type WindowedMetricOptions = {
	windowSeconds?: number;
	detrendOrder?: number;
};

/** round(seconds * fs), bumped to the next odd number when even. */
export function oddWindowLength(seconds: number, sampleRate: number): number {
	if (!Number.isFinite(seconds) || seconds <= 0) {
		throw new InvalidConfigurationError('windowSeconds', seconds, 'must be a positive finite number');
	}
	const points = Math.round(seconds * sampleRate);
	return points + 1 - (points % 2);
}

/** Apply `metric` to the clipped window around every sample. */
export function slidingMetric(
	samples: readonly number[],
	windowPoints: number,
	metric: (window: readonly number[]) => number
): WindowedMetric {
	const half = Math.floor(windowPoints / 2);
	const values = samples.map((_, i) => {
		const start = Math.max(0, i - half);
		const end = Math.min(i + half, samples.length);
		return metric(samples.slice(start, end + 1));
	});
	return { mean: mean(values), std: std(values), values };
}

function centralMoments(values: readonly number[]): { m2: number; m3: number; m4: number } {
	const m = mean(values);
	let m2 = 0;
	let m3 = 0;
	let m4 = 0;
	for (const v of values) {
		const d = v - m;
		const d2 = d * d;
		m2 += d2;
		m3 += d2 * d;
		m4 += d2 * d2;
	}
	const n = values.length;
	return { m2: m2 / n, m3: m3 / n, m4: m4 / n };
}

/** Biased sample skewness; 0 for a window with no spread. */
export function skewness(values: readonly number[]): number {
	if (values.length === 0) return 0;
	const { m2, m3 } = centralMoments(values);
	return m2 > 0 ? m3 / Math.pow(m2, 1.5) : 0;
}

/** Biased Pearson kurtosis (normal = 3); 0 for a window with no spread. */
export function kurtosis(values: readonly number[]): number {
	if (values.length === 0) return 0;
	const { m2, m4 } = centralMoments(values);
	return m2 > 0 ? m4 / (m2 * m2) : 0;
}

/** Approximate entropy, counting self-matches. */
export function approximateEntropy(values: readonly number[], m: number, r: number): number {
	const n = values.length;
	if (n <= m + 1) return 0;

	const phi = (length: number): number => {
		const count = n - length + 1;
		let total = 0;
		for (let i = 0; i < count; i++) {
			let matches = 0;
			for (let j = 0; j < count; j++) {
				let dist = 0;
				for (let k = 0; k < length && dist <= r; k++) {
					dist = Math.max(dist, Math.abs(values[i + k] - values[j + k]));
				}
				if (dist <= r) matches++;
			}
			total += Math.log(matches / count);
		}
		return total / count;
	};

	return Math.abs(phi(m + 1) - phi(m));
}

function prepared(waveform: Waveform, options: WindowedMetricOptions, defaultSeconds: number) {
	const order = options.detrendOrder ?? PLETH_CONSTANTS.DETREND_ORDER;
	if (!Number.isInteger(order) || order < 0) {
		throw new InvalidConfigurationError('detrendOrder', order, 'must be a non-negative integer');
	}
	return {
		detrended: detrend(waveform.samples, order, true),
		points: oddWindowLength(options.windowSeconds ?? defaultSeconds, waveform.sampleRate),
	};
}

export function skewnessSQI(waveform: Waveform, options: WindowedMetricOptions = {}): WindowedMetric {
	const { detrended, points } = prepared(waveform, options, PLETH_CONSTANTS.SKEWNESS_WINDOW_S);
	return slidingMetric(detrended, points, skewness);
}

export function kurtosisSQI(waveform: Waveform, options: WindowedMetricOptions = {}): WindowedMetric {
	const { detrended, points } = prepared(waveform, options, PLETH_CONSTANTS.KURTOSIS_WINDOW_S);
	return slidingMetric(detrended, points, kurtosis);
}

export function entropySQI(waveform: Waveform, options: WindowedMetricOptions = {}): WindowedMetric {
	const { detrended, points } = prepared(waveform, options, PLETH_CONSTANTS.ENTROPY_WINDOW_S);
	return slidingMetric(detrended, points, window =>
		approximateEntropy(window, PLETH_CONSTANTS.ENTROPY_M, PLETH_CONSTANTS.ENTROPY_R_FRACTION * std(window))
	);
}
