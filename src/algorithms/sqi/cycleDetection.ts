// Extremum detection and cycle segmentation on the reconstructed signal.

import { InvalidConfigurationError } from '../../errors';
import type { AnnotatedWaveform, CycleSegment, ExtremumKind, ExtremumSet, Waveform } from '../../types/sqi.types';
import { percentile } from '../../utils/waveform';

export type PeakOptions = {
	/** Minimum spacing between kept peaks, in samples */
	distance?: number;
	/** Minimum topographic prominence */
	prominence?: number;
};

export type DetectionOptions = {
	kind: ExtremumKind;
	distance: number;
	/** Prominence threshold as a fraction of the 5th-95th percentile range */
	thresholdFraction: number;
};

/** Local maxima; a flat top counts once, at its middle sample. */
function localMaxima(x: readonly number[]): number[] {
	const peaks: number[] = [];
	let i = 1;
	const last = x.length - 1;
	while (i < last) {
		if (x[i - 1] < x[i]) {
			let ahead = i + 1;
			while (ahead < last && x[ahead] === x[i]) ahead++;
			if (x[ahead] < x[i]) {
				peaks.push(Math.floor((i + ahead - 1) / 2));
				i = ahead;
				continue;
			}
		}
		i++;
	}
	return peaks;
}

/** Drop peaks closer than `distance` to a higher one, tallest first. */
function selectByDistance(x: readonly number[], peaks: number[], distance: number): number[] {
	const keep = peaks.map(() => true);
	const order = peaks.map((_, j) => j).sort((p, q) => x[peaks[p]] - x[peaks[q]] || p - q);

	for (let r = order.length - 1; r >= 0; r--) {
		const j = order[r];
		if (!keep[j]) continue;
		for (let k = j - 1; k >= 0 && peaks[j] - peaks[k] < distance; k--) keep[k] = false;
		for (let k = j + 1; k < peaks.length && peaks[k] - peaks[j] < distance; k++) keep[k] = false;
	}
	return peaks.filter((_, j) => keep[j]);
}

/** Height of a peak above the higher of the two lowest points before reaching taller ground. */
export function prominence(x: readonly number[], peak: number): number {
	const height = x[peak];
	let leftMin = height;
	for (let i = peak; i >= 0 && x[i] <= height; i--) {
		if (x[i] < leftMin) leftMin = x[i];
	}
	let rightMin = height;
	for (let i = peak; i < x.length && x[i] <= height; i++) {
		if (x[i] < rightMin) rightMin = x[i];
	}
	return height - Math.max(leftMin, rightMin);
}

export function findPeaks(x: readonly number[], options: PeakOptions = {}): number[] {
	let peaks = localMaxima(x);
	const distance = Math.ceil(options.distance ?? 1);
	if (distance > 1 && peaks.length > 1) {
		peaks = selectByDistance(x, peaks, distance);
	}
	const minProminence = options.prominence ?? 0;
	if (minProminence > 0) {
		peaks = peaks.filter(p => prominence(x, p) >= minProminence);
	}
	return peaks;
}

/**
 * Minimum spacing between extrema (samples): a fraction of the slowest
 * period the windows detected, never shorter than the same fraction of the
 * fastest credible period.
 */
export function minimumExtremumDistance(
	dominantFrequencies: readonly number[],
	sampleRate: number,
	distanceFraction: number,
	minPeriodSeconds: number
): number {
	if (!(distanceFraction > 0)) {
		throw new InvalidConfigurationError('distanceFraction', distanceFraction, 'must be greater than 0');
	}
	const slowest = Math.min(...dominantFrequencies.filter(f => f > 0));
	const adaptive = Number.isFinite(slowest) ? Math.floor((sampleRate * distanceFraction) / slowest) : 0;
	const floor = Math.floor(sampleRate * distanceFraction * minPeriodSeconds);
	return Math.max(adaptive, floor, 1);
}

export function detectExtrema(waveform: Waveform, options: DetectionOptions): AnnotatedWaveform {
	const signal = options.kind === 'peak' ? [...waveform.samples] : waveform.samples.map(v => -v);
	const range = percentile(signal, 95) - percentile(signal, 5);
	const indices = findPeaks(signal, {
		distance: options.distance,
		prominence: options.thresholdFraction * range,
	});

	const extrema: ExtremumSet = Object.freeze({
		kind: options.kind,
		indices: Object.freeze(indices),
		minDistance: Math.ceil(options.distance),
	});
	return Object.freeze({ samples: waveform.samples, sampleRate: waveform.sampleRate, extrema });
}

/**
 * One segment per consecutive extremum pair. Both boundary samples belong to
 * the segment, so neighbouring cycles share the extremum between them.
 */
export function segmentCycles({ samples, extrema }: AnnotatedWaveform): CycleSegment[] {
	const { indices } = extrema;
	const segments: CycleSegment[] = [];
	for (let i = 0; i < indices.length - 1; i++) {
		const start = indices[i];
		const end = indices[i + 1];
		segments.push({ start, end, samples: samples.slice(start, end + 1) });
	}
	return segments;
}

/** Seconds between consecutive extrema. */
export function cycleIntervals({ indices }: ExtremumSet, sampleRate: number): number[] {
	const out: number[] = [];
	for (let i = 1; i < indices.length; i++) {
		out.push((indices[i] - indices[i - 1]) / sampleRate);
	}
	return out;
}

/** Swing from each extremum to the opposite extreme before the next one. */
export function extremumAmplitudes({ samples, extrema }: AnnotatedWaveform): number[] {
	const { indices, kind } = extrema;
	const out: number[] = [];
	for (let i = 0; i < indices.length - 1; i++) {
		const between = samples.slice(indices[i], indices[i + 1] + 1);
		const opposite = kind === 'peak' ? Math.min(...between) : Math.max(...between);
		out.push(Math.abs(samples[indices[i]] - opposite));
	}
	return out;
}
