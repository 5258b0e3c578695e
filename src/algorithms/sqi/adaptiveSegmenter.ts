/**
 * Adaptive frequency segmentation.
 *
 * A single global band-pass cannot follow a cardiac or breathing rate that
 * drifts over a recording. Instead a fixed-length window slides across the
 * envelope-normalized derivative; each window estimates its own dominant
 * frequency, gets a narrow filter tuned to it, and the filtered windows are
 * recombined by overlap-add.
 *
 * Windows are analyzed independently (`analyzeWindow`) and merged in one
 * reduction (`overlapAdd`), so no window ever writes into shared state.
 */

import { InputTooShortError, InvalidConfigurationError } from '../../errors';
import type {
	AdaptiveFilterResult,
	AnalysisSegment,
	FrequencyBand,
	IndexRange,
	SlidingFilterKind,
	Waveform,
	WindowContribution,
} from '../../types/sqi.types';
import { createWaveform, demean, std } from '../../utils/waveform';
import { designButterworth, dominantFrequency, filtfilt, hamming, welch } from '../filtering';

export type AdaptiveFilterOptions = {
	windowSeconds: number;
	stepSeconds: number;
	/** Full passband width as a percentage of the dominant frequency */
	passbandWidthPercent: number;
	filterKind: SlidingFilterKind;
	filterOrder: number;
	nfft: number;
};

/**
 * Window start grid: every `step` samples while the window fits, plus one
 * window anchored at the end when the grid leaves a tail uncovered.
 */
export function planAnalysisWindows(length: number, windowSamples: number, stepSamples: number): IndexRange[] {
	if (!Number.isInteger(windowSamples) || windowSamples < 1) {
		throw new InvalidConfigurationError('windowSamples', windowSamples, 'must be a positive integer');
	}
	if (!Number.isInteger(stepSamples) || stepSamples < 1) {
		throw new InvalidConfigurationError('stepSamples', stepSamples, 'must be a positive integer');
	}
	if (length < windowSamples) {
		throw new InputTooShortError(windowSamples, length);
	}

	const ranges: IndexRange[] = [];
	let start = 0;
	for (; start + windowSamples <= length; start += stepSamples) {
		ranges.push({ start, end: start + windowSamples });
	}
	const lastEnd = ranges[ranges.length - 1].end;
	if (lastEnd < length) {
		ranges.push({ start: length - windowSamples, end: length });
	}
	return ranges;
}

export function passbandFor(frequency: number, widthPercent: number): FrequencyBand {
	const halfWidth = widthPercent / 200;
	return {
		low: frequency * (1 - halfWidth),
		high: frequency * (1 + halfWidth),
	};
}

/** Taper, locate the dominant frequency, and filter one window around it. */
export function analyzeWindow(
	samples: readonly number[],
	sampleRate: number,
	range: IndexRange,
	index: number,
	options: AdaptiveFilterOptions
): WindowContribution {
	const taper = hamming(range.end - range.start);
	const tapered = demean(samples.slice(range.start, range.end).map((v, i) => v * taper[i]));

	const frequency = dominantFrequency(welch(tapered, sampleRate, { nfft: options.nfft }));
	const passband = passbandFor(frequency, options.passbandWidthPercent);

	const tf =
		options.filterKind === 'bandpass'
			? designButterworth({ kind: 'bandpass', low: passband.low, high: passband.high, order: options.filterOrder }, sampleRate)
			: designButterworth({ kind: 'lowpass', cutoff: passband.high, order: options.filterOrder }, sampleRate);

	const segment: AnalysisSegment = { ...range, index, dominantFrequency: frequency, passband };
	return { segment, filtered: demean(filtfilt(tf, tapered)) };
}

/** Sum window contributions by index range and divide by per-sample coverage. */
export function overlapAdd(length: number, contributions: readonly WindowContribution[]): number[] {
	const values = new Array<number>(length).fill(0);
	const weights = new Array<number>(length).fill(0);

	for (const { segment, filtered } of contributions) {
		for (let i = segment.start; i < segment.end; i++) {
			values[i] += filtered[i - segment.start];
			weights[i] += 1;
		}
	}

	return values.map((v, i) => (weights[i] > 0 ? v / weights[i] : 0));
}

export function adaptiveFrequencyFilter(waveform: Waveform, options: AdaptiveFilterOptions): AdaptiveFilterResult {
	const { samples, sampleRate } = waveform;
	const windowSamples = Math.floor(options.windowSeconds * sampleRate);
	const stepSamples = Math.floor(options.stepSeconds * sampleRate);

	const ranges = planAnalysisWindows(samples.length, windowSamples, stepSamples);
	const contributions = ranges.map((range, index) => analyzeWindow(samples, sampleRate, range, index, options));
	const combined = overlapAdd(samples.length, contributions);

	const spread = std(combined);
	const reconstructed = spread > 0 ? combined.map(v => v / spread) : combined;

	const segments = contributions.map(c => c.segment);
	return {
		reconstructed: createWaveform(reconstructed, sampleRate),
		segments,
		dominantFrequencies: segments.map(s => s.dominantFrequency),
	};
}
