/**
 * Cycle-by-cycle signal quality (Romano et al., 2023).
 *
 * A. Pre-processing: resample, band-pass, differentiate, scale to [-1, 1],
 *    flatten the amplitude envelope.
 * B. Sliding-window dominant frequency and locally tuned filtering.
 * C. Cycle segmentation between consecutive extrema.
 * D. Similarity of each cycle to the average cycle.
 *
 * Cardiac and respiratory signals run the same steps; only the defaults differ.
 */

import { DegenerateEnvelopeError, InputTooShortError } from '../../errors';
import type { SQIConfig, SQIResult, Waveform } from '../../types/sqi.types';
import logger from '../../utils/logger';
import { createWaveform } from '../../utils/waveform';
import { bandpass, gradient, resampleToRate } from '../filtering';
import { adaptiveFrequencyFilter } from './adaptiveSegmenter';
import { resolveConfig, validateConfig } from './config';
import { detectExtrema, minimumExtremumDistance, segmentCycles } from './cycleDetection';
import { detectEnvelope, normalizeByEnvelope } from './envelope';
import { scoreCycles } from './similarityScoring';

function logParameters(config: SQIConfig): void {
	const lines = Object.entries(config).map(([key, value]) => `    ${key} = ${JSON.stringify(value)}`);
	logger.debug(`The ${config.mode} SQI will be computed using the following parameters:\n${lines.join('\n')}`);
}

function assertNotFlat({ samples }: Waveform): void {
	const first = samples[0];
	if (samples.every(v => v === first)) {
		throw new DegenerateEnvelopeError(0, 'input is a flat line');
	}
}

/** Scale the derivative so its extremes land on -1 and 1. */
export function normalizeDerivative(waveform: Waveform): Waveform {
	const { samples, sampleRate } = waveform;
	let lo = Infinity;
	let hi = -Infinity;
	samples.forEach((v, i) => {
		if (v < lo) lo = v;
		if (v > hi) hi = v;
		if (!Number.isFinite(v)) throw new DegenerateEnvelopeError(i, 'derivative is not finite');
	});
	const range = hi - lo;
	if (!(range > 0)) {
		throw new DegenerateEnvelopeError(0, 'signal derivative has no range (flat input)');
	}
	return createWaveform(samples.map(v => (2 * (v - lo)) / range - 1), sampleRate);
}

export function computeSQI(waveform: Waveform, config: SQIConfig): SQIResult {
	validateConfig(config);
	logParameters(config);

	const fs = config.targetSampleRate;
	const resampled = resampleToRate(waveform, fs);
	const windowSamples = Math.floor(config.windowSeconds * fs);
	if (resampled.samples.length < windowSamples) {
		throw new InputTooShortError(windowSamples, resampled.samples.length, 'resampling');
	}
	assertNotFlat(resampled);

	// A. Signal pre-processing
	const prefiltered = bandpass(resampled, config.prefilterBand.low, config.prefilterBand.high, config.prefilterOrder);
	const derivative = createWaveform(gradient(prefiltered.samples, 1 / fs), fs);
	const normalized = normalizeDerivative(derivative);
	const envelope = detectEnvelope(normalized, config.envelopeCutoff, config.envelopeOrder);
	const flattened = normalizeByEnvelope(normalized, envelope);

	// B. Dominant frequency in sliding windows
	const adaptive = adaptiveFrequencyFilter(flattened, {
		windowSeconds: config.windowSeconds,
		stepSeconds: config.stepSeconds,
		passbandWidthPercent: config.passbandWidthPercent,
		filterKind: config.slidingFilter,
		filterOrder: config.slidingFilterOrder,
		nfft: config.nfft,
	});
	const freqs = adaptive.dominantFrequencies;
	logger.debug(
		`${adaptive.segments.length} analysis windows, dominant frequency ` +
		`${Math.min(...freqs).toFixed(4)}-${Math.max(...freqs).toFixed(4)} Hz`
	);

	// C. Cycle segmentation
	const distance = minimumExtremumDistance(freqs, fs, config.distanceFraction, config.minPeriodSeconds);
	const annotated = detectExtrema(adaptive.reconstructed, {
		kind: config.extremum,
		distance,
		thresholdFraction: config.prominenceFraction,
	});
	const segments = segmentCycles(annotated);
	logger.debug(`${annotated.extrema.indices.length} ${config.extremum}s at minimum distance ${distance}, ${segments.length} cycles`);

	// D. Similarity analysis
	const cycles = scoreCycles(segments, fs, { templateLength: config.templateLength });

	return {
		cycles: Object.freeze(cycles),
		extrema: annotated.extrema,
		dominantFrequencies: freqs,
		sampleRate: fs,
		config,
	};
}

export function respiratorySQI(waveform: Waveform, overrides: Partial<SQIConfig> = {}): SQIResult {
	return computeSQI(waveform, resolveConfig('respiratory', overrides));
}

export function cardiacSQI(waveform: Waveform, overrides: Partial<SQIConfig> = {}): SQIResult {
	return computeSQI(waveform, resolveConfig('cardiac', overrides));
}
