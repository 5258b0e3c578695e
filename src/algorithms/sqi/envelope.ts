// Amplitude envelope of a pseudoperiodic waveform.
// The positive and negative halves are squared and smoothed separately; the
// square root of twice the smoothed power recovers the local amplitude.

import { DegenerateEnvelopeError } from '../../errors';
import type { Envelope, Waveform } from '../../types/sqi.types';
import { createWaveform } from '../../utils/waveform';
import { lowpass } from '../filtering';

/** Envelopes closer than this are treated as collapsed. */
export const DEGENERATE_ENVELOPE_TOLERANCE = 1e-12;

export function detectEnvelope(waveform: Waveform, cutoff: number, order: number): Envelope {
	const { samples, sampleRate } = waveform;
	const positive = createWaveform(samples.map(x => (x > 0 ? x * x : 0)), sampleRate);
	const negative = createWaveform(samples.map(x => (x < 0 ? x * x : 0)), sampleRate);

	const upper = lowpass(positive, cutoff, order).samples.map(v => Math.sqrt(Math.max(0, 2 * v)));
	const lower = lowpass(negative, cutoff, order).samples.map(v => -Math.sqrt(Math.max(0, 2 * v)));

	return { lower, upper };
}

/**
 * Flatten the amplitude so every cycle spans roughly [0, 1].
 * Throws at the first sample where the envelope has collapsed.
 */
export function normalizeByEnvelope(waveform: Waveform, { lower, upper }: Envelope): Waveform {
	const { samples, sampleRate } = waveform;
	const out = new Array<number>(samples.length);
	for (let i = 0; i < samples.length; i++) {
		const span = upper[i] - lower[i];
		if (!(span > DEGENERATE_ENVELOPE_TOLERANCE)) {
			throw new DegenerateEnvelopeError(i);
		}
		out[i] = (samples[i] - lower[i]) / span;
	}
	return createWaveform(out, sampleRate);
}
