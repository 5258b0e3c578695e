// Linear resampling. Endpoints map onto endpoints, so a cycle keeps both of
// its boundary samples whatever its original length.

import { InvalidConfigurationError } from '../../errors';
import type { Waveform } from '../../types/sqi.types';
import { createWaveform } from '../../utils/waveform';

export function resampleLinear(samples: readonly number[], length: number): number[] {
	if (!Number.isInteger(length) || length < 1) {
		throw new InvalidConfigurationError('length', length, 'resample length must be a positive integer');
	}
	const n = samples.length;
	if (n === 0) return new Array<number>(length).fill(0);
	if (n === 1 || length === 1) return new Array<number>(length).fill(samples[0]);

	const scale = (n - 1) / (length - 1);
	const out = new Array<number>(length);
	for (let i = 0; i < length; i++) {
		const pos = i * scale;
		const lo = Math.min(n - 2, Math.floor(pos));
		const frac = pos - lo;
		out[i] = samples[lo] + (samples[lo + 1] - samples[lo]) * frac;
	}
	return out;
}

/** Interpolate a waveform onto a new sample rate over the same time span. */
export function resampleToRate(waveform: Waveform, targetRate: number): Waveform {
	if (!Number.isFinite(targetRate) || targetRate <= 0) {
		throw new InvalidConfigurationError('targetSampleRate', targetRate, 'must be a positive finite number');
	}
	if (!Number.isFinite(waveform.sampleRate) || waveform.sampleRate <= 0) {
		throw new InvalidConfigurationError('sampleRate', waveform.sampleRate, 'must be a positive finite number');
	}
	if (targetRate === waveform.sampleRate) {
		return createWaveform(waveform.samples, targetRate);
	}
	const length = Math.max(1, Math.round((waveform.samples.length * targetRate) / waveform.sampleRate));
	return createWaveform(resampleLinear(waveform.samples, length), targetRate);
}

/** Central differences in the interior, one-sided at the ends. */
export function gradient(samples: readonly number[], spacing: number): number[] {
	const n = samples.length;
	if (n < 2) return new Array<number>(n).fill(0);
	const out = new Array<number>(n);
	out[0] = (samples[1] - samples[0]) / spacing;
	out[n - 1] = (samples[n - 1] - samples[n - 2]) / spacing;
	for (let i = 1; i < n - 1; i++) {
		out[i] = (samples[i + 1] - samples[i - 1]) / (2 * spacing);
	}
	return out;
}
