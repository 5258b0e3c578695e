// Power spectral density by Welch's method (Welch, 1967).
// Each segment holds at most a few hundred samples against a 4096-point
// zero-padded transform, so the periodogram is evaluated as a direct DFT over
// the non-zero samples.

import { InvalidConfigurationError } from '../../errors';
import { hann } from './windows';

export type WelchOptions = {
	/** Zero-padded transform length (default: 4096) */
	nfft?: number;
	/** Samples per segment; clipped to the input length (default: 256) */
	segmentLength?: number;
};

export type PowerSpectrum = {
	frequencies: number[]; // Hz
	power: number[];       // units²/Hz
};

const twiddleCache = new Map<number, { cos: Float64Array; sin: Float64Array }>();

function twiddles(nfft: number) {
	let table = twiddleCache.get(nfft);
	if (!table) {
		const cos = new Float64Array(nfft);
		const sin = new Float64Array(nfft);
		for (let i = 0; i < nfft; i++) {
			cos[i] = Math.cos((2 * Math.PI * i) / nfft);
			sin[i] = Math.sin((2 * Math.PI * i) / nfft);
		}
		table = { cos, sin };
		twiddleCache.set(nfft, table);
	}
	return table;
}

export function welch(samples: readonly number[], sampleRate: number, options: WelchOptions = {}): PowerSpectrum {
	const nfft = options.nfft ?? 4096;
	if (!Number.isInteger(nfft) || nfft < 2 || nfft % 2 !== 0) {
		throw new InvalidConfigurationError('nfft', nfft, 'must be an even integer of at least 2');
	}
	const n = samples.length;
	const segmentLength = Math.min(options.segmentLength ?? 256, n);
	if (segmentLength < 1) {
		throw new InvalidConfigurationError('samples', n, 'spectral estimate needs at least one sample');
	}
	if (segmentLength > nfft) {
		throw new InvalidConfigurationError('nfft', nfft, `must cover the ${segmentLength}-sample segment`);
	}

	const window = hann(segmentLength, true);
	const windowPower = window.reduce((acc, w) => acc + w * w, 0);
	const scale = 1 / (sampleRate * windowPower);
	const step = segmentLength - Math.floor(segmentLength / 2);
	const bins = nfft / 2 + 1;
	const { cos, sin } = twiddles(nfft);

	const power = new Array<number>(bins).fill(0);
	let segments = 0;

	for (let start = 0; start + segmentLength <= n; start += step) {
		// Constant detrend, then taper
		let sum = 0;
		for (let i = 0; i < segmentLength; i++) sum += samples[start + i];
		const offset = sum / segmentLength;
		const tapered = new Float64Array(segmentLength);
		for (let i = 0; i < segmentLength; i++) {
			tapered[i] = (samples[start + i] - offset) * window[i];
		}

		for (let k = 0; k < bins; k++) {
			let re = 0;
			let im = 0;
			let idx = 0;
			for (let i = 0; i < segmentLength; i++) {
				re += tapered[i] * cos[idx];
				im -= tapered[i] * sin[idx];
				idx += k;
				if (idx >= nfft) idx -= nfft;
			}
			// One-sided: double everything except DC and Nyquist
			const fold = k === 0 || k === bins - 1 ? 1 : 2;
			power[k] += (re * re + im * im) * scale * fold;
		}
		segments++;
	}

	const frequencies = new Array<number>(bins);
	for (let k = 0; k < bins; k++) {
		frequencies[k] = (k * sampleRate) / nfft;
		power[k] /= segments;
	}
	return { frequencies, power };
}

/** Frequency of the strongest non-DC bin. */
export function dominantFrequency({ frequencies, power }: PowerSpectrum): number {
	let best = 1;
	for (let k = 2; k < power.length; k++) {
		if (power[k] > power[best]) best = k;
	}
	return frequencies[Math.min(best, frequencies.length - 1)];
}
