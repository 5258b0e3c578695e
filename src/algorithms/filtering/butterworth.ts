// Zero-phase Butterworth filtering.
// Design follows the bilinear transform method (Oppenheim & Schafer, 1989):
// analog prototype poles -> frequency transform -> bilinear map -> polynomials.

import { add, complex, divide, isComplex, multiply, sqrt, subtract, type Complex } from 'mathjs';

import { FilterError, InvalidConfigurationError } from '../../errors';
import type { FilterSpec, TransferFunction, Waveform } from '../../types/sqi.types';
import { solveLinearSystem } from '../../utils/linalg';
import { createWaveform } from '../../utils/waveform';

/** Normalized cutoffs are kept this far inside (0, 1) after clamping. */
export const CUTOFF_EPSILON = 1e-6;

type ZPK = {
	zeros: Complex[];
	poles: Complex[];
	gain: number;
};

// ============================================================================
// Complex helpers
// ============================================================================

function toComplex(value: unknown): Complex {
	if (isComplex(value)) return value;
	if (typeof value === 'number') return complex(value, 0);
	throw new Error('Expected a complex value from filter design');
}

const cAdd = (x: Complex, y: Complex): Complex => toComplex(add(x, y));
const cSub = (x: Complex, y: Complex): Complex => toComplex(subtract(x, y));
const cMul = (x: Complex, y: Complex): Complex => toComplex(multiply(x, y));
const cDiv = (x: Complex, y: Complex): Complex => toComplex(divide(x, y));
const cSqrt = (x: Complex): Complex => toComplex(sqrt(x));
const real = (v: number): Complex => complex(v, 0);

function product(values: Complex[]): Complex {
	return values.reduce((acc, v) => cMul(acc, v), real(1));
}

/** Expand roots into monic polynomial coefficients, highest power first. */
function poly(roots: Complex[]): number[] {
	let coeffs: Complex[] = [real(1)];
	for (const root of roots) {
		const next = new Array<Complex>(coeffs.length + 1);
		for (let i = 0; i <= coeffs.length; i++) {
			const carry = i < coeffs.length ? coeffs[i] : real(0);
			const shifted = i > 0 ? cMul(coeffs[i - 1], root) : real(0);
			next[i] = cSub(carry, shifted);
		}
		coeffs = next;
	}
	return coeffs.map(c => c.re);
}

// ============================================================================
// Design
// ============================================================================

function assertOrder(order: number): void {
	if (!Number.isInteger(order) || order < 1) {
		throw new InvalidConfigurationError('order', order, 'filter order must be a positive integer');
	}
}

/**
 * Clamp a cutoff into [0, nyquist] and return it as a fraction of Nyquist,
 * nudged inside the open interval the bilinear design needs.
 */
export function normalizeCutoff(cutoff: number, sampleRate: number, parameter = 'cutoff'): number {
	if (!Number.isFinite(cutoff)) {
		throw new InvalidConfigurationError(parameter, cutoff, 'cutoff must be finite');
	}
	if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
		throw new InvalidConfigurationError('sampleRate', sampleRate, 'must be a positive finite number');
	}
	const nyq = sampleRate / 2;
	const clamped = Math.min(Math.max(cutoff, 0), nyq);
	return Math.min(Math.max(clamped / nyq, CUTOFF_EPSILON), 1 - CUTOFF_EPSILON);
}

/** Analog Butterworth prototype: unit cutoff, poles on the left half of the unit circle. */
function prototype(order: number): ZPK {
	const poles: Complex[] = [];
	for (let m = -order + 1; m < order; m += 2) {
		const angle = (Math.PI * m) / (2 * order);
		poles.push(complex(-Math.cos(angle), -Math.sin(angle)));
	}
	return { zeros: [], poles, gain: 1 };
}

/** Pre-warp a normalized frequency for the bilinear transform at fs = 2. */
const warp = (wn: number): number => 4 * Math.tan((Math.PI * wn) / 2);

function toLowpass({ zeros, poles, gain }: ZPK, wo: number): ZPK {
	const degree = poles.length - zeros.length;
	return {
		zeros: zeros.map(z => cMul(z, real(wo))),
		poles: poles.map(p => cMul(p, real(wo))),
		gain: gain * Math.pow(wo, degree),
	};
}

function toHighpass({ zeros, poles, gain }: ZPK, wo: number): ZPK {
	const degree = poles.length - zeros.length;
	const w = real(wo);
	const num = product(zeros.map(z => cMul(z, real(-1))));
	const den = product(poles.map(p => cMul(p, real(-1))));
	return {
		zeros: [...zeros.map(z => cDiv(w, z)), ...new Array<Complex>(degree).fill(real(0))],
		poles: poles.map(p => cDiv(w, p)),
		gain: gain * cDiv(num, den).re,
	};
}

function toBandpass({ zeros, poles, gain }: ZPK, wo: number, bw: number): ZPK {
	const degree = poles.length - zeros.length;
	const half = real(bw / 2);
	const wo2 = real(wo * wo);
	const split = (roots: Complex[]): Complex[] => {
		const scaled = roots.map(r => cMul(r, half));
		const offsets = scaled.map(r => cSqrt(cSub(cMul(r, r), wo2)));
		return [
			...scaled.map((r, i) => cAdd(r, offsets[i])),
			...scaled.map((r, i) => cSub(r, offsets[i])),
		];
	};
	return {
		zeros: [...split(zeros), ...new Array<Complex>(degree).fill(real(0))],
		poles: split(poles),
		gain: gain * Math.pow(bw, degree),
	};
}

function bilinear({ zeros, poles, gain }: ZPK): ZPK {
	const fs2 = real(4);
	const degree = poles.length - zeros.length;
	const mapRoot = (r: Complex): Complex => cDiv(cAdd(fs2, r), cSub(fs2, r));
	const num = product(zeros.map(z => cSub(fs2, z)));
	const den = product(poles.map(p => cSub(fs2, p)));
	return {
		zeros: [...zeros.map(mapRoot), ...new Array<Complex>(degree).fill(real(-1))],
		poles: poles.map(mapRoot),
		gain: gain * cDiv(num, den).re,
	};
}

/** Digital Butterworth design for a filter spec at the given sample rate. */
export function designButterworth(spec: FilterSpec, sampleRate: number): TransferFunction {
	assertOrder(spec.order);
	const analog = prototype(spec.order);

	let transformed: ZPK;
	if (spec.kind === 'bandpass') {
		const low = normalizeCutoff(spec.low, sampleRate, 'low');
		const high = normalizeCutoff(spec.high, sampleRate, 'high');
		if (low >= high) {
			throw new InvalidConfigurationError('band', `${spec.low}-${spec.high}`, 'low edge must be below high edge after clamping');
		}
		const w1 = warp(low);
		const w2 = warp(high);
		transformed = toBandpass(analog, Math.sqrt(w1 * w2), w2 - w1);
	} else {
		const wo = warp(normalizeCutoff(spec.cutoff, sampleRate));
		transformed = spec.kind === 'lowpass' ? toLowpass(analog, wo) : toHighpass(analog, wo);
	}

	const digital = bilinear(transformed);
	const b = poly(digital.zeros).map(c => c * digital.gain);
	const a = poly(digital.poles);
	return { b, a };
}

// ============================================================================
// Filtering
// ============================================================================

function padCoefficients({ b, a }: TransferFunction): { b: number[]; a: number[] } {
	const n = Math.max(a.length, b.length);
	const a0 = a[0];
	const pad = (c: readonly number[]) => [...c.map(v => v / a0), ...new Array<number>(n - c.length).fill(0)];
	return { b: pad(b), a: pad(a) };
}

/** Direct form II transposed IIR filter with optional initial state. */
export function lfilter(tf: TransferFunction, samples: readonly number[], initialState?: readonly number[]): number[] {
	const { b, a } = padCoefficients(tf);
	const order = b.length - 1;
	const state = initialState ? [...initialState] : new Array<number>(order).fill(0);
	const output = new Array<number>(samples.length);

	for (let i = 0; i < samples.length; i++) {
		const x = samples[i];
		const y = b[0] * x + (order > 0 ? state[0] : 0);
		for (let k = 0; k < order - 1; k++) {
			state[k] = b[k + 1] * x + state[k + 1] - a[k + 1] * y;
		}
		if (order > 0) {
			state[order - 1] = b[order] * x - a[order] * y;
		}
		output[i] = y;
	}
	return output;
}

/** Initial state that makes lfilter's step response start in steady state. */
export function lfilterZi(tf: TransferFunction): number[] {
	const { b, a } = padCoefficients(tf);
	const order = b.length - 1;
	if (order === 0) return [];

	// (I - companion(a)^T) · zi = b[1:] - a[1:] · b[0]
	const system: number[][] = [];
	for (let i = 0; i < order; i++) {
		const row = new Array<number>(order).fill(0);
		row[i] = 1;
		row[0] += a[i + 1];
		if (i + 1 < order) row[i + 1] -= 1;
		system.push(row);
	}
	const rhs = b.slice(1).map((v, i) => v - a[i + 1] * b[0]);
	return solveLinearSystem(system, rhs);
}

export const padLengthFor = ({ b, a }: TransferFunction): number => 3 * Math.max(a.length, b.length);

function oddExtend(samples: readonly number[], padLength: number): number[] {
	const n = samples.length;
	const first = samples[0];
	const last = samples[n - 1];
	const left: number[] = [];
	for (let i = padLength; i >= 1; i--) left.push(2 * first - samples[i]);
	const right: number[] = [];
	for (let i = n - 2; i >= n - 1 - padLength; i--) right.push(2 * last - samples[i]);
	return [...left, ...samples, ...right];
}

/**
 * Forward-backward filtering: zero phase, squared magnitude response.
 * Inputs must be longer than the odd-extension pad (3 × filter length).
 */
export function filtfilt(tf: TransferFunction, samples: readonly number[]): number[] {
	const padLength = padLengthFor(tf);
	if (samples.length <= padLength) {
		throw new FilterError(padLength + 1, samples.length);
	}

	const extended = oddExtend(samples, padLength);
	const zi = lfilterZi(tf);

	const forward = lfilter(tf, extended, zi.map(z => z * extended[0]));
	forward.reverse();
	const backward = lfilter(tf, forward, zi.map(z => z * forward[0]));
	backward.reverse();

	return backward.slice(padLength, padLength + samples.length);
}

// ============================================================================
// Waveform-level API
// ============================================================================

export function applyFilter(waveform: Waveform, spec: FilterSpec): Waveform {
	const tf = designButterworth(spec, waveform.sampleRate);
	return createWaveform(filtfilt(tf, waveform.samples), waveform.sampleRate);
}

export const lowpass = (waveform: Waveform, cutoff: number, order: number): Waveform =>
	applyFilter(waveform, { kind: 'lowpass', cutoff, order });

export const highpass = (waveform: Waveform, cutoff: number, order: number): Waveform =>
	applyFilter(waveform, { kind: 'highpass', cutoff, order });

export const bandpass = (waveform: Waveform, low: number, high: number, order: number): Waveform =>
	applyFilter(waveform, { kind: 'bandpass', low, high, order });
