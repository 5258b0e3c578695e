/**
 * Core types for the cycle signal quality pipeline.
 * Shared definitions for waveforms, filters, extrema and per-cycle records.
 */

// ============================================================================
// WAVEFORMS
// ============================================================================

export type Waveform = {
	readonly samples: readonly number[];
	readonly sampleRate: number; // Hz
};

export type SignalMode = 'cardiac' | 'respiratory';

export type FrequencyBand = {
	low: number;  // Hz
	high: number; // Hz
};

// ============================================================================
// FILTERS
// ============================================================================

export type FilterKind = 'lowpass' | 'highpass' | 'bandpass';

export type FilterSpec =
	| { kind: 'lowpass' | 'highpass'; cutoff: number; order: number }
	| { kind: 'bandpass'; low: number; high: number; order: number };

/** Direct-form coefficients, normalized so that a[0] === 1. */
export type TransferFunction = {
	b: readonly number[];
	a: readonly number[];
};

export type Envelope = {
	lower: readonly number[];
	upper: readonly number[];
};

// ============================================================================
// ADAPTIVE SEGMENTATION
// ============================================================================

/** Half-open sample range [start, end). */
export type IndexRange = {
	start: number;
	end: number;
};

export type AnalysisSegment = IndexRange & {
	index: number;
	dominantFrequency: number; // Hz
	passband: FrequencyBand;
};

export type SlidingFilterKind = 'bandpass' | 'lowpass';

export type WindowContribution = {
	segment: AnalysisSegment;
	filtered: readonly number[];
};

export type AdaptiveFilterResult = {
	reconstructed: Waveform;
	segments: readonly AnalysisSegment[];
	dominantFrequencies: readonly number[];
};

// ============================================================================
// EXTREMA & CYCLES
// ============================================================================

export type ExtremumKind = 'peak' | 'trough';

export type ExtremumSet = {
	kind: ExtremumKind;
	indices: readonly number[];
	minDistance: number; // samples
};

/** A waveform whose extrema have been located; the only input the cycle segmenter takes. */
export type AnnotatedWaveform = Waveform & {
	readonly extrema: ExtremumSet;
};

/** Slice of the reconstructed signal between two consecutive extrema, both ends inclusive. */
export type CycleSegment = {
	start: number;
	end: number;
	samples: readonly number[];
};

export type CycleRecord = {
	readonly startTime: number;  // s
	readonly endTime: number;    // s
	readonly centerTime: number; // s
	readonly correlation: number;
};

export type CycleQuality = 'excellent' | 'good' | 'fair' | 'poor';

// ============================================================================
// CONFIGURATION & RESULTS
// ============================================================================

export type SQIConfig = {
	mode: SignalMode;
	/** Internal analysis rate (Hz) */
	targetSampleRate: number;
	/** Pre-filter passband (Hz) */
	prefilterBand: FrequencyBand;
	prefilterOrder: number;
	/** Envelope low-pass cutoff (Hz) */
	envelopeCutoff: number;
	envelopeOrder: number;
	/** Sliding analysis window length (s) */
	windowSeconds: number;
	/** Sliding analysis window step (s) */
	stepSeconds: number;
	/** Full passband width as a percentage of the window's dominant frequency */
	passbandWidthPercent: number;
	slidingFilter: SlidingFilterKind;
	slidingFilterOrder: number;
	/** Fastest credible cycle period (s); floors the extremum distance */
	minPeriodSeconds: number;
	/** Fraction of the slowest detected period used as minimum extremum distance */
	distanceFraction: number;
	extremum: ExtremumKind;
	/** Minimum prominence as a fraction of the 5th-95th percentile range */
	prominenceFraction: number;
	/** Canonical cycle length for template matching */
	templateLength: number;
	/** Welch FFT size */
	nfft: number;
};

export type SQIResult = {
	cycles: readonly CycleRecord[];
	extrema: ExtremumSet;
	dominantFrequencies: readonly number[];
	sampleRate: number;
	config: SQIConfig;
};

export type CycleSummary = {
	count: number;
	bands: Record<CycleQuality, number>;
	meanCorrelation: number;
	minCorrelation: number;
	fractionAboveThreshold: number;
	threshold: number;
	meanDurationSeconds: number;
	ratePerMinute: number;
};

export type WindowedMetric = {
	mean: number;
	std: number;
	values: readonly number[];
};
