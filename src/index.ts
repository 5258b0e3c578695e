/**
 * cycle-sqi - per-cycle signal quality for pseudoperiodic physiological signals
 *
 * Exports all public APIs for:
 * - Cycle-by-cycle SQI of cardiac and respiratory waveforms
 * - Butterworth design, zero-phase filtering, resampling and Welch spectra
 * - Plethysmogram shape metrics (skewness, kurtosis, entropy)
 * - Multi-channel recording processing
 *
 * @example
 * ```typescript
 * import { createWaveform, respiratorySQI, summarizeCycles } from 'cycle-sqi';
 *
 * const result = respiratorySQI(createWaveform(belt, 25));
 * console.log(summarizeCycles(result.cycles).meanCorrelation);
 * ```
 */

// ============================================================================
// TYPES & ERRORS
// ============================================================================
export * from './types/sqi.types';

export {
	SQIError,
	InputTooShortError,
	FilterError,
	DegenerateEnvelopeError,
	InsufficientCyclesError,
	InvalidConfigurationError,
	isSQIError,
	type PipelineStage,
	type SQIErrorCode,
} from './errors';

// ============================================================================
// UTILITIES
// ============================================================================
export {
	createWaveform,
	mean,
	std,
	percentile,
	demean,
} from './utils/waveform';

export { setLogLevel, getLogLevel, type LogLevel } from './utils/logger';

// ============================================================================
// FILTERING
// ============================================================================
export * from './algorithms/filtering';

// ============================================================================
// CYCLE SQI
// ============================================================================
export * from './algorithms/sqi';

// ============================================================================
// PLETHYSMOGRAM METRICS
// ============================================================================
export * from './algorithms/plethysmogram';

// ============================================================================
// PROCESSORS (barrel export)
// ============================================================================
export * from './processors';
