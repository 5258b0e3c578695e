/* ============================================================================
   PIPELINE CONSTANTS (Romano et al., 2023; mode-specific tuning)
   ============================================================================ */

import { InvalidConfigurationError } from '../../errors';
import type { SignalMode, SQIConfig } from '../../types/sqi.types';

export const SQI_CONSTANTS = {
	RESPIRATORY: {
		TARGET_FS: 25,              // Hz
		PREFILTER: { low: 0.01, high: 2.0 },
		ENVELOPE_LPF: 0.05,         // Hz
		WINDOW_S: 12,
		STEP_S: 2,
		MIN_PERIOD_S: 3.0,          // 20 breaths/min fastest credible rate
		DISTANCE_FRACTION: 0.5,
	},
	CARDIAC: {
		TARGET_FS: 50,
		PREFILTER: { low: 0.01, high: 5.0 },
		ENVELOPE_LPF: 0.1,
		WINDOW_S: 4,
		STEP_S: 0.5,
		MIN_PERIOD_S: 0.3,          // 200 bpm fastest credible rate
		DISTANCE_FRACTION: 0.75,
	},
	SHARED: {
		PREFILTER_ORDER: 3,
		ENVELOPE_ORDER: 3,
		PASSBAND_WIDTH_PCT: 10,     // +/- 5% of the window's centre frequency
		SLIDING_FILTER_ORDER: 1,
		PROMINENCE_FRACTION: 0.05,
		TEMPLATE_LENGTH: 100,
		NFFT: 4096,
	},
} as const;

function defaultsFor(mode: SignalMode): SQIConfig {
	const block = mode === 'cardiac' ? SQI_CONSTANTS.CARDIAC : SQI_CONSTANTS.RESPIRATORY;
	const { SHARED } = SQI_CONSTANTS;
	return {
		mode,
		targetSampleRate: block.TARGET_FS,
		prefilterBand: { low: block.PREFILTER.low, high: block.PREFILTER.high },
		prefilterOrder: SHARED.PREFILTER_ORDER,
		envelopeCutoff: block.ENVELOPE_LPF,
		envelopeOrder: SHARED.ENVELOPE_ORDER,
		windowSeconds: block.WINDOW_S,
		stepSeconds: block.STEP_S,
		passbandWidthPercent: SHARED.PASSBAND_WIDTH_PCT,
		slidingFilter: 'bandpass',
		slidingFilterOrder: SHARED.SLIDING_FILTER_ORDER,
		minPeriodSeconds: block.MIN_PERIOD_S,
		distanceFraction: block.DISTANCE_FRACTION,
		extremum: 'peak',
		prominenceFraction: SHARED.PROMINENCE_FRACTION,
		templateLength: SHARED.TEMPLATE_LENGTH,
		nfft: SHARED.NFFT,
	};
}

export const RESPIRATORY_DEFAULTS: Readonly<SQIConfig> = Object.freeze(defaultsFor('respiratory'));
export const CARDIAC_DEFAULTS: Readonly<SQIConfig> = Object.freeze(defaultsFor('cardiac'));

export function resolveConfig(mode: SignalMode, overrides: Partial<SQIConfig> = {}): SQIConfig {
	const base = defaultsFor(mode);
	return {
		mode,
		targetSampleRate: overrides.targetSampleRate ?? base.targetSampleRate,
		prefilterBand: { ...(overrides.prefilterBand ?? base.prefilterBand) },
		prefilterOrder: overrides.prefilterOrder ?? base.prefilterOrder,
		envelopeCutoff: overrides.envelopeCutoff ?? base.envelopeCutoff,
		envelopeOrder: overrides.envelopeOrder ?? base.envelopeOrder,
		windowSeconds: overrides.windowSeconds ?? base.windowSeconds,
		stepSeconds: overrides.stepSeconds ?? base.stepSeconds,
		passbandWidthPercent: overrides.passbandWidthPercent ?? base.passbandWidthPercent,
		slidingFilter: overrides.slidingFilter ?? base.slidingFilter,
		slidingFilterOrder: overrides.slidingFilterOrder ?? base.slidingFilterOrder,
		minPeriodSeconds: overrides.minPeriodSeconds ?? base.minPeriodSeconds,
		distanceFraction: overrides.distanceFraction ?? base.distanceFraction,
		extremum: overrides.extremum ?? base.extremum,
		prominenceFraction: overrides.prominenceFraction ?? base.prominenceFraction,
		templateLength: overrides.templateLength ?? base.templateLength,
		nfft: overrides.nfft ?? base.nfft,
	};
}

const positive = (name: string, value: number) => {
	if (!Number.isFinite(value) || value <= 0) {
		throw new InvalidConfigurationError(name, value, 'must be a positive finite number');
	}
};

const positiveInteger = (name: string, value: number) => {
	if (!Number.isInteger(value) || value < 1) {
		throw new InvalidConfigurationError(name, value, 'must be a positive integer');
	}
};

export function validateConfig(config: SQIConfig): void {
	positive('targetSampleRate', config.targetSampleRate);
	const nyq = config.targetSampleRate / 2;

	const { low, high } = config.prefilterBand;
	positive('prefilterBand.low', low);
	if (!Number.isFinite(high) || high <= low || high >= nyq) {
		throw new InvalidConfigurationError('prefilterBand.high', high, `must lie between ${low} and the ${nyq} Hz Nyquist limit`);
	}
	positiveInteger('prefilterOrder', config.prefilterOrder);

	positive('envelopeCutoff', config.envelopeCutoff);
	if (config.envelopeCutoff >= nyq) {
		throw new InvalidConfigurationError('envelopeCutoff', config.envelopeCutoff, `must be below the ${nyq} Hz Nyquist limit`);
	}
	positiveInteger('envelopeOrder', config.envelopeOrder);

	positive('windowSeconds', config.windowSeconds);
	positive('stepSeconds', config.stepSeconds);
	if (config.stepSeconds > config.windowSeconds) {
		throw new InvalidConfigurationError('stepSeconds', config.stepSeconds, 'must not exceed windowSeconds');
	}
	if (Math.floor(config.stepSeconds * config.targetSampleRate) < 1) {
		throw new InvalidConfigurationError('stepSeconds', config.stepSeconds, 'must span at least one sample');
	}

	if (!Number.isFinite(config.passbandWidthPercent) || config.passbandWidthPercent <= 0 || config.passbandWidthPercent >= 200) {
		throw new InvalidConfigurationError('passbandWidthPercent', config.passbandWidthPercent, 'must lie in (0, 200)');
	}
	positiveInteger('slidingFilterOrder', config.slidingFilterOrder);

	if (!Number.isFinite(config.minPeriodSeconds) || config.minPeriodSeconds < 0) {
		throw new InvalidConfigurationError('minPeriodSeconds', config.minPeriodSeconds, 'must be a non-negative finite number');
	}
	positive('distanceFraction', config.distanceFraction);
	if (!Number.isFinite(config.prominenceFraction) || config.prominenceFraction < 0) {
		throw new InvalidConfigurationError('prominenceFraction', config.prominenceFraction, 'must be a non-negative finite number');
	}
	if (!Number.isInteger(config.templateLength) || config.templateLength < 2) {
		throw new InvalidConfigurationError('templateLength', config.templateLength, 'must be an integer of at least 2');
	}
	if (!Number.isInteger(config.nfft) || config.nfft < 2 || config.nfft % 2 !== 0) {
		throw new InvalidConfigurationError('nfft', config.nfft, 'must be an even integer of at least 2');
	}
	if (config.nfft < Math.min(256, Math.floor(config.windowSeconds * config.targetSampleRate))) {
		throw new InvalidConfigurationError('nfft', config.nfft, 'must cover one spectral segment');
	}
}
