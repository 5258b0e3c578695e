/**
 * Multi-channel recording quality processor.
 *
 * Runs the cycle SQI on each channel a recording carries and folds the
 * outcome into one report. A channel whose signal the pipeline cannot
 * score (too short, flat, fewer than two cycles) is reported as
 * unavailable instead of failing the whole recording.
 *
 * @example
 * ```typescript
 * const processor = new RecordingProcessor({ acceptThreshold: 0.8 });
 * processor.onEvent((event) => console.log(event.channel, event.type));
 *
 * const report = processor.process({
 *   cardiac: createWaveform(ppg, 100),
 *   respiratory: createWaveform(belt, 25),
 * });
 * ```
 */

import { isSQIError, type SQIError } from '../errors';
import { plethysmogramSQI, type PlethysmogramMetrics } from '../algorithms/plethysmogram';
import { cardiacSQI, respiratorySQI } from '../algorithms/sqi/pipeline';
import { DEFAULT_ACCEPT_THRESHOLD, summarizeCycles } from '../algorithms/sqi/quality';
import type { CycleSummary, SignalMode, SQIConfig, SQIResult, Waveform } from '../types/sqi.types';
import logger from '../utils/logger';

// ============================================================================
// Types
// ============================================================================

export type RecordingChannels = Partial<Record<SignalMode, Waveform>>;

export type RecordingConfig = {
	/** Correlation counted as an accepted cycle (default: 0.8) */
	acceptThreshold: number;
	/** Add Elgendi skewness/kurtosis/entropy for the cardiac channel (default: false) */
	includePlethysmogramMetrics: boolean;
	/** Per-mode pipeline overrides */
	cardiac: Partial<SQIConfig>;
	respiratory: Partial<SQIConfig>;
};

export type ChannelOutcome =
	| { status: 'ok'; result: SQIResult; summary: CycleSummary; plethysmogram?: PlethysmogramMetrics }
	| { status: 'unavailable'; error: SQIError };

export type RecordingReport = {
	/** Processing timestamp (Unix ms) */
	processedAt: number;
	processingTimeMs: number;
	channels: Partial<Record<SignalMode, ChannelOutcome>>;
};

export type RecordingEvent =
	| { type: 'start'; channel: SignalMode; samples: number }
	| { type: 'complete'; channel: SignalMode; cycles: number }
	| { type: 'unavailable'; channel: SignalMode; reason: string };

export type RecordingEventHandler = (event: RecordingEvent) => void;

const CHANNEL_ORDER: readonly SignalMode[] = ['cardiac', 'respiratory'];

// ============================================================================
// Processor
// ============================================================================

export class RecordingProcessor {
	private config: RecordingConfig;
	private eventHandler: RecordingEventHandler | null = null;

	constructor(config: Partial<RecordingConfig> = {}) {
		this.config = {
			acceptThreshold: config.acceptThreshold ?? DEFAULT_ACCEPT_THRESHOLD,
			includePlethysmogramMetrics: config.includePlethysmogramMetrics ?? false,
			cardiac: { ...config.cardiac },
			respiratory: { ...config.respiratory },
		};
	}

	/**
	 * Register a handler for per-channel progress events.
	 */
	onEvent(handler: RecordingEventHandler): void {
		this.eventHandler = handler;
	}

	/**
	 * Score every supplied channel. Errors other than pipeline failures propagate.
	 */
	process(channels: RecordingChannels): RecordingReport {
		const started = Date.now();
		const outcomes: Partial<Record<SignalMode, ChannelOutcome>> = {};

		for (const mode of CHANNEL_ORDER) {
			const waveform = channels[mode];
			if (waveform) outcomes[mode] = this.processChannel(mode, waveform);
		}

		return {
			processedAt: started,
			processingTimeMs: Date.now() - started,
			channels: outcomes,
		};
	}

	/**
	 * Score a single channel.
	 */
	processChannel(mode: SignalMode, waveform: Waveform): ChannelOutcome {
		this.emitEvent({ type: 'start', channel: mode, samples: waveform.samples.length });

		try {
			const result = mode === 'cardiac'
				? cardiacSQI(waveform, this.config.cardiac)
				: respiratorySQI(waveform, this.config.respiratory);
			const summary = summarizeCycles(result.cycles, this.config.acceptThreshold);

			const outcome: ChannelOutcome = { status: 'ok', result, summary };
			if (mode === 'cardiac' && this.config.includePlethysmogramMetrics) {
				outcome.plethysmogram = plethysmogramSQI(waveform);
			}

			logger.info(
				`${mode}: ${summary.count} cycles, mean r=${summary.meanCorrelation.toFixed(3)}, ` +
				`${(summary.fractionAboveThreshold * 100).toFixed(1)}% >= ${summary.threshold}`
			);
			this.emitEvent({ type: 'complete', channel: mode, cycles: summary.count });
			return outcome;
		} catch (e) {
			if (!isSQIError(e)) throw e;
			logger.warn(`${mode}: no quality metric available (${e.code} at ${e.stage}): ${e.message}`);
			this.emitEvent({ type: 'unavailable', channel: mode, reason: e.message });
			return { status: 'unavailable', error: e };
		}
	}

	/**
	 * Get config for inspection (read-only).
	 */
	getConfig(): Readonly<RecordingConfig> {
		return Object.freeze({ ...this.config });
	}

	private emitEvent(event: RecordingEvent): void {
		if (this.eventHandler) {
			try {
				this.eventHandler(event);
			} catch (e) {
				logger.error('RecordingProcessor event handler error:', e);
			}
		}
	}
}
