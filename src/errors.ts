// Typed failures raised by the SQI pipeline. Each one names the stage it came from.

export type PipelineStage =
	| 'configuration'
	| 'resampling'
	| 'filtering'
	| 'envelope'
	| 'segmentation'
	| 'detection'
	| 'scoring';

export type SQIErrorCode =
	| 'INPUT_TOO_SHORT'
	| 'FILTER'
	| 'DEGENERATE_ENVELOPE'
	| 'INSUFFICIENT_CYCLES'
	| 'INVALID_CONFIGURATION';

export abstract class SQIError extends Error {
	abstract readonly code: SQIErrorCode;
	readonly stage: PipelineStage;

	protected constructor(message: string, stage: PipelineStage) {
		super(message);
		this.name = new.target.name;
		this.stage = stage;
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

export class InputTooShortError extends SQIError {
	readonly code = 'INPUT_TOO_SHORT';

	constructor(
		readonly requiredSamples: number,
		readonly actualSamples: number,
		stage: PipelineStage = 'segmentation'
	) {
		super(`Need at least ${requiredSamples} samples, got ${actualSamples}`, stage);
	}
}

export class FilterError extends SQIError {
	readonly code = 'FILTER';

	constructor(
		readonly minimumLength: number,
		readonly actualLength: number,
		stage: PipelineStage = 'filtering'
	) {
		super(`Filter needs an input longer than ${minimumLength - 1} samples, got ${actualLength}`, stage);
	}
}

export class DegenerateEnvelopeError extends SQIError {
	readonly code = 'DEGENERATE_ENVELOPE';

	constructor(readonly sampleIndex: number, detail = 'upper and lower envelopes coincide') {
		super(`Degenerate envelope at sample ${sampleIndex}: ${detail}`, 'envelope');
	}
}

export class InsufficientCyclesError extends SQIError {
	readonly code = 'INSUFFICIENT_CYCLES';

	constructor(readonly cycleCount: number) {
		super(`Need at least 2 cycles to build a template, found ${cycleCount}`, 'scoring');
	}
}

export class InvalidConfigurationError extends SQIError {
	readonly code = 'INVALID_CONFIGURATION';

	constructor(readonly parameter: string, readonly value: unknown, reason: string) {
		super(`Invalid ${parameter} (${String(value)}): ${reason}`, 'configuration');
	}
}

export function isSQIError(value: unknown): value is SQIError {
	return value instanceof SQIError;
}
