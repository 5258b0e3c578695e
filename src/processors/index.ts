/**
 * Processors Module
 *
 * Recording-level orchestration over the cycle SQI pipeline.
 *
 * @module processors
 *
 * Components:
 * - RecordingProcessor: scores each channel of a recording, reports unusable channels as unavailable
 */

// ============================================================================
// Recording Processing
// ============================================================================

export {
	RecordingProcessor,
	type RecordingChannels,
	type RecordingConfig,
	type RecordingReport,
	type RecordingEvent,
	type RecordingEventHandler,
	type ChannelOutcome,
} from './RecordingProcessor';
