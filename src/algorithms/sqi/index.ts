// Cycle-by-cycle signal quality: pre-processing, adaptive filtering, segmentation, scoring.

export { computeSQI, respiratorySQI, cardiacSQI, normalizeDerivative } from './pipeline';
export {
	SQI_CONSTANTS,
	RESPIRATORY_DEFAULTS,
	CARDIAC_DEFAULTS,
	resolveConfig,
	validateConfig,
} from './config';
export { detectEnvelope, normalizeByEnvelope, DEGENERATE_ENVELOPE_TOLERANCE } from './envelope';
export {
	planAnalysisWindows,
	passbandFor,
	analyzeWindow,
	overlapAdd,
	adaptiveFrequencyFilter,
	type AdaptiveFilterOptions,
} from './adaptiveSegmenter';
export {
	findPeaks,
	prominence,
	minimumExtremumDistance,
	detectExtrema,
	segmentCycles,
	cycleIntervals,
	extremumAmplitudes,
	type PeakOptions,
	type DetectionOptions,
} from './cycleDetection';
export {
	scoreCycles,
	minMaxNormalize,
	pearson,
	averageTemplate,
	DEFAULT_TEMPLATE_LENGTH,
	type ScoringOptions,
} from './similarityScoring';
export {
	classifyCorrelation,
	summarizeCycles,
	formatCycleTable,
	QUALITY_THRESHOLDS,
	DEFAULT_ACCEPT_THRESHOLD,
} from './quality';
