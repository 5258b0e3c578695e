/**
 * Per-cycle quality bands and recording-level summaries.
 *
 * Bands:
 *   excellent  >= 0.9
 *   good       >= 0.8
 *   fair       >= 0.7
 *   poor       below 0.7
 */

import type { CycleQuality, CycleRecord, CycleSummary } from '../../types/sqi.types';
import { mean } from '../../utils/waveform';

export const QUALITY_THRESHOLDS = {
	EXCELLENT: 0.9,
	GOOD: 0.8,
	FAIR: 0.7,
} as const;

export const DEFAULT_ACCEPT_THRESHOLD = QUALITY_THRESHOLDS.GOOD;

export function classifyCorrelation(correlation: number): CycleQuality {
	if (correlation >= QUALITY_THRESHOLDS.EXCELLENT) return 'excellent';
	if (correlation >= QUALITY_THRESHOLDS.GOOD) return 'good';
	if (correlation >= QUALITY_THRESHOLDS.FAIR) return 'fair';
	return 'poor';
}

export function summarizeCycles(
	cycles: readonly CycleRecord[],
	threshold: number = DEFAULT_ACCEPT_THRESHOLD
): CycleSummary {
	const bands: Record<CycleQuality, number> = { excellent: 0, good: 0, fair: 0, poor: 0 };
	if (cycles.length === 0) {
		return {
			count: 0,
			bands,
			meanCorrelation: 0,
			minCorrelation: 0,
			fractionAboveThreshold: 0,
			threshold,
			meanDurationSeconds: 0,
			ratePerMinute: 0,
		};
	}

	const correlations = cycles.map(c => c.correlation);
	for (const r of correlations) bands[classifyCorrelation(r)]++;

	const meanDuration = mean(cycles.map(c => c.endTime - c.startTime));
	return {
		count: cycles.length,
		bands,
		meanCorrelation: mean(correlations),
		minCorrelation: Math.min(...correlations),
		fractionAboveThreshold: correlations.filter(r => r >= threshold).length / cycles.length,
		threshold,
		meanDurationSeconds: meanDuration,
		ratePerMinute: meanDuration > 0 ? 60 / meanDuration : 0,
	};
}

/**
 * One CSV line per cycle: `start,end,center,correlation,quality`, times in
 * seconds to 3 decimals and correlation to 4.
 */
export function formatCycleTable(cycles: readonly CycleRecord[], header = true): string {
	const lines = cycles.map(c =>
		[
			c.startTime.toFixed(3),
			c.endTime.toFixed(3),
			c.centerTime.toFixed(3),
			c.correlation.toFixed(4),
			classifyCorrelation(c.correlation),
		].join(',')
	);
	if (header) lines.unshift('start_s,end_s,center_s,correlation,quality');
	return lines.join('\n');
}
