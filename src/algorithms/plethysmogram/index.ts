// Plethysmogram shape metrics: skewness, kurtosis and approximate entropy.

import type { Waveform, WindowedMetric } from '../../types/sqi.types';
import { entropySQI, kurtosisSQI, skewnessSQI } from './windowedMetrics';

export { detrend, polyfit, polyval } from './detrend';
export {
	PLETH_CONSTANTS,
	oddWindowLength,
	slidingMetric,
	skewness,
	kurtosis,
	approximateEntropy,
	skewnessSQI,
	kurtosisSQI,
	entropySQI,
	type WindowedMetricOptions,
} from './windowedMetrics';

export type PlethysmogramMetrics = {
	skewness: WindowedMetric;
	kurtosis: WindowedMetric;
	entropy: WindowedMetric;
};

export function plethysmogramSQI(waveform: Waveform): PlethysmogramMetrics {
	return {
		skewness: skewnessSQI(waveform),
		kurtosis: kurtosisSQI(waveform),
		entropy: entropySQI(waveform),
	};
}
