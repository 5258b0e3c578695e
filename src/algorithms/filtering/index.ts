// Filtering primitives: Butterworth design and zero-phase filtering, windows, resampling, spectra.

export {
	designButterworth,
	filtfilt,
	lfilter,
	lfilterZi,
	normalizeCutoff,
	padLengthFor,
	applyFilter,
	lowpass,
	highpass,
	bandpass,
	CUTOFF_EPSILON,
} from './butterworth';
export { hamming, hann, clearWindowCache, windowCacheSize } from './windows';
export { resampleLinear, resampleToRate, gradient } from './resample';
export { welch, dominantFrequency, type WelchOptions, type PowerSpectrum } from './spectral';
