// Tapering windows. Hamming windows are requested once per analysis segment,
// always at the same few lengths, so they are memoized process-wide.

const hammingCache = new Map<number, readonly number[]>();

/** Symmetric Hamming window of the given length. */
export function hamming(length: number): readonly number[] {
	const n = Math.max(0, Math.floor(length));
	const cached = hammingCache.get(n);
	if (cached) return cached;

	const w = new Array<number>(n);
	if (n === 1) {
		w[0] = 1;
	} else {
		for (let i = 0; i < n; i++) {
			w[i] = 0.54 - 0.46 * Math.cos((2 * Math.PI * i) / (n - 1));
		}
	}
	const frozen = Object.freeze(w);
	hammingCache.set(n, frozen);
	return frozen;
}

/**
 * Hann window (Harris, 1978).
 * The periodic form is the one spectral estimators use for DFT-even segments.
 */
export function hann(length: number, periodic = false): number[] {
	const n = Math.max(0, Math.floor(length));
	if (n === 1) return [1];
	const denom = periodic ? n : n - 1;
	const w = new Array<number>(n);
	for (let i = 0; i < n; i++) {
		w[i] = 0.5 - 0.5 * Math.cos((2 * Math.PI * i) / denom);
	}
	return w;
}

export function clearWindowCache(): void {
	hammingCache.clear();
}

export function windowCacheSize(): number {
	return hammingCache.size;
}
