/**
 * Cycle Detection Unit Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  findPeaks,
  prominence,
  minimumExtremumDistance,
  detectExtrema,
  segmentCycles,
  cycleIntervals,
  extremumAmplitudes,
} from '../../src/algorithms/sqi/cycleDetection';
import { InvalidConfigurationError } from '../../src/errors';
import { createWaveform } from '../../src/utils/waveform';

describe('findPeaks', () => {
  it('finds strict local maxima', () => {
    expect(findPeaks([0, 1, 0, 2, 0, 1, 0])).toEqual([1, 3, 5]);
  });

  it('reports a flat top once, at its middle', () => {
    expect(findPeaks([0, 1, 1, 1, 0])).toEqual([2]);
  });

  it('ignores a plateau that runs into the end', () => {
    expect(findPeaks([0, 1, 1])).toEqual([]);
  });

  it('keeps the tallest peak when neighbours are too close', () => {
    expect(findPeaks([0, 1, 0, 2, 0, 1, 0], { distance: 3 })).toEqual([3]);
  });

  it('drops peaks below the prominence threshold', () => {
    expect(findPeaks([0, 3, 1, 2, 0], { prominence: 1.5 })).toEqual([1]);
  });
});

describe('prominence', () => {
  it('measures from the higher of the two bounding minima', () => {
    const x = [0, 3, 1, 2, 0];
    expect(prominence(x, 3)).toBe(1);
    expect(prominence(x, 1)).toBe(3);
  });
});

describe('minimumExtremumDistance', () => {
  it('uses the slowest window frequency', () => {
    // floor(25 * 0.5 / 0.2) = 62 beats the floor of floor(25 * 0.5 * 3) = 37
    expect(minimumExtremumDistance([0.25, 0.2, 0.3], 25, 0.5, 3)).toBe(62);
  });

  it('matches the cardiac defaults at 72 bpm', () => {
    expect(minimumExtremumDistance([1.2], 50, 0.75, 0.3)).toBe(31);
  });

  it('falls back to the fastest-credible-rate floor', () => {
    expect(minimumExtremumDistance([], 25, 0.5, 3)).toBe(37);
    expect(minimumExtremumDistance([5], 25, 0.5, 3)).toBe(37);
  });

  it('rejects a non-positive fraction', () => {
    expect(() => minimumExtremumDistance([1], 25, 0, 3)).toThrow(InvalidConfigurationError);
  });
});

describe('detectExtrema and segmentCycles', () => {
  const wave = createWaveform([0, -1, 0, -2, 0, -1, 0], 10);

  it('finds troughs by inverting the signal', () => {
    const annotated = detectExtrema(wave, { kind: 'trough', distance: 1, thresholdFraction: 0 });
    expect(annotated.extrema.indices).toEqual([1, 3, 5]);
    expect(annotated.extrema.kind).toBe('trough');
    expect(annotated.samples).toBe(wave.samples);
  });

  it('yields one cycle fewer than extrema, sharing boundary samples', () => {
    const annotated = detectExtrema(wave, { kind: 'trough', distance: 1, thresholdFraction: 0 });
    const cycles = segmentCycles(annotated);
    expect(cycles).toEqual([
      { start: 1, end: 3, samples: [-1, 0, -2] },
      { start: 3, end: 5, samples: [-2, 0, -1] },
    ]);
  });

  it('yields no cycles from a single extremum', () => {
    const annotated = detectExtrema(createWaveform([0, 1, 0], 10), { kind: 'peak', distance: 1, thresholdFraction: 0 });
    expect(segmentCycles(annotated)).toEqual([]);
  });
});

describe('cycle statistics', () => {
  it('converts extremum spacing to seconds', () => {
    expect(cycleIntervals({ kind: 'peak', indices: [10, 35, 60], minDistance: 1 }, 25)).toEqual([1, 1]);
  });

  it('measures peak-to-following-trough swing', () => {
    const annotated = detectExtrema(createWaveform([0, 2, -1, 3, -2, 1, 0], 10), {
      kind: 'peak',
      distance: 1,
      thresholdFraction: 0,
    });
    expect(annotated.extrema.indices).toEqual([1, 3, 5]);
    expect(extremumAmplitudes(annotated)).toEqual([3, 5]);
  });
});
