/**
 * Adaptive Segmenter Unit Tests
 * Window planning, passband tuning, overlap-add and the full sliding filter.
 */

import { describe, it, expect } from '@jest/globals';
import {
  planAnalysisWindows,
  passbandFor,
  overlapAdd,
  adaptiveFrequencyFilter,
} from '../../src/algorithms/sqi/adaptiveSegmenter';
import { InputTooShortError, InvalidConfigurationError } from '../../src/errors';
import { std } from '../../src/utils/waveform';
import type { AnalysisSegment } from '../../src/types/sqi.types';
import { BREATHING_25HZ } from '../fixtures/signals';

const segment = (start: number, end: number, index: number): AnalysisSegment => ({
  start,
  end,
  index,
  dominantFrequency: 1,
  passband: { low: 0.95, high: 1.05 },
});

describe('planAnalysisWindows', () => {
  it('steps across the input when the grid lands on the end', () => {
    expect(planAnalysisWindows(10, 4, 3)).toEqual([
      { start: 0, end: 4 },
      { start: 3, end: 7 },
      { start: 6, end: 10 },
    ]);
  });

  it('adds an end-anchored window to cover the tail', () => {
    expect(planAnalysisWindows(11, 4, 3)).toEqual([
      { start: 0, end: 4 },
      { start: 3, end: 7 },
      { start: 6, end: 10 },
      { start: 7, end: 11 },
    ]);
  });

  it('plans a single window when the input is exactly one window long', () => {
    expect(planAnalysisWindows(4, 4, 2)).toEqual([{ start: 0, end: 4 }]);
  });

  it('rejects inputs shorter than one window', () => {
    expect(() => planAnalysisWindows(3, 4, 1)).toThrow(InputTooShortError);
  });

  it('rejects a zero step', () => {
    expect(() => planAnalysisWindows(10, 4, 0)).toThrow(InvalidConfigurationError);
  });
});

describe('passbandFor', () => {
  it('centres a band of the given total width on the frequency', () => {
    const band = passbandFor(1, 10);
    expect(band.low).toBeCloseTo(0.95, 12);
    expect(band.high).toBeCloseTo(1.05, 12);
  });
});

describe('overlapAdd', () => {
  it('averages overlapping contributions by coverage', () => {
    const out = overlapAdd(5, [
      { segment: segment(0, 3, 0), filtered: [1, 1, 1] },
      { segment: segment(2, 5, 1), filtered: [3, 3, 3] },
    ]);
    expect(out).toEqual([1, 1, 2, 3, 3]);
  });

  it('leaves uncovered samples at zero', () => {
    expect(overlapAdd(4, [{ segment: segment(0, 2, 0), filtered: [5, 5] }])).toEqual([5, 5, 0, 0]);
  });
});

describe('adaptiveFrequencyFilter', () => {
  const result = adaptiveFrequencyFilter(BREATHING_25HZ, {
    windowSeconds: 12,
    stepSeconds: 2,
    passbandWidthPercent: 10,
    filterKind: 'bandpass',
    filterOrder: 1,
    nfft: 4096,
  });

  it('analyzes one window per 2 s step across two minutes', () => {
    // 300-sample windows every 50 samples over 3000 samples
    expect(result.segments).toHaveLength(55);
    expect(result.dominantFrequencies).toHaveLength(55);
    expect(result.segments[54]).toMatchObject({ start: 2700, end: 3000, index: 54 });
  });

  it('tracks the breathing rate in every window', () => {
    result.dominantFrequencies.forEach(f => {
      expect(f).toBeGreaterThan(0.2);
      expect(f).toBeLessThan(0.3);
    });
  });

  it('tunes each passband around its window frequency', () => {
    for (const s of result.segments) {
      expect(s.passband.low).toBeCloseTo(s.dominantFrequency * 0.95, 12);
      expect(s.passband.high).toBeCloseTo(s.dominantFrequency * 1.05, 12);
    }
  });

  it('returns a unit-variance reconstruction at the input rate', () => {
    expect(result.reconstructed.samples).toHaveLength(3000);
    expect(result.reconstructed.sampleRate).toBe(25);
    expect(std(result.reconstructed.samples)).toBeCloseTo(1, 10);
  });
});
