/**
 * Recording Processor Unit Tests
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { RecordingProcessor, type RecordingEvent } from '../../src/processors/RecordingProcessor';
import { DegenerateEnvelopeError } from '../../src/errors';
import type { Waveform } from '../../src/types/sqi.types';
import { BREATHING_25HZ, FLAT_25HZ, PULSE_100HZ } from '../fixtures/signals';

jest.setTimeout(60000);

describe('RecordingProcessor', () => {
  let processor: RecordingProcessor;

  beforeEach(() => {
    processor = new RecordingProcessor();
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('uses the default acceptance threshold', () => {
    const config = processor.getConfig();
    expect(config.acceptThreshold).toBe(0.8);
    expect(config.includePlethysmogramMetrics).toBe(false);
  });

  it('scores only the channels supplied', () => {
    const report = processor.process({ respiratory: BREATHING_25HZ });
    expect(report.channels.cardiac).toBeUndefined();

    const outcome = report.channels.respiratory;
    expect(outcome?.status).toBe('ok');
    if (outcome?.status === 'ok') {
      expect(outcome.summary.count).toBe(outcome.result.cycles.length);
      expect(outcome.summary.fractionAboveThreshold).toBe(1);
      expect(outcome.summary.ratePerMinute).toBeGreaterThan(14);
      expect(outcome.summary.ratePerMinute).toBeLessThan(16);
      expect(outcome.plethysmogram).toBeUndefined();
    }
  });

  it('reports an unusable channel as unavailable', () => {
    const events: RecordingEvent[] = [];
    processor.onEvent(event => events.push(event));

    const report = processor.process({ cardiac: FLAT_25HZ });
    const outcome = report.channels.cardiac;
    expect(outcome?.status).toBe('unavailable');
    if (outcome?.status === 'unavailable') {
      expect(outcome.error).toBeInstanceOf(DegenerateEnvelopeError);
    }
    expect(events.map(e => e.type)).toEqual(['start', 'unavailable']);
    expect(events[0]).toEqual({ type: 'start', channel: 'cardiac', samples: 3000 });
  });

  it('keeps scoring other channels after one fails', () => {
    const events: RecordingEvent[] = [];
    processor.onEvent(event => events.push(event));

    const report = processor.process({ cardiac: FLAT_25HZ, respiratory: BREATHING_25HZ });
    expect(report.channels.cardiac?.status).toBe('unavailable');
    expect(report.channels.respiratory?.status).toBe('ok');
    expect(events.map(e => `${e.channel}:${e.type}`)).toEqual([
      'cardiac:start',
      'cardiac:unavailable',
      'respiratory:start',
      'respiratory:complete',
    ]);
  });

  it('passes per-mode overrides to the pipeline', () => {
    const custom = new RecordingProcessor({ cardiac: { extremum: 'trough' } });
    const outcome = custom.processChannel('cardiac', PULSE_100HZ);
    expect(outcome.status).toBe('ok');
    if (outcome.status === 'ok') {
      expect(outcome.result.extrema.kind).toBe('trough');
    }
  });

  it('adds plethysmogram metrics to the cardiac channel when asked', () => {
    const custom = new RecordingProcessor({ includePlethysmogramMetrics: true });
    const outcome = custom.processChannel('cardiac', PULSE_100HZ);
    expect(outcome.status).toBe('ok');
    if (outcome.status === 'ok') {
      expect(outcome.plethysmogram?.kurtosis.values).toHaveLength(3000);
      expect(outcome.plethysmogram?.kurtosis.mean).toBeCloseTo(1.52, 1);
    }
  });

  it('logs and swallows event handler errors', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const failure = new Error('handler failed');
    processor.onEvent(() => {
      throw failure;
    });

    const report = processor.process({ cardiac: FLAT_25HZ });
    expect(report.channels.cardiac?.status).toBe('unavailable');
    expect(error).toHaveBeenCalledWith('[cycle-sqi]', '[ERROR]', 'RecordingProcessor event handler error:', failure);
  });

  it('rethrows failures that are not pipeline errors', () => {
    let reads = 0;
    const unstable: Waveform = {
      get samples(): readonly number[] {
        reads++;
        if (reads > 1) throw new TypeError('sample buffer detached');
        return [0, 1, 0, 1];
      },
      sampleRate: 25,
    };
    expect(() => processor.process({ respiratory: unstable })).toThrow(TypeError);
  });
});
