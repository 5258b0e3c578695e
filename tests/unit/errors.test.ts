/**
 * Error Hierarchy and Logger Unit Tests
 */

import { describe, it, expect, jest, afterEach } from '@jest/globals';
import {
  DegenerateEnvelopeError,
  FilterError,
  InputTooShortError,
  InsufficientCyclesError,
  InvalidConfigurationError,
  SQIError,
  isSQIError,
} from '../../src/errors';
import logger, { getLogLevel, setLogLevel } from '../../src/utils/logger';

describe('SQIError subclasses', () => {
  it('carry a code, a stage and their own name', () => {
    const err = new InputTooShortError(300, 10);
    expect(err).toBeInstanceOf(SQIError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('InputTooShortError');
    expect(err.code).toBe('INPUT_TOO_SHORT');
    expect(err.stage).toBe('segmentation');
    expect(err.message).toBe('Need at least 300 samples, got 10');
  });

  it('describe each failure in its message', () => {
    expect(new FilterError(10, 9).message).toBe('Filter needs an input longer than 9 samples, got 9');
    expect(new DegenerateEnvelopeError(42).message).toBe('Degenerate envelope at sample 42: upper and lower envelopes coincide');
    expect(new InsufficientCyclesError(1).message).toBe('Need at least 2 cycles to build a template, found 1');
    expect(new InvalidConfigurationError('nfft', 3, 'must be even').message).toBe('Invalid nfft (3): must be even');
  });

  it('record the stage that raised them', () => {
    expect(new InputTooShortError(300, 10, 'resampling').stage).toBe('resampling');
    expect(new FilterError(10, 9).stage).toBe('filtering');
    expect(new InsufficientCyclesError(0).stage).toBe('scoring');
    expect(new InvalidConfigurationError('x', 1, 'bad').stage).toBe('configuration');
  });

  it('are recognised by the type guard', () => {
    expect(isSQIError(new FilterError(10, 9))).toBe(true);
    expect(isSQIError(new Error('other'))).toBe(false);
    expect(isSQIError('INPUT_TOO_SHORT')).toBe(false);
  });
});

describe('logger', () => {
  afterEach(() => {
    setLogLevel('warn');
    jest.restoreAllMocks();
  });

  it('defaults to warnings and above', () => {
    expect(getLogLevel()).toBe('warn');
  });

  it('prefixes messages and filters by level', () => {
    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    logger.info('hidden');
    logger.warn('shown', 3);
    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[cycle-sqi]', '[WARN]', 'shown', 3);

    setLogLevel('info');
    logger.info('now shown');
    expect(info).toHaveBeenCalledWith('[cycle-sqi]', '[INFO]', 'now shown');
  });

  it('silences everything at the silent level', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('silent');
    logger.error('dropped');
    expect(error).not.toHaveBeenCalled();
  });
});
