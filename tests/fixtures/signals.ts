/**
 * Synthetic test signals.
 * All generators sample sin(2π·f·t) at t = i / fs, starting at phase 0.
 */

import { createWaveform } from '../../src/utils/waveform';
import type { Waveform } from '../../src/types/sqi.types';

export function sine(frequency: number, sampleRate: number, seconds: number, amplitude = 1): number[] {
  const n = Math.round(sampleRate * seconds);
  return Array.from({ length: n }, (_, i) => amplitude * Math.sin((2 * Math.PI * frequency * i) / sampleRate));
}

// Quiet breathing: 15 breaths/min, belt sampled at 25 Hz for two minutes
export const BREATHING_25HZ: Waveform = createWaveform(sine(0.25, 25, 120), 25);

// 72 bpm pulse at 100 Hz for 30 s
export const PULSE_100HZ: Waveform = createWaveform(sine(1.2, 100, 30), 100);

// Breathing with a slow (100 s) amplitude swing of ±60%
export const MODULATED_BREATHING_25HZ: Waveform = createWaveform(
  Array.from({ length: 3000 }, (_, i) => {
    const t = i / 25;
    return (1 + 0.6 * Math.sin(2 * Math.PI * 0.01 * t)) * Math.sin(2 * Math.PI * 0.25 * t);
  }),
  25
);

// Breathing with a motion burst between 60 s and 68 s
export const ARTIFACT_BREATHING_25HZ: Waveform = createWaveform(
  Array.from({ length: 3000 }, (_, i) => {
    const t = i / 25;
    if (i >= 1500 && i < 1700) {
      return 0.6 * Math.sin(2 * Math.PI * 0.25 * t) + 0.8 * Math.sin(2 * Math.PI * 1.1 * t);
    }
    return Math.sin(2 * Math.PI * 0.25 * t);
  }),
  25
);

export const FLAT_25HZ: Waveform = createWaveform(new Array<number>(3000).fill(0), 25);
