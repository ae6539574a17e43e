import { pitchFrequency } from './pitch.js';
import type { Pitch, Scale } from './types.js';

export const createScale = (description = '', pitches: Pitch[] = []): Scale => ({
  description,
  pitches,
});

export const cloneScale = (scale: Scale): Scale => structuredClone(scale);

/** One octave of frequencies, starting at and including `base`. */
export const scaleFrequencies = (scale: Scale, base: number): number[] => [
  base,
  ...scale.pitches.map((pitch) => pitchFrequency(pitch, base)),
];
