import type { CentsPitch, Pitch, RatioPitch } from './types.js';

export const CENTS_PER_OCTAVE = 1200;

export const createRatioPitch = (numerator = 1, denominator = 1): RatioPitch => ({
  type: 'ratio',
  numerator,
  denominator,
});

export const createCentsPitch = (cents: number): CentsPitch => ({ type: 'cents', cents });

export const UNISON: Readonly<RatioPitch> = Object.freeze(createRatioPitch());

/** Frequency of `pitch` when the scale's first degree sounds at `base`. */
export const pitchFrequency = (pitch: Pitch, base: number): number => {
  switch (pitch.type) {
    case 'ratio':
      return (pitch.numerator * base) / pitch.denominator;
    case 'cents':
      return base * 2 ** (pitch.cents / CENTS_PER_OCTAVE);
  }
};

// Number#toFixed switches to exponent notation from here on.
const FIXED_NOTATION_LIMIT = 1e21;

const formatCents = (cents: number): string => {
  if (Object.is(cents, -0)) return '-0.000000';
  if (Math.abs(cents) >= FIXED_NOTATION_LIMIT) return `${BigInt(cents)}.000000`;
  return cents.toFixed(6);
};

/**
 * Canonical text of a pitch entry. Ratios always carry their denominator and
 * cents always carry a decimal point, which is how a reader tells them apart.
 */
export const renderPitch = (pitch: Pitch): string => {
  switch (pitch.type) {
    case 'ratio':
      return `${pitch.numerator}/${pitch.denominator}`;
    case 'cents':
      return formatCents(pitch.cents);
  }
};
