import { createCentsPitch, createRatioPitch, createScale, type Pitch, type Scale } from '@tunekit/core';
import {
  MalformedCentsError,
  MalformedCountError,
  MalformedRatioError,
  MissingCountError,
  PitchCountMismatchError,
} from './errors.js';
import { sourceLines, type ScaleSource } from './source.js';

const COMMENT_PREFIX = '!';
const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(?:\d+\.\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

type ReadState = 'awaitingDescription' | 'awaitingCount' | 'readingPitches';

const parseInteger = (text: string): number | undefined => {
  if (!INTEGER.test(text)) return undefined;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : undefined;
};

export const parseCount = (line: string, lineNumber: number): number => {
  const text = line.trim();
  const count = parseInteger(text);
  if (count === undefined || count < 0) {
    throw new MalformedCountError(lineNumber, text);
  }
  return count;
};

/**
 * Parses one pitch line. Only the first whitespace-delimited token counts;
 * anything after it is an annotation. A token with a decimal point is cents,
 * anything else is a ratio `N` or `N/D` with both terms positive.
 */
export const parsePitchEntry = (line: string, lineNumber: number): Pitch => {
  const token = line.trim().split(/\s+/)[0];

  if (token.includes('.')) {
    if (!DECIMAL.test(token)) throw new MalformedCentsError(lineNumber, token);
    return createCentsPitch(Number(token));
  }

  const parts = token.split('/');
  if (parts.length > 2) throw new MalformedRatioError(lineNumber, token);

  const numerator = parseInteger(parts[0]);
  const denominator = parts.length === 2 ? parseInteger(parts[1]) : 1;
  if (numerator === undefined || denominator === undefined || numerator <= 0 || denominator <= 0) {
    throw new MalformedRatioError(lineNumber, token);
  }
  return createRatioPitch(numerator, denominator);
};

/**
 * Reads a scale in `.scl` format, consuming the source to its end.
 * Throws a {@link ScaleFormatError} on the first malformed line; errors thrown
 * by an iterable source propagate unchanged.
 */
export const readScale = (source: ScaleSource): Scale => {
  const scale = createScale();
  let state: ReadState = 'awaitingDescription';
  let expected = 0;
  let lineNumber = 0;

  for (const line of sourceLines(source)) {
    lineNumber += 1;
    if (line.startsWith(COMMENT_PREFIX)) continue;

    switch (state) {
      case 'awaitingDescription':
        scale.description = line;
        state = 'awaitingCount';
        break;
      case 'awaitingCount':
        expected = parseCount(line, lineNumber);
        state = 'readingPitches';
        break;
      case 'readingPitches':
        scale.pitches.push(parsePitchEntry(line, lineNumber));
        break;
    }
  }

  if (state !== 'readingPitches') throw new MissingCountError();
  if (scale.pitches.length !== expected) {
    throw new PitchCountMismatchError(scale.pitches.length, expected);
  }
  return scale;
};
