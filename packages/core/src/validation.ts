import type { Pitch, Scale, ValidationIssue } from './types.js';

const isPositiveSafeInteger = (value: number): boolean => Number.isSafeInteger(value) && value > 0;

const validatePitch = (pitch: Pitch, pitchIndex: number): ValidationIssue | undefined => {
  if (pitch.type === 'ratio') {
    if (!isPositiveSafeInteger(pitch.numerator) || !isPositiveSafeInteger(pitch.denominator)) {
      return {
        code: 'PITCH_INVALID_RATIO',
        message: `Ratio ${pitch.numerator}/${pitch.denominator} must have positive integer terms.`,
        pitchIndex,
      };
    }
    return undefined;
  }

  if (!Number.isFinite(pitch.cents)) {
    return { code: 'PITCH_NON_FINITE_CENTS', message: `Cents value ${pitch.cents} is not finite.`, pitchIndex };
  }
  return undefined;
};

/**
 * Structural checks only: whether the scale can be written and read back
 * unchanged. Pitch ordering and other musical properties are not inspected.
 */
export const validateScale = (scale: Scale): ValidationIssue[] => {
  const issues: ValidationIssue[] = [];

  if (/[\r\n]/.test(scale.description)) {
    issues.push({ code: 'DESCRIPTION_MULTILINE', message: 'Description must fit on a single line.' });
  }
  if (scale.description.startsWith('!')) {
    issues.push({ code: 'DESCRIPTION_COMMENT_PREFIX', message: 'Description cannot start with "!".' });
  }

  scale.pitches.forEach((pitch, index) => {
    const issue = validatePitch(pitch, index);
    if (issue) issues.push(issue);
  });

  return issues;
};
