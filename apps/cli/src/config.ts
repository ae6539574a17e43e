export const DEFAULT_BASE_HZ = 440;
export const BASE_HZ_ENV = 'TUNEKIT_BASE_HZ';

export const resolveBaseFrequency = (rawValue: string | undefined, fallback = DEFAULT_BASE_HZ, label = BASE_HZ_ENV): number => {
  if (rawValue === undefined || rawValue.trim() === '') {
    return fallback;
  }

  const value = Number(rawValue);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid ${label} value "${rawValue}". Expected a positive number.`);
  }

  return value;
};
