/**
 * Safe number utilities shared by every normalization step
 */

/**
 * a / b, or 0 when the denominator is 0 or either side is not finite.
 */
export const safeRatio = (numerator: number, denominator: number): number => {
  if (!isFinite(numerator) || !isFinite(denominator)) return 0;
  if (denominator === 0) return 0;
  return numerator / denominator;
};

export const clamp = (value: number, min: number, max: number): number => {
  if (isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
};

/** min(1, count / reference), the bounded fraction every count-based score uses. */
export const boundedFraction = (count: number, reference: number): number =>
  clamp(safeRatio(count, reference), 0, 1);

export const safeNumber = (value: unknown, defaultValue: number = 0): number => {
  if (value === null || value === undefined || value === '') return defaultValue;
  const num = Number(value);
  if (isNaN(num)) return defaultValue;
  if (!isFinite(num)) return defaultValue;
  return num;
};

export const roundTo = (value: number, decimals: number = 2): number => {
  if (!isFinite(value)) return 0;
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
};

export const sum = (values: readonly number[]): number =>
  values.reduce((total, value) => total + value, 0);

export const mean = (values: readonly number[]): number => safeRatio(sum(values), values.length);
