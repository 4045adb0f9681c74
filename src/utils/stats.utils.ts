export const mean = (values: readonly number[]): number => {
  if (values.length === 0) return 0;
  let total = 0;
  for (const value of values) total += value;
  return total / values.length;
};

/**
 * Population standard deviation (divides by n). Zero for fewer than two values.
 */
export const std = (values: readonly number[]): number => {
  if (values.length < 2) return 0;
  const mu = mean(values);
  let squares = 0;
  for (const value of values) squares += (value - mu) ** 2;
  return Math.sqrt(squares / values.length);
};

export const clamp = (value: number, min: number, max: number): number => {
  return Math.min(max, Math.max(min, value));
};

export const roundTo = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};
