/**
 * Math Helper Utilities
 *
 * Safe mathematical operations that guard against division by zero,
 * NaN propagation, and other edge cases.
 */

/**
 * Calculate safe average of an array of numbers
 *
 * @param values - Array of numbers to average
 * @param defaultValue - Value to return if array is empty (default: 0)
 *
 * @example
 * ```typescript
 * safeAverage([1, 2, 3])        // => 2
 * safeAverage([])               // => 0
 * safeAverage([], 100)          // => 100
 * ```
 */
export function safeAverage(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  return safeSum(values) / values.length;
}

/**
 * Calculate safe division that guards against division by zero
 *
 * @example
 * ```typescript
 * safeDivide(10, 2)        // => 5
 * safeDivide(10, 0)        // => 0
 * safeDivide(10, 0, 100)   // => 100
 * ```
 */
export function safeDivide(numerator: number, denominator: number, defaultValue = 0): number {
  if (denominator === 0 || !Number.isFinite(denominator)) {
    return defaultValue;
  }

  return numerator / denominator;
}

/**
 * Sum of values (0 for an empty array)
 */
export function safeSum(values: readonly number[]): number {
  return values.reduce((acc, val) => acc + val, 0);
}

/**
 * Sample standard deviation (n - 1 denominator)
 *
 * Fewer than two values have no spread to measure: returns 0 rather
 * than NaN.
 *
 * @example
 * ```typescript
 * sampleStdDev([2, 4, 4, 4, 5, 5, 7, 9])  // => 2.138...
 * sampleStdDev([42])                       // => 0
 * ```
 */
export function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) {
    return 0;
  }

  const mean = safeAverage(values);
  const squaredDiffs = values.reduce((acc, val) => acc + (val - mean) ** 2, 0);
  return Math.sqrt(squaredDiffs / (values.length - 1));
}

/**
 * Linear-interpolated percentile
 *
 * @param sortedValues - Values sorted ascending
 * @param p - Percentile (0-100)
 */
export function percentile(sortedValues: readonly number[], p: number): number {
  if (p < 0 || p > 100) {
    throw new Error('Percentile must be between 0 and 100');
  }
  if (sortedValues.length === 0) {
    return 0;
  }

  const index = (p / 100) * (sortedValues.length - 1);
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const weight = index - lower;

  const lowerValue = sortedValues[lower] ?? 0;
  const upperValue = sortedValues[upper] ?? lowerValue;

  if (lower === upper) {
    return lowerValue;
  }

  return lowerValue * (1 - weight) + upperValue * weight;
}
