/**
 * @fileoverview Small numeric and collection helpers shared by the model and
 * the builder.
 */

/**
 * Calculates the mean (average) of an array of numbers.
 * Returns 0 for empty arrays.
 *
 * @example
 * mean([1, 2, 3, 4, 5]) // returns 3
 * mean([]) // returns 0
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, val) => sum + val, 0) / values.length;
}

/**
 * Sort numbers ascending without mutating the input.
 */
export function sortNumeric(values: Iterable<number>): number[] {
  return [...values].sort((a, b) => a - b);
}

/**
 * Stable sort by a numeric key, ties broken by original position.
 */
export function stableSortBy<T>(
  items: readonly T[],
  key: (item: T) => number,
): T[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => key(a.item) - key(b.item) || a.index - b.index)
    .map(({ item }) => item);
}

/**
 * Find the gaps in a set of integers between its min and max.
 *
 * @example
 * findMissingIntegers([5, 6, 8, 10]) // returns [7, 9]
 */
export function findMissingIntegers(values: Iterable<number>): number[] {
  const sorted = sortNumeric(new Set(values));
  const missing: number[] = [];
  for (let i = 1; i < sorted.length; i++) {
    for (let n = sorted[i - 1] + 1; n < sorted[i]; n++) {
      missing.push(n);
    }
  }
  return missing;
}
