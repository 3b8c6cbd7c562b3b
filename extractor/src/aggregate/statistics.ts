import * as R from "ramda";

/**
 * Arithmetic mean, or `undefined` when there is nothing to average.
 */
export function mean(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined;
  return R.sum(values) / values.length;
}

/**
 * Middle value of the sorted series; the average of the two middle values
 * when the count is even. Does not reorder `values`.
 */
export function median(values: readonly number[]): number | undefined {
  if (values.length === 0) return undefined;
  const sorted = R.sort((a, b) => a - b, values);
  const mid = Math.floor(sorted.length / 2);

  if (sorted.length % 2 === 0) {
    const left = sorted[mid - 1];
    const right = sorted[mid];
    if (left === undefined || right === undefined) return undefined;
    return (left + right) / 2;
  }
  return sorted[mid];
}
