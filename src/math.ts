/**
 * Numeric helpers shared by the fetcher and the scoring code.
 */

/** Round to a fixed number of decimals. Halves round up. */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
