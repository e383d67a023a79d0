/**
 * Round half up to a fixed number of decimals (per-day nutrition uses 2).
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
