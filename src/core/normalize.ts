/**
 * Min-max scaling into [0, 1]. A degenerate range (`hi <= lo`) carries no
 * information, so every value maps to the midpoint.
 */
export function normalize(x: number, lo: number, hi: number): number {
  if (hi <= lo) return 0.5;
  return (x - lo) / (hi - lo);
}

export function bounds(values: readonly number[]): { min: number; max: number } {
  let min = Infinity;
  let max = -Infinity;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { min, max };
}

export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
