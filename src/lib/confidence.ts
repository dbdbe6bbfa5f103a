function clip(value: number, lo: number, hi: number): number {
  return Math.max(lo, Math.min(hi, value));
}

/**
 * Normal-approximation interval for a Monte Carlo probability. z = 1.96 gives
 * a two-sided ~95% interval. Descriptive only; the point estimate is unchanged.
 */
export function mcCiNormal(pHat: number, n: number, z: number = 1.96): [number, number] {
  const p = clip(pHat, 0, 1);
  if (n <= 0) {
    return [p, p];
  }
  const se = Math.sqrt((p * (1 - p)) / n);
  return [clip(p - z * se, 0, 1), clip(p + z * se, 0, 1)];
}
