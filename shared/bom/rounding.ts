/**
 * Round half away from zero to `decimals` places. Non-finite input yields 0.
 * Display only: analysis results keep their unrounded values.
 */
export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value)) return 0;
  const factor = 10 ** decimals;
  const scaled = Math.abs(value) * factor;
  // Nudge by a relative epsilon so 1.005 * 100 = 100.49999... still rounds up.
  const rounded = Math.round(scaled * (1 + Number.EPSILON)) / factor;
  return value < 0 ? -rounded : rounded;
}

export function round4dp(value: number): number {
  return roundTo(value, 4);
}

export function round2dp(value: number): number {
  return roundTo(value, 2);
}
