/** EMA with alpha = 2 / (period + 1), seeded with the first observation. */
export function emaSeries(values: number[], period: number): number[] {
  if (period <= 0 || values.length === 0) return [];
  const k = 2 / (period + 1);
  const out: number[] = [values[0]];
  for (let i = 1; i < values.length; i += 1) {
    out.push(values[i] * k + out[i - 1] * (1 - k));
  }
  return out;
}

/** Wilder smoothing: alpha = 1 / period, seeded with the first observation. */
export function wilderSeries(values: number[], period: number): number[] {
  if (period <= 0 || values.length === 0) return [];
  const out: number[] = [values[0]];
  for (let i = 1; i < values.length; i += 1) {
    const prev = out[i - 1];
    out.push(prev + (values[i] - prev) / period);
  }
  return out;
}

export function latest(values: number[]): number | null {
  if (values.length === 0) return null;
  const value = values[values.length - 1];
  return Number.isFinite(value) ? value : null;
}
