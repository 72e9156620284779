function normalizeFloat(value: number, decimals: number): number {
  return Number(value.toFixed(Math.min(12, decimals + 2)));
}

/**
 * Truncates toward zero at `decimals` places and never rounds up, so a size just
 * under a step stays under it. `null` precision leaves the amount untouched.
 */
export function floorToPrecision(amount: number, decimals: number | null): number {
  if (!Number.isFinite(amount)) return 0;
  if (decimals === null || !Number.isInteger(decimals) || decimals < 0) return amount;
  // amounts already on a step pass through: 0.57 * 100 floors to 56
  if (decimals <= 100 && Number(amount.toFixed(decimals)) === amount) return amount;
  const factor = 10 ** decimals;
  const scaled = amount * factor;
  const truncated = scaled >= 0 ? Math.floor(scaled) : Math.ceil(scaled);
  return normalizeFloat(truncated / factor, decimals);
}

export function notional(size: number, price: number, contractMultiplier: number): number {
  return size * price * contractMultiplier;
}
