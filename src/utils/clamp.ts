/**
 * Numeric bounds shared by every scalar the negotiation core stores.
 */

export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

/** [0, 1]: favor intensities, traits, probabilities, support scores. */
export function clampUnit(value: number): number {
  return clamp(value, 0, 1);
}

/** [-1, 1]: faction relations and personal standing. */
export function clampSigned(value: number): number {
  if (Number.isNaN(value)) return 0;
  return clamp(value, -1, 1);
}

/** Round to a fixed number of decimals for display and stable comparisons. */
export function round(value: number, decimals = 3): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
