/**
 * Percentage normalisation
 */

const NUMERIC = /^-?\d+(\.\d*)?$/;
const WHOLE_TOLERANCE = 1e-7;

/**
 * Normalise a 0-100 percentage read from the API or a cache file.
 *
 * - null for missing, non-numeric or out-of-range input
 * - a whole number when within 1e-7 of one (68.00000003 → 68)
 * - otherwise rounded to two decimals (31.456 → 31.46)
 */
export function normalizePercent(value: unknown): number | null {
  let n: number;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'string' && NUMERIC.test(value.trim())) {
    n = Number(value.trim());
  } else {
    return null;
  }

  if (!Number.isFinite(n) || n < 0 || n > 100) return null;

  const whole = Math.round(n);
  if (Math.abs(n - whole) < WHOLE_TOLERANCE) return whole;
  return Number(n.toFixed(2));
}
