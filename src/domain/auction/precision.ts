/**
 * Monetary Precision Domain Logic
 *
 * Converts decimal currency amounts to integer minor units (cents) and back.
 * All bid arithmetic runs on the integer form.
 */

import Decimal from 'decimal.js';

const MINOR_UNITS_PER_MAJOR = 100;

// Isolated config so the global Decimal settings of a host app are untouched
const MoneyDecimal = Decimal.clone({
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP,
});

/**
 * Convert a decimal amount to minor units.
 *
 * Rounds to the nearest integer with ties away from zero (0.005 -> 1, -0.005 -> -1).
 * The scaling is done on the shortest decimal form of the number, so 1.005 -> 101.
 *
 * @throws RangeError when the amount is NaN or infinite
 */
export function toMinorUnits(amount: number): number {
  if (!Number.isFinite(amount)) {
    throw new RangeError(`Amount must be a finite number, got ${amount}`);
  }

  const cents = new MoneyDecimal(amount)
    .times(MINOR_UNITS_PER_MAJOR)
    .toDecimalPlaces(0, Decimal.ROUND_HALF_UP)
    .toNumber();

  return Object.is(cents, -0) ? 0 : cents;
}

/**
 * Convert minor units back to a decimal amount. No rounding is applied.
 */
export function toDecimal(minorUnits: number): number {
  return minorUnits / MINOR_UNITS_PER_MAJOR;
}

/**
 * Two-decimal display string for a minor-unit amount, e.g. 12345 -> "123.45".
 */
export function formatAmount(minorUnits: number): string {
  return new MoneyDecimal(minorUnits).dividedBy(MINOR_UNITS_PER_MAJOR).toFixed(2);
}
