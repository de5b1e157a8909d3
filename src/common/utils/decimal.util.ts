import Decimal from 'decimal.js';

// Notional amounts and strikes are unsigned integers that may exceed 2^64,
// so keep enough significant digits for a 128-bit value.
Decimal.set({
  precision: 40,
  rounding: Decimal.ROUND_DOWN,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,
});

export const UNSIGNED_INTEGER = /^\d+$/;

/**
 * Converts any number-like value to Decimal.
 * Handles JavaScript numbers, strings, bigints and existing Decimal instances.
 */
export function toDecimal(value: number | string | bigint | Decimal): Decimal {
  return new Decimal(typeof value === 'bigint' ? value.toString() : value);
}

/** True for plain digit strings such as "0" or "1000" */
export function isUnsignedIntegerString(value: string): boolean {
  return UNSIGNED_INTEGER.test(value);
}

/** Integer rendering without exponent or fraction, used on the wire */
export function toAmountString(value: Decimal): string {
  return value.toFixed(0);
}
