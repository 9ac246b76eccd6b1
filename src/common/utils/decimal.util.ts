import Decimal from 'decimal.js';

// Global precision for ledger arithmetic
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // no exponential notation for large numbers
  toExpNeg: -9e15,        // no exponential notation for small numbers
});

export const ZERO = new Decimal(0);

/**
 * Converts any number-like value to Decimal for ledger calculations.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Converts Decimal back to JavaScript number for JSON serialization.
 * Rounds to 8 decimal places.
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

/**
 * Rounds a cash or share amount to cents, half-up.
 * Every amount written to the ledger passes through here.
 */
export function roundAmount(value: Decimal): Decimal {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

/** Unit cost and return rates are reported with four decimals */
export function roundRate(value: Decimal): Decimal {
  return value.toDecimalPlaces(4, Decimal.ROUND_HALF_UP);
}

/**
 * Safe addition of Decimal values.
 */
export function sum(values: Iterable<Decimal>): Decimal {
  let total = ZERO;
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}

