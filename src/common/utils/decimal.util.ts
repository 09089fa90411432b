import Decimal from 'decimal.js';

// Configure Decimal.js globally for financial precision
Decimal.set({
  precision: 20,           // 20 significant digits
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

/**
 * Converts any number-like value to Decimal for financial calculations.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/** Absent market values count as zero in every valuation formula. */
export function orZero(value: number | undefined): Decimal {
  return value === undefined ? new Decimal(0) : new Decimal(value);
}

/**
 * Converts Decimal back to JavaScript number for JSON serialization.
 * Rounds to 8 decimal places.
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

/** Percentages are displayed with 2 decimal places. */
export function toPercent(value: Decimal): number {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
}

export function sum(values: Decimal[]): Decimal {
  return values.reduce((total, val) => total.plus(val), new Decimal(0));
}

/**
 * Division that yields 0 instead of Infinity/NaN when the denominator is zero.
 */
export function divideOrZero(a: Decimal, b: Decimal): Decimal {
  if (b.isZero()) {
    return new Decimal(0);
  }
  return a.dividedBy(b);
}

/** a / b × 100, or 0 for a zero denominator. */
export function percentOf(a: Decimal, b: Decimal): Decimal {
  return divideOrZero(a, b).times(100);
}
