import { Decimal } from "decimal.js";

/**
 * Decimal constructor used across the engine. Precision is far beyond what any
 * quotation needs, so multiplications never lose digits before the final rounding.
 */
export const Dec = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_UP });

export const ZERO = new Dec(0);

const CURRENCY_PLACES = 2;

/**
 * Builds a decimal from catalog or request input. Numbers go through their
 * shortest string form, so `46.07` stays exactly 46.07.
 */
export function toDecimal(value: Decimal.Value): Decimal {
  const d = new Dec(value);
  if (!d.isFinite()) {
    throw new RangeError(`Cannot convert ${String(value)} to a finite decimal`);
  }
  return d;
}

/** Quantizes a money value to 2 places, half-up. */
export function roundCurrency(value: Decimal): Decimal {
  return value.toDecimalPlaces(CURRENCY_PLACES, Decimal.ROUND_HALF_UP);
}

/** Presentation form of a money value: always 2 places, e.g. "2303.50". */
export function formatMoney(value: Decimal): string {
  return roundCurrency(value).toFixed(CURRENCY_PLACES);
}

/** Catalog unit prices keep their own precision but never show fewer than 2 places. */
export function formatUnitPrice(value: Decimal): string {
  return value.decimalPlaces() > CURRENCY_PLACES ? value.toString() : value.toFixed(CURRENCY_PLACES);
}

export function sumMoney(values: readonly Decimal[]): Decimal {
  return values.reduce<Decimal>((acc, v) => acc.plus(v), ZERO);
}
