import { DEFAULT_SAFETY_MARGIN, MESSAGES } from "../config/constants.js";
import type { Product } from "../types/catalog.js";
import type { AutoportanciaValidationResult, ProductRef } from "../types/quotation.js";
import { Dec, toDecimal } from "../utils/money.js";

/**
 * Checks a requested span against a panel's self-supporting capacity, reduced by a
 * safety margin: `safeMax = spanLimit × (1 − safetyMargin)`, boundary inclusive.
 *
 * `familyProducts` are the catalog's thicknesses for the target's family; they are
 * searched for thicker alternatives when the span does not fit. A target missing from
 * that list yields an invalid result flagged `dataAvailable: false` instead of an error,
 * so the caller decides whether to block the quotation.
 */
export function validateAutoportancia(
  target: ProductRef,
  requestedSpanM: number,
  familyProducts: readonly Product[],
  safetyMargin: number = DEFAULT_SAFETY_MARGIN,
): AutoportanciaValidationResult {
  if (!Number.isFinite(safetyMargin) || safetyMargin < 0 || safetyMargin >= 1) {
    throw new RangeError(`safetyMargin must be in [0, 1), got ${safetyMargin}`);
  }

  const span = toDecimal(requestedSpanM);
  const factor = new Dec(1).minus(toDecimal(safetyMargin));
  const safeMaxOf = (p: Product) => toDecimal(p.spanLimitM).times(factor);

  const family = target.family.toUpperCase();
  const siblings = familyProducts
    .filter((p) => p.family.toUpperCase() === family)
    .sort((a, b) => a.thicknessMm - b.thicknessMm);
  const product = siblings.find((p) => p.thicknessMm === target.thicknessMm);

  if (!product) {
    return Object.freeze({
      family: target.family,
      thicknessMm: target.thicknessMm,
      requestedSpanM,
      absoluteMaxSpanM: null,
      safeMaxSpanM: null,
      safetyMargin,
      isValid: false,
      excessPct: 0,
      recommendation: MESSAGES.NO_SPAN_DATA(target.family, target.thicknessMm),
      alternativeThicknessesMm: Object.freeze([]),
      dataAvailable: false,
    });
  }

  const safeMax = safeMaxOf(product);
  const isValid = span.lte(safeMax);

  let excessPct = 0;
  let recommendation: string | null = null;
  let alternatives: number[] = [];

  if (!isValid) {
    excessPct = span.minus(safeMax).div(safeMax).times(100).toDecimalPlaces(2, Dec.ROUND_HALF_UP).toNumber();
    const fitting = siblings.filter((p) => safeMaxOf(p).gte(span));
    alternatives = fitting.map((p) => p.thicknessMm);

    if (fitting.length > 0) {
      const best = fitting[0];
      recommendation = MESSAGES.USE_THICKER_PANEL(
        product.thicknessMm,
        safeMax.toString(),
        requestedSpanM,
        best.thicknessMm,
        safeMaxOf(best).toString(),
      );
    } else {
      recommendation = MESSAGES.ADD_INTERMEDIATE_SUPPORT(
        product.thicknessMm,
        safeMax.toString(),
        requestedSpanM,
        span.div(2).toString(),
      );
    }
  }

  return Object.freeze({
    family: product.family,
    thicknessMm: product.thicknessMm,
    requestedSpanM,
    absoluteMaxSpanM: product.spanLimitM,
    safeMaxSpanM: safeMax.toNumber(),
    safetyMargin,
    isValid,
    excessPct,
    recommendation,
    alternativeThicknessesMm: Object.freeze(alternatives),
    dataAvailable: true,
  });
}
