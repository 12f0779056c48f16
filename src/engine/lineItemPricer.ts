import type { Decimal } from "decimal.js";
import type { CatalogEntry, Product } from "../types/catalog.js";
import type { LineGroup, QuotationLineItem } from "../types/quotation.js";
import { ZERO, formatMoney, formatUnitPrice, roundCurrency, toDecimal } from "../utils/money.js";

export interface LineContext {
  category: string;
  group: LineGroup;
  note?: string;
  /**
   * Covered area of the quotation. `area` entries are priced on it whatever quantity
   * their formula produced; without it the quantity is read as m².
   */
  totalAreaM2?: Decimal;
}

export interface PricedLine {
  item: QuotationLineItem;
  /** The rounded line total, as summed into the quotation totals. */
  total: Decimal;
}

/**
 * Line total before rounding, by unit of measure:
 *
 * | kind            | total                                 |
 * |-----------------|---------------------------------------|
 * | `piece`         | quantity × unitPrice                  |
 * | `linear-length` | quantity × nominalPieceLength × price |
 * | `area`          | totalAreaM2 × unitPrice               |
 *
 * The nominal piece length only enters the price of `linear-length` entries. A
 * piece-priced profile that happens to be 3 m long still costs quantity × price.
 */
export function computeLineTotal(
  entry: CatalogEntry,
  unitPrice: Decimal,
  quantity: Decimal,
  totalAreaM2: Decimal = quantity,
): Decimal {
  switch (entry.unitMeasureKind) {
    case "piece":
      return quantity.times(unitPrice);
    case "linear-length": {
      if (entry.nominalPieceLengthM === null) {
        throw new RangeError(`Entry ${entry.sku} is priced per linear metre but has no piece length`);
      }
      return quantity.times(toDecimal(entry.nominalPieceLengthM)).times(unitPrice);
    }
    case "area":
      return totalAreaM2.times(unitPrice);
  }
}

/**
 * Prices one BOM quantity against its catalog entry. Returns `null` for a zero
 * quantity. An entry without a price yields a `pendingPrice` line contributing 0.
 */
export function priceLine(entry: CatalogEntry, quantity: number, context: LineContext): PricedLine | null {
  if (!Number.isFinite(quantity) || quantity < 0) {
    throw new RangeError(`Quantity for ${entry.sku} must be a non-negative number, got ${quantity}`);
  }
  if (quantity === 0) return null;

  const base = {
    sku: entry.sku,
    name: entry.name,
    category: context.category,
    group: context.group,
    unitMeasureKind: entry.unitMeasureKind,
    quantity,
    note: context.note ?? null,
  };

  if (entry.unitPrice === null) {
    return {
      item: Object.freeze({ ...base, unitPrice: null, lineTotal: formatMoney(ZERO), pendingPrice: true }),
      total: ZERO,
    };
  }

  const total = roundCurrency(computeLineTotal(entry, entry.unitPrice, toDecimal(quantity), context.totalAreaM2));
  return {
    item: Object.freeze({
      ...base,
      unitPrice: formatUnitPrice(entry.unitPrice),
      lineTotal: formatMoney(total),
      pendingPrice: false,
    }),
    total,
  };
}

export function priceLineItem(entry: CatalogEntry, quantity: number, context: LineContext): QuotationLineItem | null {
  return priceLine(entry, quantity, context)?.item ?? null;
}

/** Catalog entry for the panels themselves: priced per m² of covered area. */
export function panelEntry(product: Product): CatalogEntry {
  return {
    sku: `${product.family}-${product.thicknessMm}`,
    name: product.name,
    category: "panels",
    unitMeasureKind: "area",
    nominalPieceLengthM: null,
    unitPrice: product.pricePerM2,
    compatibility: { families: [product.family], thicknessMm: { min: product.thicknessMm, max: product.thicknessMm } },
  };
}
