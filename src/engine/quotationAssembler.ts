import type { Decimal } from "decimal.js";
import { validateAutoportancia } from "./autoportancia.js";
import { assertPositiveGeometry, computeQuantities, deriveGeometry } from "./bomQuantities.js";
import { panelEntry, priceLine, type PricedLine } from "./lineItemPricer.js";
import { verifyQuotation, type VerifiableQuotation } from "./quotationVerifier.js";
import type { CatalogStore } from "../catalog/catalogStore.js";
import {
  DEFAULT_MAX_DISCOUNT_PERCENT,
  DEFAULT_SAFETY_MARGIN,
  MESSAGES,
  QUANTITY_GROUPS,
} from "../config/constants.js";
import { QUANTITY_KEYS, type BOMSystemRule, type Product } from "../types/catalog.js";
import {
  LINE_GROUPS,
  type LineGroup,
  type ProductSummary,
  type QuotationRequest,
  type QuotationResult,
  type QuoteWarning,
} from "../types/quotation.js";
import { quotationChecksum } from "../utils/checksum.js";
import {
  AccessoryMappingError,
  InvalidQuoteRequestError,
  ProductNotFoundError,
} from "../utils/errors.js";
import { Dec, formatMoney, formatUnitPrice, roundCurrency, sumMoney, toDecimal } from "../utils/money.js";

export interface AssembleOptions {
  safetyMargin?: number;
  maxDiscountPercent?: number;
}

export function summarizeProduct(product: Product): ProductSummary {
  return {
    family: product.family,
    thicknessMm: product.thicknessMm,
    name: product.name,
    pricePerM2: product.pricePerM2 === null ? null : formatUnitPrice(product.pricePerM2),
    usableWidthM: product.usableWidthM,
    spanLimitM: product.spanLimitM,
    thermalCoefficient: product.thermalCoefficient,
  };
}

function checkDiscount(discountPercent: number, maxDiscountPercent: number): void {
  if (!Number.isFinite(discountPercent) || discountPercent < 0 || discountPercent > maxDiscountPercent) {
    throw new InvalidQuoteRequestError(
      "discountPercent",
      `Discount must be between 0 and ${maxDiscountPercent}%, got ${discountPercent}`,
      discountPercent,
    );
  }
}

function resolveSystem(store: CatalogStore, systemId: string, product: Product): BOMSystemRule {
  const rule = store.getBOMRule(systemId);
  if (!rule) {
    const available = store.listBOMRules().map((r) => r.id).join(", ");
    throw new InvalidQuoteRequestError(
      "constructionSystem",
      `Construction system '${systemId}' not found. Available: ${available}`,
      systemId,
    );
  }
  const family = product.family.toUpperCase();
  if (!rule.families.some((f) => f.toUpperCase() === family)) {
    throw new InvalidQuoteRequestError(
      "constructionSystem",
      `Construction system '${systemId}' does not take ${product.family} panels (supports ${rule.families.join(", ")})`,
      systemId,
    );
  }
  return rule;
}

function priceAccessories(
  store: CatalogStore,
  rule: BOMSystemRule,
  product: Product,
  request: QuotationRequest,
  totalAreaM2: Decimal,
): PricedLine[] {
  const quantities = computeQuantities(rule, product, request.lengthM, request.widthM, request.spanM);
  const lines: PricedLine[] = [];

  for (const key of QUANTITY_KEYS) {
    const item = rule.items[key];
    const quantity = quantities[key];
    if (!item?.accessoryCategory || quantity === undefined) continue;

    const entry = store.findCompatibleAccessory(item.accessoryCategory, product.family, product.thicknessMm, item.sku);
    if (!entry) throw new AccessoryMappingError(item.accessoryCategory, product.family, product.thicknessMm);

    const priced = priceLine(entry, quantity, { category: key, group: QUANTITY_GROUPS[key], totalAreaM2 });
    if (priced) lines.push(priced);
  }
  return lines;
}

/** The larger of the requested rate and the family's bulk rate, when the area qualifies. */
function effectiveDiscount(product: Product, area: Decimal, requestedPercent: number): { percent: number; bulk: boolean } {
  const bulk = product.bulkDiscount;
  if (bulk && area.gte(toDecimal(bulk.thresholdM2)) && bulk.percent > requestedPercent) {
    return { percent: bulk.percent, bulk: true };
  }
  return { percent: requestedPercent, bulk: false };
}

function lengthWarning(product: Product, lengthM: number): QuoteWarning | null {
  if (product.lengthMinM !== null && lengthM < product.lengthMinM) {
    return {
      code: "length-out-of-range",
      message: `Length ${lengthM}m is below the ${product.lengthMinM}m production minimum; panels will be cut on site.`,
    };
  }
  if (product.lengthMaxM !== null && lengthM > product.lengthMaxM) {
    return {
      code: "length-out-of-range",
      message: `Length ${lengthM}m exceeds the ${product.lengthMaxM}m production maximum; panels need an overlap splice.`,
    };
  }
  return null;
}

/**
 * Single-pass quotation: product → span check → panel line → BOM lines → totals.
 *
 * Structural and pricing problems do not abort: they come back as warnings on the
 * result. Prices are tax-inclusive, so the grand total is the discounted subtotal
 * and nothing more.
 */
export function assembleQuotation(
  store: CatalogStore,
  request: QuotationRequest,
  options: AssembleOptions = {},
): QuotationResult {
  const safetyMargin = options.safetyMargin ?? DEFAULT_SAFETY_MARGIN;
  const maxDiscountPercent = options.maxDiscountPercent ?? DEFAULT_MAX_DISCOUNT_PERCENT;
  const { productFamily, thicknessMm, lengthM, widthM, spanM } = request;

  assertPositiveGeometry("lengthM", lengthM);
  assertPositiveGeometry("widthM", widthM);
  assertPositiveGeometry("spanM", spanM);
  checkDiscount(request.discountPercent, maxDiscountPercent);

  const product = store.getProduct(productFamily, thicknessMm);
  if (!product) {
    const available = store.getFamilyProducts(productFamily).map((p) => p.thicknessMm);
    throw new ProductNotFoundError(productFamily, thicknessMm, available);
  }

  const validation = validateAutoportancia(
    { family: product.family, thicknessMm: product.thicknessMm },
    spanM,
    store.getFamilyProducts(product.family),
    safetyMargin,
  );
  const geometry = deriveGeometry(product, lengthM, widthM, spanM);

  const layout = `${geometry.panelCount} panels of ${product.usableWidthM}m usable width × ${lengthM}m`;
  const lines: PricedLine[] = [];
  const panelLine = priceLine(panelEntry(product), geometry.area.toNumber(), {
    category: "panels",
    group: "panels",
    note: layout,
    totalAreaM2: geometry.area,
  });
  if (panelLine) lines.push(panelLine);

  let rule: BOMSystemRule | null = null;
  if (request.includeAccessories) {
    rule = resolveSystem(store, request.constructionSystem, product);
    lines.push(...priceAccessories(store, rule, product, request, geometry.area));
  }

  // Stable: keeps quantity-key order inside each group.
  lines.sort((a, b) => LINE_GROUPS.indexOf(a.item.group) - LINE_GROUPS.indexOf(b.item.group));

  const groupTotal = (group: LineGroup) =>
    formatMoney(sumMoney(lines.filter((l) => l.item.group === group).map((l) => l.total)));
  const groupSubtotals: Record<LineGroup, string> = {
    panels: groupTotal("panels"),
    perfileria: groupTotal("perfileria"),
    fixings: groupTotal("fixings"),
    sealants: groupTotal("sealants"),
  };

  const subtotal: Decimal = sumMoney(lines.map((l) => l.total));
  const discount = effectiveDiscount(product, geometry.area, request.discountPercent);
  const discountFactor = new Dec(1).minus(toDecimal(discount.percent).div(100));
  const grandTotal = roundCurrency(subtotal.times(discountFactor));
  const discountApplied = subtotal.minus(grandTotal);

  const warnings: QuoteWarning[] = [];
  if (!validation.isValid) {
    warnings.push({
      code: "span-exceeded",
      message: validation.recommendation ?? `Span ${spanM}m exceeds the safe span for ${product.name}`,
    });
  }
  const pendingPriceWarnings = [...new Set(lines.filter((l) => l.item.pendingPrice).map((l) => l.item.sku))];
  for (const sku of pendingPriceWarnings) {
    warnings.push({ code: "pending-price", sku, message: `No price on file for ${sku}; it is excluded from the totals.` });
  }
  const outOfRange = lengthWarning(product, lengthM);
  if (outOfRange) warnings.push(outOfRange);

  const notes: string[] = [MESSAGES.TAX_INCLUDED, `Layout: ${layout}`];
  if (discount.bulk && product.bulkDiscount) {
    notes.push(`Bulk discount of ${discount.percent}% for orders of ${product.bulkDiscount.thresholdM2} m² or more`);
  }
  if (discount.percent > 0) notes.push(`Discount applied: ${discount.percent}%`);

  const lineItems = Object.freeze(lines.map((l) => l.item));
  const grandTotalText = formatMoney(grandTotal);

  const draft: VerifiableQuotation = {
    product: Object.freeze(summarizeProduct(product)),
    geometry: Object.freeze({ lengthM, widthM, spanM }),
    constructionSystem: rule ? rule.id : null,
    area: geometry.area.toNumber(),
    panelCount: geometry.panelCount,
    validation,
    lineItems,
    groupSubtotals: Object.freeze(groupSubtotals),
    subtotal: formatMoney(subtotal),
    requestedDiscountPercent: request.discountPercent,
    discountPercent: discount.percent,
    bulkDiscountApplied: discount.bulk,
    discountApplied: formatMoney(discountApplied),
    grandTotal: grandTotalText,
    pendingPriceWarnings: Object.freeze(pendingPriceWarnings),
    warnings: Object.freeze(warnings),
    notes: Object.freeze(notes),
    verificationChecksum: quotationChecksum(lineItems, grandTotalText),
  };

  const verification = verifyQuotation(draft);
  if (!verification.valid) {
    console.error(`[QuotationAssembler] Verification failed: ${verification.errors.join("; ")}`);
  }
  const result: QuotationResult = { ...draft, calculationVerified: verification.valid };
  return Object.freeze(result);
}
