import type { UnitMeasureKind } from "./catalog.js";

export const LINE_GROUPS = ["panels", "perfileria", "fixings", "sealants"] as const;

export type LineGroup = (typeof LINE_GROUPS)[number];

export interface ProductRef {
  family: string;
  thicknessMm: number;
}

export interface AutoportanciaValidationResult {
  family: string;
  thicknessMm: number;
  requestedSpanM: number;
  absoluteMaxSpanM: number | null;
  safeMaxSpanM: number | null;
  safetyMargin: number;
  isValid: boolean;
  /** Percentage over the safe span, rounded to 2 places. 0 when valid. */
  excessPct: number;
  recommendation: string | null;
  alternativeThicknessesMm: readonly number[];
  dataAvailable: boolean;
}

export interface QuotationLineItem {
  sku: string;
  name: string;
  category: string;
  group: LineGroup;
  unitMeasureKind: UnitMeasureKind;
  quantity: number;
  /** Catalog price as a decimal string, at least 2 places ("46.07", "0.045"). */
  unitPrice: string | null;
  /** Rounded half-up to 2 places, e.g. "2303.50". */
  lineTotal: string;
  pendingPrice: boolean;
  note: string | null;
}

export interface QuotationRequest {
  productFamily: string;
  thicknessMm: number;
  lengthM: number;
  widthM: number;
  spanM: number;
  constructionSystem: string;
  discountPercent: number;
  includeAccessories: boolean;
}

export type QuoteWarningCode = "span-exceeded" | "pending-price" | "length-out-of-range";

export interface QuoteWarning {
  code: QuoteWarningCode;
  message: string;
  sku?: string;
}

export interface ProductSummary {
  family: string;
  thicknessMm: number;
  name: string;
  pricePerM2: string | null;
  usableWidthM: number;
  spanLimitM: number;
  thermalCoefficient: number | null;
}

export interface QuotationResult {
  product: ProductSummary;
  geometry: { lengthM: number; widthM: number; spanM: number };
  constructionSystem: string | null;
  area: number;
  panelCount: number;
  validation: AutoportanciaValidationResult;
  lineItems: readonly QuotationLineItem[];
  groupSubtotals: Readonly<Record<LineGroup, string>>;
  subtotal: string;
  /** Discount asked for by the caller. */
  requestedDiscountPercent: number;
  /** Discount actually applied: the larger of the requested and the family's bulk rate. */
  discountPercent: number;
  bulkDiscountApplied: boolean;
  discountApplied: string;
  grandTotal: string;
  pendingPriceWarnings: readonly string[];
  warnings: readonly QuoteWarning[];
  notes: readonly string[];
  /** Outcome of {@link verifyQuotation} run on the result before it is returned. */
  calculationVerified: boolean;
  verificationChecksum: string;
}

export interface QuotationVerification {
  valid: boolean;
  errors: string[];
  checksPerformed: string[];
}
