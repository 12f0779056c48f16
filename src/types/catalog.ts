import type { Decimal } from "decimal.js";

export type UnitMeasureKind = "piece" | "linear-length" | "area";

export type InstallationType = "roof" | "wall";

export interface Product {
  family: string;
  thicknessMm: number;
  name: string;
  /** Tax-inclusive price per m². `null` when the catalog has no price yet. */
  pricePerM2: Decimal | null;
  usableWidthM: number;
  /** Manufacturer's absolute self-supporting span. */
  spanLimitM: number;
  thermalCoefficient: number | null;
  lengthMinM: number | null;
  lengthMaxM: number | null;
  bulkDiscount: BulkDiscountRule | null;
}

/** Automatic discount for large orders of one family. */
export interface BulkDiscountRule {
  thresholdM2: number;
  percent: number;
}

export interface ThicknessRange {
  min?: number;
  max?: number;
}

export interface AccessoryCompatibility {
  families: readonly string[];
  thicknessMm?: ThicknessRange;
}

export interface CatalogEntry {
  sku: string;
  name: string;
  category: string;
  unitMeasureKind: UnitMeasureKind;
  /**
   * Physical length of one piece. Only priced in for `linear-length` entries;
   * for everything else it is informational.
   */
  nominalPieceLengthM: number | null;
  /** Tax-inclusive. `null` when the price is still pending. */
  unitPrice: Decimal | null;
  compatibility: AccessoryCompatibility;
}

export interface BOMItemRule {
  formula: FormulaKind;
  accessoryCategory?: string;
  sku?: string;
  pieceLengthM?: number;
  unitsPerPoint?: number;
  coveragePerUnitM?: number;
  spacingM?: number;
}

export interface BOMSystemRule {
  id: string;
  name: string;
  families: readonly string[];
  installation: InstallationType;
  items: Readonly<Partial<Record<QuantityKey, BOMItemRule>>>;
}

export const QUANTITY_KEYS = [
  "panels",
  "supports",
  "fixation-points",
  "drip-edge-front",
  "drip-edge-lateral",
  "joint-covers",
  "rivets",
  "perfileria-fasteners",
  "threaded-rods",
  "nuts",
  "anchors",
  "sealant-tubes",
  "vapor-barrier",
] as const;

export type QuantityKey = (typeof QUANTITY_KEYS)[number];

export const FORMULA_KINDS = [
  "panel-count",
  "support-count",
  "fixation-points-roof",
  "fixation-points-wall",
  "front-drip-edge",
  "lateral-drip-edge",
  "joint-covers",
  "rivets-per-profile",
  "profile-fasteners",
  "threaded-rods",
  "nuts-per-point",
  "anchors-per-point",
  "sealant-tubes",
  "covered-area",
] as const;

export type FormulaKind = (typeof FORMULA_KINDS)[number];

export type QuantityMap = Partial<Record<QuantityKey, number>>;
