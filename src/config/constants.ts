import type { QuantityKey } from "../types/catalog.js";
import type { LineGroup } from "../types/quotation.js";

export const DEFAULT_SAFETY_MARGIN = 0.15;

export const DEFAULT_MAX_DISCOUNT_PERCENT = 30;

// Formula defaults when a BOM item does not override them.
export const DEFAULT_PIECE_LENGTH_M = 3.0;
export const ROOF_EDGE_FIXATION_SPACING_M = 2.5;
export const RIVETS_PER_PROFILE = 20;
export const PROFILE_FASTENER_SPACING_M = 0.3;
export const POINTS_PER_THREADED_ROD = 4;
export const DEFAULT_NUTS_PER_POINT = 2;
export const SEALANT_COVERAGE_PER_TUBE_M = 8;

export const UNIVERSAL_FAMILY_TAG = "UNIVERSAL";

/** Where each BOM quantity lands on the quotation. */
export const QUANTITY_GROUPS: Record<QuantityKey, LineGroup> = {
  panels: "panels",
  supports: "fixings",
  "fixation-points": "fixings",
  "drip-edge-front": "perfileria",
  "drip-edge-lateral": "perfileria",
  "joint-covers": "perfileria",
  rivets: "fixings",
  "perfileria-fasteners": "fixings",
  "threaded-rods": "fixings",
  nuts: "fixings",
  anchors: "fixings",
  "sealant-tubes": "sealants",
  "vapor-barrier": "sealants",
};

export const MESSAGES = {
  TAX_INCLUDED: "Prices include VAT. Do not add tax on top of these totals.",
  NO_SPAN_DATA: (family: string, thicknessMm: number) =>
    `No span data available for ${family} ${thicknessMm}mm. Check with engineering before quoting.`,
  USE_THICKER_PANEL: (thicknessMm: number, safeMaxM: string, spanM: number, altMm: number, altSafeMaxM: string) =>
    `${thicknessMm}mm (safe span ${safeMaxM}m) does not cover a ${spanM}m span. Use ${altMm}mm (safe span ${altSafeMaxM}m) or add an intermediate support.`,
  ADD_INTERMEDIATE_SUPPORT: (thicknessMm: number, safeMaxM: string, spanM: number, targetSpanM: string) =>
    `${thicknessMm}mm (safe span ${safeMaxM}m) does not cover a ${spanM}m span and no thicker panel in the family does. Add an intermediate support to bring the span down to ${targetSpanM}m.`,
};
