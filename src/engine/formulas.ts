import type { Decimal } from "decimal.js";
import {
  DEFAULT_NUTS_PER_POINT,
  DEFAULT_PIECE_LENGTH_M,
  POINTS_PER_THREADED_ROD,
  PROFILE_FASTENER_SPACING_M,
  RIVETS_PER_PROFILE,
  ROOF_EDGE_FIXATION_SPACING_M,
  SEALANT_COVERAGE_PER_TUBE_M,
} from "../config/constants.js";
import type { BOMItemRule, FormulaKind, Product, QuantityKey } from "../types/catalog.js";
import { Dec, toDecimal } from "../utils/money.js";

/** Values derived once per quotation and shared by every formula. */
export interface FormulaEnv {
  area: Decimal;
  panelCount: number;
  supportCount: number;
  lengthM: Decimal;
  widthM: Decimal;
  spanM: Decimal;
  product: Product;
}

export interface FormulaContext {
  env: FormulaEnv;
  item: BOMItemRule;
  /** Already-resolved quantity of another key of the same system. */
  quantity(key: QuantityKey): Decimal;
  /** Piece length configured on another key of the same system. */
  pieceLength(key: QuantityKey): Decimal;
}

export interface FormulaDefinition {
  /** Keys whose quantities this formula reads. */
  requires: readonly QuantityKey[];
  evaluate(ctx: FormulaContext): Decimal;
}

export function itemPieceLength(item: BOMItemRule | undefined): Decimal {
  return toDecimal(item?.pieceLengthM ?? DEFAULT_PIECE_LENGTH_M);
}

const panelRun = (env: FormulaEnv) => new Dec(env.panelCount).times(toDecimal(env.product.usableWidthM));

const panelSupportPoints = (env: FormulaEnv) => new Dec(env.panelCount * env.supportCount * 2);

// Every count is rounded with ceil: running short of material on site is the failure to avoid.
export const FORMULAS: Record<FormulaKind, FormulaDefinition> = {
  "panel-count": {
    requires: [],
    evaluate: ({ env }) => new Dec(env.panelCount),
  },
  "support-count": {
    requires: [],
    evaluate: ({ env }) => new Dec(env.supportCount),
  },
  "fixation-points-roof": {
    requires: [],
    evaluate: ({ env }) =>
      panelSupportPoints(env).plus(env.lengthM.times(2).div(ROOF_EDGE_FIXATION_SPACING_M)).ceil(),
  },
  "fixation-points-wall": {
    requires: [],
    evaluate: ({ env }) => panelSupportPoints(env),
  },
  "front-drip-edge": {
    requires: [],
    evaluate: ({ env, item }) => panelRun(env).div(itemPieceLength(item)).ceil(),
  },
  "lateral-drip-edge": {
    requires: [],
    evaluate: ({ env, item }) => env.lengthM.times(2).div(itemPieceLength(item)).ceil(),
  },
  "joint-covers": {
    requires: [],
    evaluate: ({ env }) => new Dec(Math.max(0, env.panelCount - 1)),
  },
  "rivets-per-profile": {
    requires: ["drip-edge-front", "drip-edge-lateral"],
    evaluate: ({ quantity }) =>
      quantity("drip-edge-front").plus(quantity("drip-edge-lateral")).times(RIVETS_PER_PROFILE).ceil(),
  },
  "profile-fasteners": {
    requires: ["drip-edge-front", "drip-edge-lateral"],
    evaluate: ({ item, quantity, pieceLength }) => {
      const metres = quantity("drip-edge-front")
        .times(pieceLength("drip-edge-front"))
        .plus(quantity("drip-edge-lateral").times(pieceLength("drip-edge-lateral")));
      return metres.div(toDecimal(item.spacingM ?? PROFILE_FASTENER_SPACING_M)).ceil();
    },
  },
  "threaded-rods": {
    requires: ["fixation-points"],
    evaluate: ({ quantity }) => quantity("fixation-points").div(POINTS_PER_THREADED_ROD).ceil(),
  },
  "nuts-per-point": {
    requires: ["fixation-points"],
    evaluate: ({ item, quantity }) => quantity("fixation-points").times(item.unitsPerPoint ?? DEFAULT_NUTS_PER_POINT),
  },
  "anchors-per-point": {
    requires: ["fixation-points"],
    evaluate: ({ item, quantity }) => quantity("fixation-points").times(item.unitsPerPoint ?? 1),
  },
  "sealant-tubes": {
    requires: [],
    evaluate: ({ env, item }) => {
      const perimeter = panelRun(env).times(2).plus(env.lengthM.times(2));
      return perimeter.div(toDecimal(item.coveragePerUnitM ?? SEALANT_COVERAGE_PER_TUBE_M)).ceil();
    },
  },
  // Measured material: stays decimal.
  "covered-area": {
    requires: [],
    evaluate: ({ env }) => env.area,
  },
};
