import type { Decimal } from "decimal.js";
import { FORMULAS, itemPieceLength, type FormulaEnv } from "./formulas.js";
import type { BOMSystemRule, Product, QuantityKey, QuantityMap } from "../types/catalog.js";
import { QUANTITY_KEYS } from "../types/catalog.js";
import { InvalidGeometryError, MissingFormulaError } from "../utils/errors.js";
import { toDecimal } from "../utils/money.js";

export interface DerivedGeometry {
  area: Decimal;
  panelCount: number;
  supportCount: number;
}

export function assertPositiveGeometry(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidGeometryError(field, value);
  }
}

/**
 * `area = length × width`, `panelCount = ⌈width / usableWidth⌉`,
 * `supportCount = ⌈length / span + 1⌉`.
 */
export function deriveGeometry(product: Product, lengthM: number, widthM: number, spanM: number): DerivedGeometry {
  assertPositiveGeometry("lengthM", lengthM);
  assertPositiveGeometry("widthM", widthM);
  assertPositiveGeometry("spanM", spanM);

  const length = toDecimal(lengthM);
  const width = toDecimal(widthM);
  return {
    area: length.times(width),
    panelCount: width.div(toDecimal(product.usableWidthM)).ceil().toNumber(),
    supportCount: length.div(toDecimal(spanM)).plus(1).ceil().toNumber(),
  };
}

/**
 * Evaluates every quantity a construction system declares. Formulas read the shared
 * geometry and, where they need it, other quantities of the same system; a formula
 * reading a key the system does not declare is a configuration error.
 */
export function computeQuantities(
  systemRule: BOMSystemRule,
  product: Product,
  lengthM: number,
  widthM: number,
  spanM: number,
): QuantityMap {
  const geometry = deriveGeometry(product, lengthM, widthM, spanM);
  const env: FormulaEnv = {
    ...geometry,
    lengthM: toDecimal(lengthM),
    widthM: toDecimal(widthM),
    spanM: toDecimal(spanM),
    product,
  };

  const resolved = new Map<QuantityKey, Decimal>();
  const visiting = new Set<QuantityKey>();

  const resolve = (key: QuantityKey, requiredBy: QuantityKey | null): Decimal => {
    const cached = resolved.get(key);
    if (cached) return cached;

    const item = systemRule.items[key];
    if (!item) throw new MissingFormulaError(systemRule.id, key, requiredBy);
    if (visiting.has(key)) {
      throw new MissingFormulaError(systemRule.id, key, requiredBy, "is part of a circular reference");
    }

    const definition = FORMULAS[item.formula];
    if (!definition) {
      throw new MissingFormulaError(systemRule.id, key, requiredBy, `uses unknown formula '${item.formula}'`);
    }

    visiting.add(key);
    for (const dependency of definition.requires) resolve(dependency, key);
    const value = definition.evaluate({
      env,
      item,
      quantity: (dep) => resolve(dep, key),
      pieceLength: (dep) => itemPieceLength(systemRule.items[dep]),
    });
    visiting.delete(key);

    resolved.set(key, value);
    return value;
  };

  const quantities: QuantityMap = {};
  for (const key of QUANTITY_KEYS) {
    if (systemRule.items[key]) quantities[key] = resolve(key, null).toNumber();
  }
  return quantities;
}
