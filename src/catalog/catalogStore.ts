import fs from "fs/promises";
import type { z, ZodTypeAny } from "zod";
import {
  accessoriesCatalogSchema,
  bomRulesCatalogSchema,
  productsCatalogSchema,
  type AccessoryInput,
  type BOMRulesCatalogInput,
  type ProductsCatalogInput,
} from "./catalogSchemas.js";
import type {
  BOMItemRule,
  BOMSystemRule,
  CatalogEntry,
  Product,
  QuantityKey,
} from "../types/catalog.js";
import { QUANTITY_KEYS } from "../types/catalog.js";
import { UNIVERSAL_FAMILY_TAG } from "../config/constants.js";
import { FORMULAS } from "../engine/formulas.js";
import { CatalogLoadError } from "../utils/errors.js";
import { toDecimal } from "../utils/money.js";

export type CatalogSource = string | Uint8Array;

export interface CatalogSources {
  products: CatalogSource;
  accessories: CatalogSource;
  bomRules: CatalogSource;
}

export interface CatalogPaths {
  products: string;
  accessories: string;
  bomRules: string;
}

function productKey(family: string, thicknessMm: number): string {
  return `${family.toUpperCase()}::${thicknessMm}`;
}

function parseSource<S extends ZodTypeAny>(name: string, raw: CatalogSource, schema: S): z.infer<S> {
  const text = typeof raw === "string" ? raw : Buffer.from(raw).toString("utf8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CatalogLoadError(name, `malformed JSON (${message})`);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    throw new CatalogLoadError(name, `${where}: ${issue.message}`, { path: where });
  }
  return parsed.data;
}

/**
 * True when an accessory's family tags cover `family`: exact tag, a tag that is the
 * family's prefix (`ISODEC` covers `ISODEC-EPS`), or the `UNIVERSAL` tag.
 */
export function familyMatches(tags: readonly string[], family: string): boolean {
  const target = family.toUpperCase();
  return tags.some((raw) => {
    const tag = raw.toUpperCase();
    if (tag === UNIVERSAL_FAMILY_TAG || tag === target) return true;
    return target.startsWith(`${tag}-`) || target.startsWith(`${tag}_`) || target.startsWith(`${tag} `);
  });
}

export function thicknessMatches(entry: CatalogEntry, thicknessMm: number): boolean {
  const range = entry.compatibility.thicknessMm;
  if (!range) return true;
  if (range.min !== undefined && thicknessMm < range.min) return false;
  if (range.max !== undefined && thicknessMm > range.max) return false;
  return true;
}

function buildProducts(input: ProductsCatalogInput): Product[] {
  const products: Product[] = [];
  for (const [family, data] of Object.entries(input)) {
    for (const [thickness, attrs] of Object.entries(data.thicknesses)) {
      products.push(
        Object.freeze({
          family,
          thicknessMm: Number(thickness),
          name: `${data.name} ${thickness}mm`,
          pricePerM2: attrs.price === null ? null : toDecimal(attrs.price),
          usableWidthM: attrs.usableWidth,
          spanLimitM: attrs.spanLimit,
          thermalCoefficient: attrs.thermalCoefficient,
          lengthMinM: data.lengthMinM ?? null,
          lengthMaxM: data.lengthMaxM ?? null,
          bulkDiscount: data.bulkDiscount ? Object.freeze({ ...data.bulkDiscount }) : null,
        }),
      );
    }
  }
  return products;
}

function buildAccessory(input: AccessoryInput): CatalogEntry {
  const range = input.compatibility.thicknessMm;
  return Object.freeze({
    sku: input.sku,
    name: input.name,
    category: input.category,
    unitMeasureKind: input.unitMeasureKind,
    nominalPieceLengthM: input.nominalPieceLength,
    unitPrice: input.unitPrice === null ? null : toDecimal(input.unitPrice),
    compatibility: Object.freeze({
      families: Object.freeze([...input.compatibility.families]),
      ...(range ? { thicknessMm: Object.freeze({ ...range }) } : {}),
    }),
  });
}

function buildRules(input: BOMRulesCatalogInput): BOMSystemRule[] {
  return Object.entries(input).map(([id, system]) => {
    const items: Partial<Record<QuantityKey, BOMItemRule>> = {};
    for (const key of QUANTITY_KEYS) {
      const item: BOMItemRule | undefined = system.items[key];
      if (item) items[key] = Object.freeze({ ...item });
    }
    return Object.freeze({
      id,
      name: system.name,
      families: Object.freeze([...system.families]),
      installation: system.installation,
      items: Object.freeze(items),
    });
  });
}

/**
 * Immutable view over the three catalogs. Build one with {@link CatalogStore.load};
 * nothing in it changes afterwards, so a single instance can serve any number of
 * concurrent quotations. Reloading means building a new store (see CatalogRegistry).
 */
export class CatalogStore {
  private readonly products = new Map<string, Product>();
  private readonly families = new Map<string, Product[]>();
  private readonly accessoriesBySku = new Map<string, CatalogEntry>();
  private readonly accessoriesByCategory = new Map<string, CatalogEntry[]>();
  private readonly rules = new Map<string, BOMSystemRule>();

  private constructor(products: Product[], accessories: CatalogEntry[], rules: BOMSystemRule[]) {
    for (const product of products) {
      this.products.set(productKey(product.family, product.thicknessMm), product);
      const familyKey = product.family.toUpperCase();
      const list = this.families.get(familyKey) ?? [];
      list.push(product);
      this.families.set(familyKey, list);
    }
    for (const list of this.families.values()) {
      list.sort((a, b) => a.thicknessMm - b.thicknessMm);
      Object.freeze(list);
    }

    for (const entry of accessories) {
      if (this.accessoriesBySku.has(entry.sku)) {
        throw new CatalogLoadError("accessories", `duplicate sku '${entry.sku}'`, { sku: entry.sku });
      }
      this.accessoriesBySku.set(entry.sku, entry);
      const list = this.accessoriesByCategory.get(entry.category) ?? [];
      list.push(entry);
      this.accessoriesByCategory.set(entry.category, list);
    }
    for (const list of this.accessoriesByCategory.values()) Object.freeze(list);

    for (const rule of rules) {
      this.checkRuleReferences(rule);
      this.rules.set(rule.id, rule);
    }
  }

  static load(sources: CatalogSources): CatalogStore {
    const products = buildProducts(parseSource("products", sources.products, productsCatalogSchema));
    const accessories = parseSource("accessories", sources.accessories, accessoriesCatalogSchema).map(buildAccessory);
    const rules = buildRules(parseSource("bom_rules", sources.bomRules, bomRulesCatalogSchema));

    const store = new CatalogStore(products, accessories, rules);
    console.log(
      `[CatalogStore] Loaded ${products.length} products, ${accessories.length} accessories, ${rules.length} BOM systems`,
    );
    return store;
  }

  private checkRuleReferences(rule: BOMSystemRule): void {
    for (const family of rule.families) {
      if (!this.families.has(family.toUpperCase())) {
        throw new CatalogLoadError("bom_rules", `system '${rule.id}' references unknown product family '${family}'`, {
          systemId: rule.id,
          family,
        });
      }
    }

    this.checkFormulaDependencies(rule);

    for (const key of QUANTITY_KEYS) {
      const item = rule.items[key];
      if (!item) continue;
      const foreign = rule.installation === "wall" ? "fixation-points-roof" : "fixation-points-wall";
      if (item.formula === foreign) {
        throw new CatalogLoadError(
          "bom_rules",
          `system '${rule.id}' is a ${rule.installation} system but item '${key}' uses '${item.formula}'`,
          { systemId: rule.id, key },
        );
      }
      if (key === "panels" && item.accessoryCategory) {
        throw new CatalogLoadError("bom_rules", `system '${rule.id}': panels are priced from the product catalog`, {
          systemId: rule.id,
          key,
        });
      }
      if (!item.accessoryCategory) continue;

      if (!this.accessoriesByCategory.has(item.accessoryCategory)) {
        throw new CatalogLoadError(
          "bom_rules",
          `system '${rule.id}' item '${key}' references category '${item.accessoryCategory}' with no accessories`,
          { systemId: rule.id, key, category: item.accessoryCategory },
        );
      }
      if (item.sku) {
        const entry = this.accessoriesBySku.get(item.sku);
        if (!entry || entry.category !== item.accessoryCategory) {
          throw new CatalogLoadError(
            "bom_rules",
            `system '${rule.id}' item '${key}' references sku '${item.sku}' missing from category '${item.accessoryCategory}'`,
            { systemId: rule.id, key, sku: item.sku },
          );
        }
      }
    }
  }

  /** Every quantity a formula reads must be declared by the same system, without cycles. */
  private checkFormulaDependencies(rule: BOMSystemRule): void {
    const visit = (key: QuantityKey, path: readonly QuantityKey[]): void => {
      const requiredBy = path[path.length - 1];
      const item = rule.items[key];
      if (!item) {
        throw new CatalogLoadError(
          "bom_rules",
          `system '${rule.id}' item '${requiredBy}' needs quantity '${key}', which is not declared`,
          { systemId: rule.id, key, requiredBy },
        );
      }
      if (path.includes(key)) {
        throw new CatalogLoadError("bom_rules", `system '${rule.id}' item '${key}' depends on itself`, {
          systemId: rule.id,
          key,
        });
      }
      for (const dependency of FORMULAS[item.formula].requires) visit(dependency, [...path, key]);
    };

    for (const key of QUANTITY_KEYS) {
      if (rule.items[key]) visit(key, []);
    }
  }

  getProduct(family: string, thicknessMm: number): Product | undefined {
    return this.products.get(productKey(family, thicknessMm));
  }

  /** All thicknesses of a family, thinnest first. */
  getFamilyProducts(family: string): readonly Product[] {
    return this.families.get(family.toUpperCase()) ?? [];
  }

  listFamilies(): string[] {
    return [...this.families.values()].map((list) => list[0].family);
  }

  getAccessory(sku: string): CatalogEntry | undefined {
    return this.accessoriesBySku.get(sku);
  }

  getAccessoriesByCategory(category: string): readonly CatalogEntry[] {
    return this.accessoriesByCategory.get(category) ?? [];
  }

  /**
   * Resolves the entry a BOM line is priced from. A preferred sku wins when it is
   * compatible; otherwise the first entry matching family and thickness, then the
   * first matching family only.
   */
  findCompatibleAccessory(
    category: string,
    family: string,
    thicknessMm: number,
    preferredSku?: string,
  ): CatalogEntry | undefined {
    const candidates = this.getAccessoriesByCategory(category).filter((entry) =>
      familyMatches(entry.compatibility.families, family),
    );

    if (preferredSku) {
      const preferred = candidates.find((entry) => entry.sku === preferredSku);
      if (preferred) return preferred;
    }
    return candidates.find((entry) => thicknessMatches(entry, thicknessMm)) ?? candidates[0];
  }

  getBOMRule(systemId: string): BOMSystemRule | undefined {
    return this.rules.get(systemId);
  }

  listBOMRules(): BOMSystemRule[] {
    return [...this.rules.values()];
  }
}

export async function loadCatalogStoreFromFiles(paths: CatalogPaths): Promise<CatalogStore> {
  const read = async (name: keyof CatalogPaths): Promise<Buffer> => {
    try {
      return await fs.readFile(paths[name]);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[CatalogStore] Could not read ${name} catalog at ${paths[name]}: ${message}`);
      throw new CatalogLoadError(name, `cannot read ${paths[name]} (${message})`, { path: paths[name] });
    }
  };

  const [products, accessories, bomRules] = await Promise.all([read("products"), read("accessories"), read("bomRules")]);
  return CatalogStore.load({ products, accessories, bomRules });
}
