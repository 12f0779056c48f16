import path from "path";
import { fileURLToPath } from "url";
import dotenv from "dotenv";
import { z } from "zod";
import { DEFAULT_MAX_DISCOUNT_PERCENT, DEFAULT_SAFETY_MARGIN } from "./constants.js";

dotenv.config();

const PACKAGE_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..");

// `KEY=` in a .env file arrives as "" and counts as unset.
const unsetIfBlank = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (typeof value === "string" && value.trim() === "" ? undefined : value), schema);

const envSchema = z.object({
  CATALOG_DIR: unsetIfBlank(z.string().min(1).default(path.join(PACKAGE_ROOT, "data"))),
  PRODUCTS_CATALOG_PATH: unsetIfBlank(z.string().min(1).optional()),
  ACCESSORIES_CATALOG_PATH: unsetIfBlank(z.string().min(1).optional()),
  BOM_RULES_PATH: unsetIfBlank(z.string().min(1).optional()),
  AUTOPORTANCIA_SAFETY_MARGIN: unsetIfBlank(z.coerce.number().min(0).lt(1).default(DEFAULT_SAFETY_MARGIN)),
  MAX_DISCOUNT_PERCENT: unsetIfBlank(z.coerce.number().min(0).max(100).default(DEFAULT_MAX_DISCOUNT_PERCENT)),
});

export interface EngineConfig {
  catalogPaths: {
    products: string;
    accessories: string;
    bomRules: string;
  };
  safetyMargin: number;
  maxDiscountPercent: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid engine configuration: ${issues}`);
  }
  const cfg = parsed.data;
  const dir = path.resolve(cfg.CATALOG_DIR);

  return {
    catalogPaths: {
      products: path.resolve(cfg.PRODUCTS_CATALOG_PATH ?? path.join(dir, "products.json")),
      accessories: path.resolve(cfg.ACCESSORIES_CATALOG_PATH ?? path.join(dir, "accessories.json")),
      bomRules: path.resolve(cfg.BOM_RULES_PATH ?? path.join(dir, "bom_rules.json")),
    },
    safetyMargin: cfg.AUTOPORTANCIA_SAFETY_MARGIN,
    maxDiscountPercent: cfg.MAX_DISCOUNT_PERCENT,
  };
}
