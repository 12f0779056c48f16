import { readFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { CatalogStore, type CatalogPaths, type CatalogSources } from "../catalog/catalogStore.js";

const DATA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..", "data");

export const shippedCatalogPaths: CatalogPaths = {
  products: path.join(DATA_DIR, "products.json"),
  accessories: path.join(DATA_DIR, "accessories.json"),
  bomRules: path.join(DATA_DIR, "bom_rules.json"),
};

export function loadShippedCatalog(): CatalogStore {
  return CatalogStore.load({
    products: readFileSync(shippedCatalogPaths.products),
    accessories: readFileSync(shippedCatalogPaths.accessories),
    bomRules: readFileSync(shippedCatalogPaths.bomRules),
  });
}

/** One flat-priced panel: 10 × 10 m at 10/m² is exactly 1000.00. */
export const TEST_PANEL_PRODUCTS = {
  "TEST-PANEL": {
    name: "Test panel",
    thicknesses: {
      "100": { price: 10, usableWidth: 1, spanLimit: 5 },
    },
  },
};

export function inlineSources(overrides: {
  products?: unknown;
  accessories?: unknown;
  bomRules?: unknown;
}): CatalogSources {
  return {
    products: JSON.stringify(overrides.products ?? TEST_PANEL_PRODUCTS),
    accessories: JSON.stringify(overrides.accessories ?? []),
    bomRules: JSON.stringify(overrides.bomRules ?? {}),
  };
}
