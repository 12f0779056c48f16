import { tool } from "@langchain/core/tools";
import { z } from "zod";
import { CatalogRegistry } from "../catalog/catalogRegistry.js";
import { familyMatches } from "../catalog/catalogStore.js";
import { formatUnitPrice } from "../utils/money.js";
import { defaultCatalogRegistry } from "./runtime.js";

const schema = z.object({
  category: z.string().describe("Accessory category (e.g., 'drip-edge-front', 'sealant', 'nut')."),
  product_family: z.string().optional().describe("Optional panel family to keep only compatible accessories."),
});

export function createSearchAccessoriesTool(registry: CatalogRegistry) {
  return tool(
    async ({ category, product_family }) => {
      console.log(`[searchAccessoriesTool] Input: category=${category}, family=${product_family}`);
      const store = await registry.current();
      const entries = store
        .getAccessoriesByCategory(category)
        .filter((entry) => !product_family || familyMatches(entry.compatibility.families, product_family));

      if (entries.length === 0) {
        return "No accessories found in the catalog matching your query.";
      }
      return JSON.stringify(
        entries.map((entry) => ({
          sku: entry.sku,
          name: entry.name,
          category: entry.category,
          unitMeasureKind: entry.unitMeasureKind,
          nominalPieceLengthM: entry.nominalPieceLengthM,
          unitPrice: entry.unitPrice === null ? null : formatUnitPrice(entry.unitPrice),
          compatibility: entry.compatibility,
        })),
        null,
        2,
      );
    },
    {
      name: "search_accessories",
      description:
        "Searches the accessory catalog (perfilería, fixings, sealants) by category, optionally filtered by compatible panel family. Prices include VAT.",
      schema,
    },
  );
}

export const searchAccessoriesTool = createSearchAccessoriesTool(defaultCatalogRegistry);
