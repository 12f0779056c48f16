import { tool } from "@langchain/core/tools";
import { z } from "zod";
import { CatalogRegistry } from "../catalog/catalogRegistry.js";
import { summarizeProduct } from "../engine/quotationAssembler.js";
import { defaultCatalogRegistry } from "./runtime.js";

const schema = z.object({
  product_family: z.string().describe("Panel family (e.g., 'ISODEC-EPS', 'ISOROOF-3G')."),
  thickness_mm: z.coerce.number().optional().describe("Optional thickness in millimetres. Omit to list every thickness."),
});

export function createLookupProductTool(registry: CatalogRegistry) {
  return tool(
    async ({ product_family, thickness_mm }) => {
      console.log(`[lookupProductTool] Input: family=${product_family}, thickness=${thickness_mm}`);
      const store = await registry.current();
      const products = store
        .getFamilyProducts(product_family)
        .filter((p) => thickness_mm === undefined || p.thicknessMm === thickness_mm);

      if (products.length === 0) {
        return `No products found for ${product_family}${thickness_mm === undefined ? "" : ` ${thickness_mm}mm`}. Available families: ${store.listFamilies().join(", ")}`;
      }
      return JSON.stringify(products.map(summarizeProduct), null, 2);
    },
    {
      name: "lookup_product_specs",
      description:
        "Looks up panel specifications in the catalog: price per m² (VAT included), usable width, span limit and thermal coefficient.",
      schema,
    },
  );
}

export const lookupProductTool = createLookupProductTool(defaultCatalogRegistry);
