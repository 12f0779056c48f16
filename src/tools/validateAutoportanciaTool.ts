import { tool } from "@langchain/core/tools";
import { z } from "zod";
import { CatalogRegistry } from "../catalog/catalogRegistry.js";
import { assertPositiveGeometry } from "../engine/bomQuantities.js";
import { validateAutoportancia } from "../engine/autoportancia.js";
import { defaultCatalogRegistry, engineConfig } from "./runtime.js";
import { invalidInputResponse } from "./toolResponse.js";

const schema = z.object({
  product_family: z.string().describe("Panel family (e.g., 'ISODEC-EPS')."),
  thickness_mm: z.coerce.number().describe("Panel thickness in millimetres."),
  span_m: z.coerce.number().describe("Distance between supports in metres."),
});

export function createValidateAutoportanciaTool(registry: CatalogRegistry, safetyMargin: number) {
  return tool(
    async ({ product_family, thickness_mm, span_m }) => {
      console.log(`[validateAutoportanciaTool] Input: ${product_family} ${thickness_mm}mm, span=${span_m}m`);
      const store = await registry.current();

      try {
        assertPositiveGeometry("spanM", span_m);
        const result = validateAutoportancia(
          { family: product_family, thicknessMm: thickness_mm },
          span_m,
          store.getFamilyProducts(product_family),
          safetyMargin,
        );
        console.log(`[validateAutoportanciaTool] isValid=${result.isValid}, safeMax=${result.safeMaxSpanM}`);
        return JSON.stringify(result, null, 2);
      } catch (error) {
        return invalidInputResponse("validateAutoportanciaTool", error);
      }
    },
    {
      name: "validate_autoportancia",
      description:
        "Checks whether a panel can bridge the given span between supports (self-supporting capacity with safety margin). Suggests thicker panels or an intermediate support when it cannot.",
      schema,
    },
  );
}

export const validateAutoportanciaTool = createValidateAutoportanciaTool(defaultCatalogRegistry, engineConfig.safetyMargin);
