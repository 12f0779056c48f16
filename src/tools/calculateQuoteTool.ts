import { tool } from "@langchain/core/tools";
import { z } from "zod";
import { CatalogRegistry } from "../catalog/catalogRegistry.js";
import { assembleQuotation, type AssembleOptions } from "../engine/quotationAssembler.js";
import { defaultCatalogRegistry, engineConfig } from "./runtime.js";
import { invalidInputResponse } from "./toolResponse.js";

const schema = z.object({
  product_family: z.string().describe("Panel family as listed in the catalog (e.g., 'ISODEC-EPS', 'ISOPANEL-EPS')."),
  thickness_mm: z.coerce.number().describe("Panel thickness in millimetres (e.g., 100)."),
  length_m: z.coerce.number().describe("Length of the area to cover, in metres (panel direction)."),
  width_m: z.coerce.number().describe("Width of the area to cover, in metres."),
  span_m: z.coerce.number().describe("Distance between structural supports in metres. Needed for the span check."),
  construction_system: z
    .string()
    .describe("Construction system id from the BOM rules (e.g., 'metal-roof-eps', 'concrete-roof-eps')."),
  discount_percent: z.coerce.number().default(0).describe("Global discount percentage."),
  include_accessories: z
    .boolean()
    .default(true)
    .describe("Include perfilería, fixings and sealants. When false only the panels are quoted."),
});

export function createCalculateQuoteTool(registry: CatalogRegistry, options: AssembleOptions = {}) {
  return tool(
    async (input) => {
      console.log(
        `[calculateQuoteTool] Input: ${input.product_family} ${input.thickness_mm}mm, ${input.length_m}x${input.width_m}m, span=${input.span_m}m, system=${input.construction_system}`,
      );
      const store = await registry.current();

      try {
        const result = assembleQuotation(
          store,
          {
            productFamily: input.product_family,
            thicknessMm: input.thickness_mm,
            lengthM: input.length_m,
            widthM: input.width_m,
            spanM: input.span_m,
            constructionSystem: input.construction_system,
            discountPercent: input.discount_percent,
            includeAccessories: input.include_accessories,
          },
          options,
        );

        if (!result.validation.isValid) {
          console.warn(`[calculateQuoteTool] Span check failed: ${result.validation.recommendation}`);
        }
        if (result.pendingPriceWarnings.length > 0) {
          console.warn(`[calculateQuoteTool] Items without price: ${result.pendingPriceWarnings.join(", ")}`);
        }
        console.log(
          `[calculateQuoteTool] Success. ${result.lineItems.length} lines, total ${result.grandTotal} (checksum ${result.verificationChecksum})`,
        );
        return JSON.stringify({ status: "success", quotation: result }, null, 2);
      } catch (error) {
        return invalidInputResponse("calculateQuoteTool", error);
      }
    },
    {
      name: "calculate_panel_quote",
      description:
        "Computes an exact quotation for insulated panels with the full bill of materials (panels, perfilería, fixings, sealants). ALWAYS use this for prices; never compute totals yourself. Prices already include VAT: do not add tax. Check 'validation' and 'warnings' in the result before presenting it.",
      schema,
    },
  );
}

export const calculateQuoteTool = createCalculateQuoteTool(defaultCatalogRegistry, {
  safetyMargin: engineConfig.safetyMargin,
  maxDiscountPercent: engineConfig.maxDiscountPercent,
});
