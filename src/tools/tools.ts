import { CatalogRegistry } from "../catalog/catalogRegistry.js";
import type { AssembleOptions } from "../engine/quotationAssembler.js";
import { DEFAULT_SAFETY_MARGIN } from "../config/constants.js";
import { calculateQuoteTool, createCalculateQuoteTool } from "./calculateQuoteTool.js";
import { createLookupProductTool, lookupProductTool } from "./lookupProductTool.js";
import { createSearchAccessoriesTool, searchAccessoriesTool } from "./searchAccessoriesTool.js";
import { createValidateAutoportanciaTool, validateAutoportanciaTool } from "./validateAutoportanciaTool.js";

/** The full tool set bound to one catalog registry, in the order an agent should prefer them. */
export function createQuotationTools(registry: CatalogRegistry, options: AssembleOptions = {}) {
  return [
    createCalculateQuoteTool(registry, options),
    createValidateAutoportanciaTool(registry, options.safetyMargin ?? DEFAULT_SAFETY_MARGIN),
    createLookupProductTool(registry),
    createSearchAccessoriesTool(registry),
  ];
}

export const quotationTools = [calculateQuoteTool, validateAutoportanciaTool, lookupProductTool, searchAccessoriesTool];

export { calculateQuoteTool, validateAutoportanciaTool, lookupProductTool, searchAccessoriesTool };
