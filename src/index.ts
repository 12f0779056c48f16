export { CatalogStore, loadCatalogStoreFromFiles, familyMatches, thicknessMatches } from "./catalog/catalogStore.js";
export type { CatalogPaths, CatalogSource, CatalogSources } from "./catalog/catalogStore.js";
export { CatalogRegistry } from "./catalog/catalogRegistry.js";
export type { CatalogLoader } from "./catalog/catalogRegistry.js";
export { validateAutoportancia } from "./engine/autoportancia.js";
export { computeQuantities, deriveGeometry } from "./engine/bomQuantities.js";
export type { DerivedGeometry } from "./engine/bomQuantities.js";
export { computeLineTotal, panelEntry, priceLineItem } from "./engine/lineItemPricer.js";
export type { LineContext } from "./engine/lineItemPricer.js";
export { assembleQuotation, summarizeProduct } from "./engine/quotationAssembler.js";
export { verifyQuotation } from "./engine/quotationVerifier.js";
export type { VerifiableQuotation } from "./engine/quotationVerifier.js";
export type { AssembleOptions } from "./engine/quotationAssembler.js";
export { loadConfig } from "./config/env.js";
export type { EngineConfig } from "./config/env.js";
export {
  AccessoryMappingError,
  CatalogLoadError,
  InvalidGeometryError,
  InvalidQuoteRequestError,
  MissingFormulaError,
  ProductNotFoundError,
  QuoteEngineError,
  isInputError,
} from "./utils/errors.js";
export type { ErrorContext, QuoteErrorKind } from "./utils/errors.js";
export { quotationChecksum } from "./utils/checksum.js";
export { FORMULA_KINDS, QUANTITY_KEYS } from "./types/catalog.js";
export type * from "./types/catalog.js";
export type * from "./types/quotation.js";
export { LINE_GROUPS } from "./types/quotation.js";
export { createQuotationTools } from "./tools/tools.js";
