import { CatalogRegistry } from "../catalog/catalogRegistry.js";
import { loadConfig } from "../config/env.js";

export const engineConfig = loadConfig();

/** Process-wide catalog snapshot backing the default tool instances. */
export const defaultCatalogRegistry = CatalogRegistry.fromFiles(engineConfig.catalogPaths);
