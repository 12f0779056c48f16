/**
 * Error taxonomy of the quotation engine.
 *
 * - `configuration`: the catalogs or BOM rules are wrong. Never recovered locally.
 * - `input`: the request is wrong. The caller can show it to the user as invalid input.
 *
 * Domain warnings (span exceeded, missing price) are not errors; they travel on the
 * quotation result.
 */
export type QuoteErrorKind = "configuration" | "input";

export type ErrorContext = Record<string, string | number | boolean | null>;

export class QuoteEngineError extends Error {
  readonly kind: QuoteErrorKind;
  readonly context: ErrorContext;

  constructor(kind: QuoteErrorKind, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.context = context;
  }
}

export class CatalogLoadError extends QuoteEngineError {
  constructor(source: string, detail: string, context: ErrorContext = {}) {
    super("configuration", `Catalog '${source}' could not be loaded: ${detail}`, {
      source,
      ...context,
    });
  }
}

export class MissingFormulaError extends QuoteEngineError {
  constructor(systemId: string, key: string, requiredBy: string | null, reason = "is not declared") {
    super(
      "configuration",
      requiredBy
        ? `BOM system '${systemId}': quantity '${key}' needed by '${requiredBy}' ${reason}`
        : `BOM system '${systemId}': quantity '${key}' ${reason}`,
      { systemId, key, requiredBy },
    );
  }
}

export class AccessoryMappingError extends QuoteEngineError {
  constructor(category: string, family: string, thicknessMm: number) {
    super(
      "configuration",
      `No accessory in category '${category}' is compatible with ${family} ${thicknessMm}mm`,
      { category, family, thicknessMm },
    );
  }
}

export class ProductNotFoundError extends QuoteEngineError {
  constructor(family: string, thicknessMm: number, availableThicknessesMm: readonly number[]) {
    super(
      "input",
      availableThicknessesMm.length > 0
        ? `Product ${family} ${thicknessMm}mm not found. Available thicknesses: ${availableThicknessesMm.join(", ")}mm`
        : `Product family '${family}' not found`,
      { family, thicknessMm, available: availableThicknessesMm.join(",") },
    );
  }
}

export class InvalidGeometryError extends QuoteEngineError {
  constructor(field: string, value: number) {
    super("input", `${field} must be a positive number of metres, got ${value}`, { field, value });
  }
}

export class InvalidQuoteRequestError extends QuoteEngineError {
  constructor(field: string, message: string, value: string | number | boolean | null = null) {
    super("input", message, { field, value });
  }
}

export function isInputError(error: unknown): error is QuoteEngineError {
  return error instanceof QuoteEngineError && error.kind === "input";
}
