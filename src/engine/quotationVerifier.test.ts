import { describe, expect, it } from "vitest";
import { assembleQuotation } from "./quotationAssembler.js";
import { verifyQuotation } from "./quotationVerifier.js";
import { loadShippedCatalog } from "../__fixtures__/catalogs.js";

const quote = assembleQuotation(loadShippedCatalog(), {
  productFamily: "ISODEC-EPS",
  thicknessMm: 100,
  lengthM: 10,
  widthM: 5,
  spanM: 4.5,
  constructionSystem: "metal-roof-eps",
  discountPercent: 0,
  includeAccessories: true,
});

describe("verifyQuotation", () => {
  it("accepts an assembled quotation", () => {
    expect(quote.calculationVerified).toBe(true);
    expect(verifyQuotation(quote)).toEqual({
      valid: true,
      errors: [],
      checksPerformed: ["geometry", "line_totals", "group_subtotals", "subtotal", "discount", "checksum"],
    });
  });

  it("catches an edited grand total", () => {
    const result = verifyQuotation({ ...quote, grandTotal: "100.00" });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      "Grand total mismatch: 100.00 vs expected 2640.27",
      "Checksum does not match the line items and grand total",
    ]);
  });

  it("catches an edited line total", () => {
    const lineItems = quote.lineItems.map((line) => (line.sku === "GF-100" ? { ...line, lineTotal: "50.00" } : line));

    expect(verifyQuotation({ ...quote, lineItems }).errors).toEqual([
      "Line GF-100 mismatch: 50.00 vs expected 41.54",
      "Subtotal of perfileria mismatch: 248.39 vs expected 256.85",
      "Subtotal mismatch: 2640.27 vs expected 2648.73",
      "Checksum does not match the line items and grand total",
    ]);
  });

  it("catches a discount lower than requested", () => {
    const result = verifyQuotation({ ...quote, requestedDiscountPercent: 10 });
    expect(result.errors).toEqual(["Applied discount 0% is below the requested 10%"]);
  });

  it("reports amounts that are not decimals", () => {
    const result = verifyQuotation({ ...quote, subtotal: "n/a" });

    expect(result.valid).toBe(false);
    expect(result.errors).toContain("Subtotal is not a decimal amount: 'n/a'");
  });
});
