import { describe, expect, it } from "vitest";
import { createQuotationTools } from "./tools.js";
import { createCalculateQuoteTool } from "./calculateQuoteTool.js";
import { createLookupProductTool } from "./lookupProductTool.js";
import { createSearchAccessoriesTool } from "./searchAccessoriesTool.js";
import { createValidateAutoportanciaTool } from "./validateAutoportanciaTool.js";
import { CatalogRegistry } from "../catalog/catalogRegistry.js";
import { CatalogStore } from "../catalog/catalogStore.js";
import { inlineSources, loadShippedCatalog } from "../__fixtures__/catalogs.js";

const registry = CatalogRegistry.fromStore(loadShippedCatalog());

function parse(raw: unknown): unknown {
  return JSON.parse(String(raw));
}

const roofInput = {
  product_family: "ISODEC-EPS",
  thickness_mm: 100,
  length_m: 10,
  width_m: 5,
  span_m: 4.5,
  construction_system: "metal-roof-eps",
};

describe("calculate_panel_quote", () => {
  const calculate = createCalculateQuoteTool(registry);

  it("returns the quotation as JSON", async () => {
    const raw: unknown = await calculate.invoke({ ...roofInput, discount_percent: 10 });

    expect(parse(raw)).toMatchObject({
      status: "success",
      quotation: {
        constructionSystem: "metal-roof-eps",
        subtotal: "2640.27",
        grandTotal: "2376.24",
        lineItems: expect.arrayContaining([expect.objectContaining({ sku: "ISODEC-EPS-100", lineTotal: "2303.50" })]),
      },
    });
  });

  it("returns input errors as a payload", async () => {
    const raw: unknown = await calculate.invoke({ ...roofInput, width_m: 0 });

    expect(parse(raw)).toEqual({
      status: "invalid_input",
      error: "InvalidGeometryError",
      message: "widthM must be a positive number of metres, got 0",
      context: { field: "widthM", value: 0 },
    });
  });

  it("throws configuration errors", async () => {
    const store = CatalogStore.load(
      inlineSources({
        accessories: [
          {
            sku: "SEAL-OTHER",
            name: "Sealant for another line",
            category: "sealant",
            unitMeasureKind: "piece",
            unitPrice: 5,
            compatibility: { families: ["OTHER"] },
          },
        ],
        bomRules: {
          "test-roof": {
            name: "Test roof",
            families: ["TEST-PANEL"],
            installation: "roof",
            items: { "sealant-tubes": { formula: "sealant-tubes", accessoryCategory: "sealant" } },
          },
        },
      }),
    );
    const misconfigured = createCalculateQuoteTool(CatalogRegistry.fromStore(store));

    await expect(
      misconfigured.invoke({
        product_family: "TEST-PANEL",
        thickness_mm: 100,
        length_m: 4,
        width_m: 4,
        span_m: 2,
        construction_system: "test-roof",
      }),
    ).rejects.toThrow("No accessory in category 'sealant' is compatible with TEST-PANEL 100mm");
  });
});

describe("validate_autoportancia", () => {
  const validate = createValidateAutoportanciaTool(registry, 0.15);

  it("reports the span check", async () => {
    const raw: unknown = await validate.invoke({ product_family: "ISODEC-EPS", thickness_mm: 100, span_m: 4.68 });

    expect(parse(raw)).toMatchObject({
      isValid: false,
      safeMaxSpanM: 4.675,
      excessPct: 0.11,
      alternativeThicknessesMm: [150, 200, 250],
    });
  });

  it("rejects a zero span as invalid input", async () => {
    const raw: unknown = await validate.invoke({ product_family: "ISODEC-EPS", thickness_mm: 100, span_m: 0 });
    expect(parse(raw)).toMatchObject({ status: "invalid_input", error: "InvalidGeometryError" });
  });
});

describe("lookup_product_specs", () => {
  const lookup = createLookupProductTool(registry);

  it("returns product attributes", async () => {
    const raw: unknown = await lookup.invoke({ product_family: "ISODEC-EPS", thickness_mm: 100 });

    expect(parse(raw)).toEqual([
      {
        family: "ISODEC-EPS",
        thicknessMm: 100,
        name: "Isodec EPS roof panel 100mm",
        pricePerM2: "46.07",
        usableWidthM: 1.12,
        spanLimitM: 5.5,
        thermalCoefficient: 0.36,
      },
    ]);
  });

  it("lists every thickness when none is given", async () => {
    const raw: unknown = await lookup.invoke({ product_family: "ISOROOF-3G" });
    expect(parse(raw)).toMatchObject([{ thicknessMm: 30 }, { thicknessMm: 50 }]);
  });

  it("names the available families when nothing matches", async () => {
    const raw: unknown = await lookup.invoke({ product_family: "FOO" });
    expect(raw).toBe("No products found for FOO. Available families: ISODEC-EPS, ISODEC-PIR, ISOPANEL-EPS, ISOROOF-3G");
  });
});

describe("search_accessories", () => {
  const search = createSearchAccessoriesTool(registry);

  it("filters by compatible family", async () => {
    const raw: unknown = await search.invoke({ category: "drip-edge-front", product_family: "ISOROOF-3G" });

    expect(parse(raw)).toEqual([
      {
        sku: "GF-ISOROOF",
        name: "Front drip edge Isoroof",
        category: "drip-edge-front",
        unitMeasureKind: "piece",
        nominalPieceLengthM: 3,
        unitPrice: "15.40",
        compatibility: { families: ["ISOROOF"] },
      },
    ]);
  });

  it("keeps sub-cent prices", async () => {
    const raw: unknown = await search.invoke({ category: "rivet" });
    expect(parse(raw)).toMatchObject([{ sku: "REM-AL-316", unitPrice: "0.045" }]);
  });

  it("says so when nothing matches", async () => {
    const raw: unknown = await search.invoke({ category: "gutter" });
    expect(raw).toBe("No accessories found in the catalog matching your query.");
  });
});

describe("createQuotationTools", () => {
  it("binds the four tools to one registry", () => {
    expect(createQuotationTools(registry).map((t) => t.name)).toEqual([
      "calculate_panel_quote",
      "validate_autoportancia",
      "lookup_product_specs",
      "search_accessories",
    ]);
  });
});
