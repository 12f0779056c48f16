import path from "path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "./env.js";

describe("loadConfig", () => {
  it("defaults to the packaged data directory", () => {
    const config = loadConfig({});

    expect(config.safetyMargin).toBe(0.15);
    expect(config.maxDiscountPercent).toBe(30);
    expect(config.catalogPaths.products.endsWith(path.join("data", "products.json"))).toBe(true);
    expect(config.catalogPaths.bomRules.endsWith(path.join("data", "bom_rules.json"))).toBe(true);
  });

  it("reads catalog locations from the environment", () => {
    const config = loadConfig({ CATALOG_DIR: "/srv/catalogs", BOM_RULES_PATH: "/etc/quotes/rules.json" });

    expect(config.catalogPaths).toEqual({
      products: "/srv/catalogs/products.json",
      accessories: "/srv/catalogs/accessories.json",
      bomRules: "/etc/quotes/rules.json",
    });
  });

  it("coerces numeric settings", () => {
    const config = loadConfig({ AUTOPORTANCIA_SAFETY_MARGIN: "0.2", MAX_DISCOUNT_PERCENT: "15" });

    expect(config.safetyMargin).toBe(0.2);
    expect(config.maxDiscountPercent).toBe(15);
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ AUTOPORTANCIA_SAFETY_MARGIN: "", MAX_DISCOUNT_PERCENT: " ", BOM_RULES_PATH: "" });

    expect(config.safetyMargin).toBe(0.15);
    expect(config.maxDiscountPercent).toBe(30);
    expect(config.catalogPaths.bomRules.endsWith(path.join("data", "bom_rules.json"))).toBe(true);
  });

  it("fails fast on invalid values", () => {
    expect(() => loadConfig({ AUTOPORTANCIA_SAFETY_MARGIN: "1" })).toThrow(/^Invalid engine configuration: AUTOPORTANCIA_SAFETY_MARGIN/);
    expect(() => loadConfig({ MAX_DISCOUNT_PERCENT: "lots" })).toThrow(/Invalid engine configuration/);
  });
});
