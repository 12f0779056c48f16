import { describe, expect, it } from "vitest";
import { formatMoney, formatUnitPrice, roundCurrency, sumMoney, toDecimal } from "./money.js";

describe("money", () => {
  it("rounds half-up to 2 places", () => {
    expect(roundCurrency(toDecimal(41.885)).toFixed(2)).toBe("41.89");
    expect(roundCurrency(toDecimal("0.315")).toFixed(2)).toBe("0.32");
    expect(roundCurrency(toDecimal("2.004")).toFixed(2)).toBe("2.00");
  });

  it("keeps decimal arithmetic exact", () => {
    expect(sumMoney([toDecimal(0.1), toDecimal(0.2)]).toString()).toBe("0.3");
    expect(toDecimal(46.07).times(50).toString()).toBe("2303.5");
  });

  it("formats totals with exactly 2 places", () => {
    expect(formatMoney(toDecimal("2303.5"))).toBe("2303.50");
    expect(formatMoney(sumMoney([]))).toBe("0.00");
  });

  it("keeps sub-cent unit prices", () => {
    expect(formatUnitPrice(toDecimal(0.045))).toBe("0.045");
    expect(formatUnitPrice(toDecimal(24.1))).toBe("24.10");
    expect(formatUnitPrice(toDecimal(20.77))).toBe("20.77");
  });

  it("rejects non-finite input", () => {
    expect(() => toDecimal(Number.NaN)).toThrow(RangeError);
    expect(() => toDecimal(Number.POSITIVE_INFINITY)).toThrow(RangeError);
  });
});
