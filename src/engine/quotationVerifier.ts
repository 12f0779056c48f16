import type { Decimal } from "decimal.js";
import {
  LINE_GROUPS,
  type LineGroup,
  type QuotationResult,
  type QuotationVerification,
} from "../types/quotation.js";
import { quotationChecksum } from "../utils/checksum.js";
import { Dec, formatMoney, roundCurrency, sumMoney, toDecimal } from "../utils/money.js";

export type VerifiableQuotation = Omit<QuotationResult, "calculationVerified">;

function readMoney(label: string, value: string, errors: string[]): Decimal | null {
  try {
    return toDecimal(value);
  } catch {
    errors.push(`${label} is not a decimal amount: '${value}'`);
    return null;
  }
}

/**
 * Re-derives every figure of a quotation from its own lines: line totals that can be
 * recomputed (piece, area and pending lines), group subtotals, subtotal, discount,
 * grand total and checksum. Any figure edited after assembly shows up as an error.
 */
export function verifyQuotation(quote: VerifiableQuotation): QuotationVerification {
  const errors: string[] = [];
  const checksPerformed: string[] = [];

  checksPerformed.push("geometry");
  if (quote.area <= 0) errors.push("Area must be greater than 0");
  if (quote.panelCount < 1) errors.push("At least one panel is needed");

  checksPerformed.push("line_totals");
  const lineTotals: { group: LineGroup; total: Decimal }[] = [];
  for (const line of quote.lineItems) {
    const total = readMoney(`Line total of ${line.sku}`, line.lineTotal, errors);
    if (!total) continue;
    lineTotals.push({ group: line.group, total });

    if (line.pendingPrice || line.unitPrice === null) {
      if (!total.isZero()) errors.push(`Line ${line.sku} has no price but totals ${line.lineTotal}`);
      continue;
    }
    const unitPrice = readMoney(`Unit price of ${line.sku}`, line.unitPrice, errors);
    if (!unitPrice) continue;

    let expected: Decimal | null = null;
    if (line.unitMeasureKind === "piece") expected = toDecimal(line.quantity).times(unitPrice);
    if (line.unitMeasureKind === "area") expected = toDecimal(quote.area).times(unitPrice);
    if (expected && formatMoney(expected) !== line.lineTotal) {
      errors.push(`Line ${line.sku} mismatch: ${line.lineTotal} vs expected ${formatMoney(expected)}`);
    }
  }

  checksPerformed.push("group_subtotals");
  for (const group of LINE_GROUPS) {
    const members = lineTotals.filter((l) => l.group === group);
    const expected = formatMoney(sumMoney(members.map((l) => l.total)));
    if (quote.groupSubtotals[group] !== expected) {
      errors.push(`Subtotal of ${group} mismatch: ${quote.groupSubtotals[group]} vs expected ${expected}`);
    }
  }

  checksPerformed.push("subtotal");
  const subtotal = sumMoney(lineTotals.map((l) => l.total));
  if (formatMoney(subtotal) !== quote.subtotal) {
    errors.push(`Subtotal mismatch: ${quote.subtotal} vs expected ${formatMoney(subtotal)}`);
  }

  checksPerformed.push("discount");
  const reported = readMoney("Subtotal", quote.subtotal, errors);
  if (reported) {
    const factor = new Dec(1).minus(toDecimal(quote.discountPercent).div(100));
    const grandTotal = roundCurrency(reported.times(factor));
    if (formatMoney(grandTotal) !== quote.grandTotal) {
      errors.push(`Grand total mismatch: ${quote.grandTotal} vs expected ${formatMoney(grandTotal)}`);
    }
    const discount = formatMoney(reported.minus(grandTotal));
    if (discount !== quote.discountApplied) {
      errors.push(`Discount mismatch: ${quote.discountApplied} vs expected ${discount}`);
    }
  }
  if (quote.discountPercent < quote.requestedDiscountPercent) {
    errors.push(`Applied discount ${quote.discountPercent}% is below the requested ${quote.requestedDiscountPercent}%`);
  }

  checksPerformed.push("checksum");
  if (quotationChecksum(quote.lineItems, quote.grandTotal) !== quote.verificationChecksum) {
    errors.push("Checksum does not match the line items and grand total");
  }

  return { valid: errors.length === 0, errors, checksPerformed };
}
