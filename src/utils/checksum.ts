import { createHash } from "crypto";
import type { QuotationLineItem } from "../types/quotation.js";

/**
 * Short fingerprint of what a quotation charges: sku, quantity and total of every
 * line plus the grand total. Callers compare it to detect a figure altered after
 * the engine produced it.
 */
export function quotationChecksum(lineItems: readonly QuotationLineItem[], grandTotal: string): string {
  const payload = JSON.stringify({
    lineItems: lineItems.map((line) => ({ sku: line.sku, quantity: line.quantity, lineTotal: line.lineTotal })),
    grandTotal,
  });
  return createHash("sha256").update(payload).digest("hex").slice(0, 16);
}
