// Indian GST split: same state → CGST + SGST (half each), otherwise IGST.

import { normalizeKey, round2 } from "./normalize";

/** Rate applied when a report carries no tax column. HSN-specific rates are not modelled. */
export const DEFAULT_GST_RATE = 0.18;

export interface TaxSplit {
  cgst: number;
  sgst: number;
  igst: number;
}

/**
 * True only when both states are non-empty and equal after trim + lowercase.
 */
export function isSameState(sellerState: string, buyerState: string): boolean {
  const seller = normalizeKey(sellerState);
  const buyer = normalizeKey(buyerState);
  return seller !== "" && buyer !== "" && seller === buyer;
}

export function splitTax(
  taxAmount: number | null | undefined,
  sellerState: string,
  buyerState: string
): TaxSplit {
  const tax = typeof taxAmount === "number" && Number.isFinite(taxAmount) ? taxAmount : 0;

  if (isSameState(sellerState, buyerState)) {
    const half = round2(tax / 2);
    return { cgst: half, sgst: half, igst: 0 };
  }
  return { cgst: 0, sgst: 0, igst: round2(tax) };
}

export function defaultTaxFor(amount: number): number {
  return round2(amount * DEFAULT_GST_RATE);
}
