// ══ Shared extraction routine for every marketplace converter ═════════════
// A converter is just a SynonymProfile (which column names to try, in which
// order) run through extractRows(). Nothing here knows any marketplace.

import type {
  CellValue,
  ConvertedTable,
  MarketplaceTag,
  SourceRow,
  SourceTable,
  TallyRow,
} from "../types/canonical";
import { buildRow } from "../engine/rowBuilder";
import { defaultTaxFor, splitTax } from "../engine/gst";
import { cellText, coerceNumber, isBlank, normalizeKey, parseDate } from "../engine/normalize";

export type SemanticField =
  | "voucherNo"
  | "voucherDate"
  | "buyerState"
  | "customerName"
  | "gstNumber"
  | "itemName"
  | "hsn"
  | "quantity"
  | "rate"
  | "amount"
  | "taxAmount";

export type SynonymChain = readonly string[];

export interface SynonymProfile {
  /** Synthesized voucher numbers look like `${voucherPrefix}-${rowIndex + 1}`. */
  voucherPrefix: string;
  /** Customer Name when the report has no buyer name. */
  customerPlaceholder: string;
  /** Lowercase column names per field, highest priority first. */
  fields: Readonly<Record<SemanticField, SynonymChain>>;
}

export interface MarketplaceConverter {
  tag: MarketplaceTag;
  label: string;
  profile: SynonymProfile;
  convert(table: SourceTable, sellerState: string): ConvertedTable;
}

export const DEFAULT_ITEM_NAME = "Item";

export interface HeaderKey {
  column: string;               // Header as written in the source
  key: string;                  // normalizeKey(column)
}

/**
 * Normalize a header row once. When two headers normalize to the same name,
 * the first one in column order is kept.
 */
export function normalizeHeaders(columns: readonly string[]): HeaderKey[] {
  const seen = new Set<string>();
  const out: HeaderKey[] = [];
  for (const column of columns) {
    const key = normalizeKey(column);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push({ column, key });
  }
  return out;
}

/**
 * Re-key a row by normalized header. Only the given headers are read; by
 * default they are the row's own keys.
 */
export function normalizeRow(
  row: SourceRow,
  headers: readonly HeaderKey[] = normalizeHeaders(Object.keys(row))
): Map<string, CellValue> {
  const out = new Map<string, CellValue>();
  for (const { column, key } of headers) {
    out.set(key, row[column]);
  }
  return out;
}

/**
 * First non-blank value along the chain, or undefined when every synonym is
 * missing or empty.
 */
export function resolveField(row: Map<string, CellValue>, chain: SynonymChain): CellValue {
  for (const column of chain) {
    const value = row.get(column);
    if (!isBlank(value)) return value;
  }
  return undefined;
}

function resolveText(row: Map<string, CellValue>, chain: SynonymChain, fallback: string): string {
  const text = cellText(resolveField(row, chain));
  return text === "" ? fallback : text;
}

export function extractRow(
  raw: SourceRow,
  index: number,
  profile: SynonymProfile,
  sellerState: string,
  headers?: readonly HeaderKey[]
): TallyRow {
  const row = normalizeRow(raw, headers);
  const { fields } = profile;

  const voucherNo = resolveText(row, fields.voucherNo, `${profile.voucherPrefix}-${index + 1}`);
  const voucherDate = parseDate(resolveField(row, fields.voucherDate));

  const buyerState = resolveText(row, fields.buyerState, "");
  const customerName = resolveText(row, fields.customerName, profile.customerPlaceholder);

  const gstNumber = resolveText(row, fields.gstNumber, "");
  const gstType = gstNumber ? "Registered" : "Unregistered";

  const itemName = resolveText(row, fields.itemName, DEFAULT_ITEM_NAME);
  const hsn = resolveText(row, fields.hsn, "");

  const quantity = coerceNumber(resolveField(row, fields.quantity), 1);
  const rateValue = coerceNumber(resolveField(row, fields.rate), Number.NaN);
  const rate = Number.isNaN(rateValue) ? "" : rateValue;

  // Amount falls back to rate × qty; tax falls back to the default GST rate.
  const computedAmount = rate === "" ? 0 : rate * quantity;
  const amount = coerceNumber(resolveField(row, fields.amount), computedAmount);
  const taxAmount = coerceNumber(resolveField(row, fields.taxAmount), defaultTaxFor(amount));

  const { cgst, sgst, igst } = splitTax(taxAmount, sellerState, buyerState);

  return buildRow({
    voucherNo,
    voucherDate,
    customerName,
    state: buyerState,
    gstType,
    gstNumber,
    itemName,
    hsn,
    quantity,
    rate,
    amount,
    taxAmount,
    cgst,
    sgst,
    igst,
  });
}

export function extractRows(table: SourceTable, profile: SynonymProfile, sellerState: string): TallyRow[] {
  const headers = normalizeHeaders(table.columns);
  return table.rows.map((raw, index) => extractRow(raw, index, profile, sellerState, headers));
}

export function createConverter(tag: MarketplaceTag, label: string, profile: SynonymProfile): MarketplaceConverter {
  return {
    tag,
    label,
    profile,
    convert: (table, sellerState) => ({
      source: label,
      rows: extractRows(table, profile, sellerState),
    }),
  };
}
