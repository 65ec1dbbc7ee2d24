// ══ ConversionResult → Tally import workbook ══════════════════════════════
// Sheets: "Sales", "Sales Return" (headers only), "_metadata".

import * as XLSX from "xlsx";
import { format } from "date-fns";
import { TALLY_COLUMNS, type ConversionResult, type TallyCell, type TallyRow } from "../types/canonical";

export const SALES_SHEET = "Sales";
export const SALES_RETURN_SHEET = "Sales Return";
export const METADATA_SHEET = "_metadata";

export const METADATA_COLUMNS = ["Generated On", "Source Files", "Seller State"] as const;

export function rowToCells(row: TallyRow): TallyCell[] {
  return TALLY_COLUMNS.map((column) => row[column]);
}

function voucherSheet(rows: TallyRow[]): XLSX.WorkSheet {
  return XLSX.utils.aoa_to_sheet([[...TALLY_COLUMNS], ...rows.map(rowToCells)]);
}

export function buildWorkbook(result: ConversionResult): XLSX.WorkBook {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, voucherSheet(result.sales), SALES_SHEET);
  XLSX.utils.book_append_sheet(wb, voucherSheet(result.salesReturn), SALES_RETURN_SHEET);

  const { generatedOn, sourceFiles, sellerState } = result.metadata;
  const meta = XLSX.utils.aoa_to_sheet([[...METADATA_COLUMNS], [generatedOn, sourceFiles, sellerState]]);
  XLSX.utils.book_append_sheet(wb, meta, METADATA_SHEET);

  return wb;
}

export function writeWorkbook(result: ConversionResult): Buffer {
  const out: unknown = XLSX.write(buildWorkbook(result), { type: "buffer", bookType: "xlsx" });
  if (!Buffer.isBuffer(out)) {
    throw new TypeError("xlsx did not return a Buffer");
  }
  return out;
}

/**
 * "tally_vouchers_20240115_102030.xlsx" (local time)
 */
export function outputFileName(now: Date = new Date()): string {
  return `tally_vouchers_${format(now, "yyyyMMdd_HHmmss")}.xlsx`;
}
