// ══ Spreadsheet → SourceTable ══════════════════════════════════════════════

import * as XLSX from "xlsx";
import type { CellValue, SourceRow, SourceTable } from "../types/canonical";
import { ConversionError, describeError } from "../engine/errors";

export const SUPPORTED_EXTENSIONS = [".csv", ".xls", ".xlsx"] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export function fileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  return dot < 0 ? "" : fileName.slice(dot).toLowerCase();
}

export function isSupportedFile(fileName: string): boolean {
  const ext = fileExtension(fileName);
  return SUPPORTED_EXTENSIONS.some((e) => e === ext);
}

function toCellValue(value: unknown): CellValue {
  if (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date
  ) {
    return value;
  }
  return String(value);
}

/**
 * Decode the first worksheet of a CSV/XLS/XLSX file.
 * CSV cells stay as text (ids like "0012" keep their zeros); workbook dates
 * come back as Date objects. Empty cells are null.
 */
export function readSourceTable(data: Buffer, fileName: string): SourceTable {
  const ext = fileExtension(fileName);
  if (!isSupportedFile(fileName)) {
    throw new ConversionError("UNSUPPORTED_FILE", `Unsupported extension ${ext || "(none)"} for ${fileName}`);
  }

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: "buffer", cellDates: true, raw: ext === ".csv" });
  } catch (err) {
    throw new ConversionError("UNREADABLE_FILE", `Failed to read ${fileName}: ${describeError(err)}`);
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    throw new ConversionError("UNREADABLE_FILE", `Failed to read ${fileName}: workbook has no sheets`);
  }

  const [header = [], ...body] = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    blankrows: false,
    raw: true,
  });
  const columns = Array.from(header, (h) => (h === null || h === undefined ? "" : String(h)));

  // Rows are keyed by the header text as written; a repeated header keeps its first cell.
  const rows: SourceRow[] = body.map((cells) => {
    const row: SourceRow = {};
    columns.forEach((column, i) => {
      if (!(column in row)) row[column] = toCellValue(cells[i] ?? null);
    });
    return row;
  });

  return { columns, rows };
}
