// ══ All converter output uses these types ONLY ═════════════════════════════
// Raw spreadsheet rows are SourceRow; nothing past the converters should
// read marketplace column names directly.

/**
 * Tally import columns, in the order the voucher sheet is written.
 */
export const TALLY_COLUMNS = [
  "Voucher No",
  "Voucher Date",
  "Customer Name",
  "Group",
  "Address",
  "State",
  "GST Type",
  "GST Number",
  "Sales Ledger Name",
  "Item Name",
  "Batch No.",
  "Expiry",
  "HSN Code",
  "Quantity",
  "Rate",
  "Amount",
  "Taxes",
  "CGST Ledger Name",
  "CGST Amount",
  "SGST Ledger Name",
  "SGST Amount",
  "IGST Ledger Name",
  "IGST Amount",
  "Total Amount",
  "Other Charges Ledger",
  "Other Charges Amount",
] as const;

export type TallyColumn = (typeof TALLY_COLUMNS)[number];

export type GstType = "Registered" | "Unregistered";

export interface TallyRow {
  "Voucher No": string;
  "Voucher Date": string;       // YYYY-MM-DD, "" if unparseable
  "Customer Name": string;
  "Group": "Sundry Debtors";
  "Address": string;            // Buyer state (no street address in marketplace exports)
  "State": string;
  "GST Type": GstType;
  "GST Number": string;
  "Sales Ledger Name": "Sales through Ecommerce";
  "Item Name": string;
  "Batch No.": "";
  "Expiry": "";
  "HSN Code": string;
  "Quantity": number;
  "Rate": number | "";          // Blank when the report has no unit price
  "Amount": number;             // Taxable value (pre-tax)
  "Taxes": number;
  "CGST Ledger Name": "Output CGST";
  "CGST Amount": number;
  "SGST Ledger Name": "Output SGST";
  "SGST Amount": number;
  "IGST Ledger Name": "Output IGST";
  "IGST Amount": number;
  "Total Amount": number;       // round2(Amount + Taxes)
  "Other Charges Ledger": "";
  "Other Charges Amount": "";
}

// Compile-time guard: TALLY_COLUMNS and TallyRow must name the same fields.
type MissingColumns = Exclude<keyof TallyRow, TallyColumn> | Exclude<TallyColumn, keyof TallyRow>;
const columnsMatchRow: [MissingColumns] extends [never] ? true : never = true;
void columnsMatchRow;

export type TallyCell = TallyRow[TallyColumn];

// ══ Source side ═════════════════════════════════════════════════════════════

export type CellValue = string | number | boolean | Date | null | undefined;

export type SourceRow = Record<string, CellValue>;

/**
 * A decoded report. Converters read each row through `columns` (the header
 * row, in order); row keys not listed there are ignored.
 */
export interface SourceTable {
  columns: string[];
  rows: SourceRow[];
}

export type MarketplaceTag = "amazon" | "flipkart" | "meesho" | "tcs" | "generic";

/**
 * One uploaded report. `tag` forces a converter; otherwise the file name decides.
 */
export interface SourceInput {
  name: string;
  table: SourceTable;
  tag?: MarketplaceTag;
}

export interface ConvertedTable {
  source: string;               // Marketplace label: "Amazon", "Generic", ...
  rows: TallyRow[];
}

// ══ Conversion result ═══════════════════════════════════════════════════════

export interface ConversionMetadata {
  generatedOn: string;          // "YYYY-MM-DD HH:mm:ss UTC"
  sourceFiles: string;          // Comma-joined, upload order
  sellerState: string;
}

export interface ConversionWarning {
  file: string;
  severity: "warn" | "info";
  source: string;               // Converter label that handled (or failed) the file
  message: string;
}

export interface ConversionResult {
  sales: TallyRow[];
  salesReturn: TallyRow[];      // Always empty: returns are not converted yet
  metadata: ConversionMetadata;
  warnings: ConversionWarning[];
}
