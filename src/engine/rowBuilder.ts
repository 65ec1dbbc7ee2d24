import type { GstType, TallyRow } from "../types/canonical";
import { round2 } from "./normalize";

export const SUNDRY_DEBTORS_GROUP = "Sundry Debtors";
export const ECOMMERCE_SALES_LEDGER = "Sales through Ecommerce";
export const CGST_LEDGER = "Output CGST";
export const SGST_LEDGER = "Output SGST";
export const IGST_LEDGER = "Output IGST";

/**
 * Values a converter has already extracted for one line item.
 */
export interface RowFields {
  voucherNo: string;
  voucherDate: string;
  customerName: string;
  state: string;
  gstType: GstType;
  gstNumber: string;
  itemName: string;
  hsn: string;
  quantity: number;
  rate: number | "";
  amount: number;
  taxAmount: number;
  cgst: number;
  sgst: number;
  igst: number;
}

/**
 * Assemble one Tally voucher row. Keys are written in TALLY_COLUMNS order.
 * No validation: the only derived value is Total Amount.
 */
export function buildRow(f: RowFields): TallyRow {
  return {
    "Voucher No": f.voucherNo,
    "Voucher Date": f.voucherDate,
    "Customer Name": f.customerName,
    "Group": SUNDRY_DEBTORS_GROUP,
    "Address": f.state,
    "State": f.state,
    "GST Type": f.gstType,
    "GST Number": f.gstNumber,
    "Sales Ledger Name": ECOMMERCE_SALES_LEDGER,
    "Item Name": f.itemName,
    "Batch No.": "",
    "Expiry": "",
    "HSN Code": f.hsn,
    "Quantity": f.quantity,
    "Rate": f.rate,
    "Amount": f.amount,
    "Taxes": f.taxAmount,
    "CGST Ledger Name": CGST_LEDGER,
    "CGST Amount": f.cgst,
    "SGST Ledger Name": SGST_LEDGER,
    "SGST Amount": f.sgst,
    "IGST Ledger Name": IGST_LEDGER,
    "IGST Amount": f.igst,
    "Total Amount": round2(f.amount + f.taxAmount),
    "Other Charges Ledger": "",
    "Other Charges Amount": "",
  };
}
