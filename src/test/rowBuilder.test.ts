import { describe, it, expect } from "vitest";
import { buildRow, type RowFields } from "../engine/rowBuilder";
import { TALLY_COLUMNS } from "../types/canonical";

const fields: RowFields = {
  voucherNo: "INV-1",
  voucherDate: "2024-01-15",
  customerName: "Asha Stores",
  state: "Goa",
  gstType: "Unregistered",
  gstNumber: "",
  itemName: "Cotton Tee",
  hsn: "6109",
  quantity: 2,
  rate: 250.1,
  amount: 500.2,
  taxAmount: 90.04,
  cgst: 45.02,
  sgst: 45.02,
  igst: 0,
};

describe("buildRow", () => {
  it("writes every Tally column in order", () => {
    expect(Object.keys(buildRow(fields))).toEqual([...TALLY_COLUMNS]);
  });

  it("fills ledger constants and placeholders", () => {
    const row = buildRow(fields);
    expect(row["Group"]).toBe("Sundry Debtors");
    expect(row["Sales Ledger Name"]).toBe("Sales through Ecommerce");
    expect(row["CGST Ledger Name"]).toBe("Output CGST");
    expect(row["SGST Ledger Name"]).toBe("Output SGST");
    expect(row["IGST Ledger Name"]).toBe("Output IGST");
    expect(row["Batch No."]).toBe("");
    expect(row["Expiry"]).toBe("");
    expect(row["Other Charges Ledger"]).toBe("");
    expect(row["Other Charges Amount"]).toBe("");
  });

  it("uses the buyer state for both Address and State", () => {
    const row = buildRow(fields);
    expect(row["Address"]).toBe("Goa");
    expect(row["State"]).toBe("Goa");
  });

  it("rounds the total of amount and tax", () => {
    expect(buildRow(fields)["Total Amount"]).toBe(590.24);
  });

  it("does not validate its inputs", () => {
    const row = buildRow({ ...fields, voucherNo: "", rate: "", amount: -10, taxAmount: 0 });
    expect(row["Voucher No"]).toBe("");
    expect(row["Rate"]).toBe("");
    expect(row["Total Amount"]).toBe(-10);
  });
});
