// TCS (Tax Collected at Source) recon reports and transporter statements.

import { createConverter, type SynonymProfile } from "./base";

export const TCS_PROFILE: SynonymProfile = {
  voucherPrefix: "TCS",
  customerPlaceholder: "Sale through TCS",
  fields: {
    voucherNo: ["voucher no", "invoice no", "txn id"],
    voucherDate: ["date", "voucher date"],
    buyerState: ["state", "buyer state"],
    customerName: ["customer name", "party name"],
    gstNumber: ["gstin", "buyer gstin"],
    itemName: ["item", "product"],
    hsn: ["hsn"],
    quantity: ["quantity"],
    rate: ["rate", "unit price"],
    amount: ["taxable value", "amount"],
    taxAmount: ["tax", "gst amount"],
  },
};

export const tcsConverter = createConverter("tcs", "TCS", TCS_PROFILE);
