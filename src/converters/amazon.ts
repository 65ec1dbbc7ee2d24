// Amazon B2B / B2C tax reports (MTR and the older hyphenated order exports).

import { createConverter, type SynonymProfile } from "./base";

export const AMAZON_PROFILE: SynonymProfile = {
  voucherPrefix: "AMZ",
  customerPlaceholder: "Sale through Amazon",
  fields: {
    voucherNo: ["invoice-id", "order-id", "invoice number", "order id"],
    voucherDate: ["invoice-date", "order-date", "invoice date", "order date"],
    buyerState: ["ship-state", "shipping state", "ship to state"],
    customerName: ["buyer-name", "buyer name"],
    gstNumber: ["buyer-gstin", "gstin", "customer bill to gstid"],
    itemName: ["product-name", "item name", "item description"],
    hsn: ["hsn", "hsn/sac"],
    quantity: ["quantity"],
    rate: ["price", "unit-price"],
    amount: ["taxable-value", "amount", "tax exclusive gross"],
    taxAmount: ["tax-amount", "gst-amount", "total tax amount"],
  },
};

export const amazonConverter = createConverter("amazon", "Amazon", AMAZON_PROFILE);
