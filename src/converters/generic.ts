/**
 * Fallback for reports from marketplaces without their own profile.
 * The chains are broader than any single marketplace's, down to a bare "id" / "date".
 */

import { createConverter, type SynonymProfile } from "./base";

export const GENERIC_PROFILE: SynonymProfile = {
  voucherPrefix: "GEN",
  customerPlaceholder: "Sale through Marketplace",
  fields: {
    voucherNo: ["invoice id", "order id", "id"],
    voucherDate: ["invoice date", "order date", "date"],
    buyerState: ["shipping state", "state", "ship state"],
    customerName: ["buyer name", "customer name"],
    gstNumber: ["buyer gstin", "gstin", "gst number", "gst no"],
    itemName: ["product title", "item name", "product name", "product"],
    hsn: ["hsn", "hsn code"],
    quantity: ["quantity", "qty"],
    rate: ["unit price", "price", "rate"],
    amount: ["taxable value", "amount", "item value"],
    taxAmount: ["tax amount", "tax", "gst amount"],
  },
};

export const genericConverter = createConverter("generic", "Generic", GENERIC_PROFILE);
