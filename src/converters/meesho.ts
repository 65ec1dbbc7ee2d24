// Meesho supplier GST reports use snake_case headers (sub_order_num, end_customer_state, ...).
// The "_new" state column is Meesho's corrected value and wins over end_customer_state.

import { createConverter, type SynonymProfile } from "./base";

export const MEESHO_PROFILE: SynonymProfile = {
  voucherPrefix: "MSH",
  customerPlaceholder: "Sale through Meesho",
  fields: {
    voucherNo: ["sub_order_num", "sub order no", "order_num", "order id"],
    voucherDate: ["order_date", "order date", "invoice date"],
    buyerState: ["end_customer_state_new", "end_customer_state", "customer state", "state"],
    customerName: ["customer name", "buyer name"],
    gstNumber: ["gstin", "buyer gstin"],
    itemName: ["product name", "product_name", "sku"],
    hsn: ["hsn_code", "hsn code", "hsn"],
    quantity: ["quantity"],
    rate: ["unit price", "price"],
    amount: ["tcs_taxable_amount", "taxable value", "total_taxable_sale_value"],
    taxAmount: ["gst_amount", "tax amount"],
  },
};

export const meeshoConverter = createConverter("meesho", "Meesho", MEESHO_PROFILE);
