import { createConverter, type SynonymProfile } from "./base";

export const FLIPKART_PROFILE: SynonymProfile = {
  voucherPrefix: "FK",
  customerPlaceholder: "Sale through Flipkart",
  fields: {
    voucherNo: ["invoice number", "invoice-no", "buyer invoice id", "order id"],
    voucherDate: ["invoice date", "order date", "buyer invoice date"],
    buyerState: ["shipping state", "ship-to-state", "customer's delivery state"],
    customerName: ["customer name", "buyer name"],
    gstNumber: ["buyer gstin", "gstin"],
    itemName: ["item name", "product name", "sku", "product title/description"],
    hsn: ["hsn", "hsn code"],
    quantity: ["quantity", "item quantity"],
    rate: ["unit price", "price"],
    amount: ["taxable value", "amount"],
    taxAmount: ["tax amount", "gst amount"],
  },
};

export const flipkartConverter = createConverter("flipkart", "Flipkart", FLIPKART_PROFILE);
