// en-IN display helpers for the CLI summary (lakh/crore digit grouping).

const inr = new Intl.NumberFormat("en-IN", {
  style: "currency",
  currency: "INR",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const grouped = new Intl.NumberFormat("en-IN");

/**
 * "₹10,00,000.00"
 */
export function formatInr(value: number): string {
  return inr.format(value);
}

/**
 * "1 row" / "1,500 rows"
 */
export function pluralize(count: number, noun: string): string {
  return `${grouped.format(count)} ${noun}${count === 1 ? "" : "s"}`;
}
