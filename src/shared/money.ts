// Amounts stay unrounded through the tax domain; rounding happens only when text is rendered.
const moneyFormatter = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2
});

export function formatMoney(amount: number): string {
  return moneyFormatter.format(amount);
}

export function percentOf(base: number, percent: number): number {
  return (base * percent) / 100;
}

export function effectiveRate(tax: number, base: number): number {
  return base === 0 ? 0 : (tax / base) * 100;
}

export function isPercent(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 100;
}
