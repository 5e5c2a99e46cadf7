import type { BracketCeiling } from "../domain/rulesets/types.js";

const wholeMoneyFormatter = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 0,
  maximumFractionDigits: 0
});

export function formatBracketRange(min: number, max: BracketCeiling): string {
  if (max.kind === "unbounded") {
    return `${wholeMoneyFormatter.format(min)}+`;
  }

  return `${wholeMoneyFormatter.format(min)} - ${wholeMoneyFormatter.format(max.amount)}`;
}

/** Configured rates print without trailing zeros: `10%`, `12.5%`. */
export function formatRate(rate: number): string {
  return `${Number(rate.toFixed(2))}%`;
}

export function formatEffectiveRate(rate: number): string {
  return `${rate.toFixed(1)}%`;
}
