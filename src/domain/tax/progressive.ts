import { percentOf } from "../../shared/money.js";
import { ceilingOf, sortSchedule, type TaxSchedule } from "../rulesets/types.js";
import type { BracketBreakdownEntry, ProgressiveTaxResult } from "./types.js";

/**
 * Applies each bracket's rate to the slice of `amount` that falls inside it.
 *
 * Brackets are visited by ascending `min`. A range left uncovered between two
 * brackets is not taxed; schedule owners are expected to keep brackets contiguous.
 */
export function computeProgressiveTax(amount: number, schedule: TaxSchedule): ProgressiveTaxResult {
  if (amount <= 0) {
    return {
      totalTax: 0,
      breakdown: []
    };
  }

  let total = 0;
  const breakdown: BracketBreakdownEntry[] = [];

  for (const bracket of sortSchedule(schedule)) {
    if (amount <= bracket.min) {
      continue;
    }

    const taxableSlice = Math.max(0, Math.min(amount, ceilingOf(bracket)) - bracket.min);
    if (taxableSlice <= 0) {
      continue;
    }

    const taxAmount = percentOf(taxableSlice, bracket.rate);
    total += taxAmount;
    breakdown.push({
      min: bracket.min,
      max: bracket.max,
      rate: bracket.rate,
      taxableSlice,
      taxAmount
    });
  }

  return {
    totalTax: total,
    breakdown
  };
}
