import { CalculationError } from "../../shared/errors.js";
import { effectiveRate, isPercent, percentOf } from "../../shared/money.js";
import { computeProgressiveTax } from "./progressive.js";
import type { BusinessReport, BusinessReportInput } from "./types.js";

function resolveDerivedSalaryPercent(input: BusinessReportInput): number {
  const percent = input.derivedSalaryPercent ?? input.settings.derivedSalaryPercent;
  if (!isPercent(percent)) {
    throw new CalculationError("SALARY_PERCENT_OUT_OF_RANGE", "Derived salary percent must be between 0 and 100.");
  }

  return percent;
}

/**
 * Two-stage computation: business tax on net profit, then an optional salary
 * drawn as a percentage of post-tax profit and taxed on the individual schedule.
 */
export function computeBusinessReport(input: BusinessReportInput): BusinessReport {
  const derivedSalaryPercent = resolveDerivedSalaryPercent(input);
  const { grossRevenue, expenses } = input;
  const netProfit = grossRevenue - expenses;

  if (netProfit <= 0) {
    return {
      taxApplies: false,
      grossRevenue,
      expenses,
      netProfit
    };
  }

  const business = computeProgressiveTax(netProfit, input.settings.business);
  const profitAfterTax = netProfit - business.totalTax;

  if (!input.includeDerivedSalary) {
    return {
      taxApplies: true,
      grossRevenue,
      expenses,
      netProfit,
      businessTax: business.totalTax,
      businessBreakdown: business.breakdown,
      businessEffectiveRate: effectiveRate(business.totalTax, netProfit),
      profitAfterTax,
      includeDerivedSalary: false,
      derivedSalaryPercent,
      grossDerived: 0,
      derivedTax: 0,
      derivedBreakdown: [],
      derivedEffectiveRate: 0,
      netDerived: 0,
      finalRetained: profitAfterTax
    };
  }

  const grossDerived = percentOf(profitAfterTax, derivedSalaryPercent);
  const derived = computeProgressiveTax(grossDerived, input.settings.individual);

  return {
    taxApplies: true,
    grossRevenue,
    expenses,
    netProfit,
    businessTax: business.totalTax,
    businessBreakdown: business.breakdown,
    businessEffectiveRate: effectiveRate(business.totalTax, netProfit),
    profitAfterTax,
    includeDerivedSalary: true,
    derivedSalaryPercent,
    grossDerived,
    derivedTax: derived.totalTax,
    derivedBreakdown: derived.breakdown,
    derivedEffectiveRate: effectiveRate(derived.totalTax, grossDerived),
    netDerived: grossDerived - derived.totalTax,
    finalRetained: profitAfterTax - grossDerived
  };
}
