import type { BracketCeiling, TaxSettings } from "../rulesets/types.js";

export interface BracketBreakdownEntry {
  min: number;
  max: BracketCeiling;
  rate: number;
  taxableSlice: number;
  taxAmount: number;
}

export interface ProgressiveTaxResult {
  totalTax: number;
  breakdown: BracketBreakdownEntry[];
}

export interface BusinessReportInput {
  grossRevenue: number;
  expenses: number;
  settings: TaxSettings;
  includeDerivedSalary: boolean;
  /** Overrides `settings.derivedSalaryPercent` for this calculation only. */
  derivedSalaryPercent?: number;
}

interface ReportBase {
  grossRevenue: number;
  expenses: number;
  netProfit: number;
}

export interface NoTaxReport extends ReportBase {
  taxApplies: false;
}

export interface TaxedReport extends ReportBase {
  taxApplies: true;
  businessTax: number;
  businessBreakdown: BracketBreakdownEntry[];
  businessEffectiveRate: number;
  profitAfterTax: number;
  includeDerivedSalary: boolean;
  derivedSalaryPercent: number;
  grossDerived: number;
  derivedTax: number;
  derivedBreakdown: BracketBreakdownEntry[];
  derivedEffectiveRate: number;
  netDerived: number;
  finalRetained: number;
}

export type BusinessReport = NoTaxReport | TaxedReport;
