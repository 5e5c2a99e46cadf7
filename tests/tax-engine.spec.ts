import { describe, expect, it } from "vitest";

import { defaultTaxSettings } from "../src/domain/rulesets/defaults.js";
import { bounded, unbounded, type TaxSchedule } from "../src/domain/rulesets/types.js";
import { computeBusinessReport } from "../src/domain/tax/calculator.js";
import { computeProgressiveTax } from "../src/domain/tax/progressive.js";
import { CalculationError } from "../src/shared/errors.js";
import { effectiveRate } from "../src/shared/money.js";

describe("progressive tax", () => {
  const business = defaultTaxSettings.business;

  it("taxes each slice of the amount at its bracket rate", () => {
    const result = computeProgressiveTax(75000, business);

    expect(result.totalTax).toBe(8750);
    expect(result.breakdown).toEqual([
      { min: 0, max: bounded(50000), rate: 10, taxableSlice: 50000, taxAmount: 5000 },
      { min: 50000, max: bounded(100000), rate: 15, taxableSlice: 25000, taxAmount: 3750 }
    ]);
  });

  it("returns no tax and no breakdown for zero or negative amounts", () => {
    expect(computeProgressiveTax(0, business)).toEqual({ totalTax: 0, breakdown: [] });
    expect(computeProgressiveTax(-2500, business)).toEqual({ totalTax: 0, breakdown: [] });
  });

  it("stops at a bracket boundary without opening the next bracket", () => {
    const result = computeProgressiveTax(50000, business);

    expect(result.totalTax).toBe(5000);
    expect(result.breakdown).toHaveLength(1);
  });

  it("applies the open top bracket to everything above its minimum", () => {
    const result = computeProgressiveTax(600000, business);

    expect(result.totalTax).toBe(117500);
    expect(result.breakdown[3]).toEqual({
      min: 500000,
      max: unbounded,
      rate: 25,
      taxableSlice: 100000,
      taxAmount: 25000
    });
  });

  it("leaves gaps between brackets untaxed", () => {
    const gapped: TaxSchedule = [
      { min: 20000, max: unbounded, rate: 20 },
      { min: 0, max: bounded(10000), rate: 10 }
    ];

    const result = computeProgressiveTax(30000, gapped);

    expect(result.totalTax).toBe(3000);
    expect(result.breakdown.map((entry) => entry.taxableSlice)).toEqual([10000, 10000]);
  });

  it("keeps fractions of a cent in each bracket and in the total", () => {
    const result = computeProgressiveTax(33.33, [{ min: 0, max: unbounded, rate: 15 }]);

    expect(result.totalTax).toBeCloseTo(4.9995, 10);
    expect(result.breakdown[0]?.taxAmount).toBeCloseTo(4.9995, 10);
  });

  it("gives the same answer on repeated calls", () => {
    expect(computeProgressiveTax(123456.78, business)).toEqual(computeProgressiveTax(123456.78, business));
  });
});

describe("business report", () => {
  it("computes business tax on net profit", () => {
    const report = computeBusinessReport({
      grossRevenue: 100000,
      expenses: 20000,
      settings: defaultTaxSettings,
      includeDerivedSalary: false
    });

    expect(report).toMatchObject({
      taxApplies: true,
      netProfit: 80000,
      businessTax: 9500,
      profitAfterTax: 70500,
      includeDerivedSalary: false,
      grossDerived: 0,
      finalRetained: 70500
    });
    if (!report.taxApplies) {
      throw new Error("expected a taxed report");
    }
    expect(report.businessEffectiveRate).toBeCloseTo(11.875, 10);
  });

  it("draws the derived salary from post-tax profit and taxes it on the individual schedule", () => {
    const report = computeBusinessReport({
      grossRevenue: 100000,
      expenses: 20000,
      settings: defaultTaxSettings,
      includeDerivedSalary: true
    });

    expect(report).toMatchObject({
      derivedSalaryPercent: 10,
      grossDerived: 7050,
      derivedTax: 352.5,
      netDerived: 6697.5,
      finalRetained: 63450
    });
    if (!report.taxApplies) {
      throw new Error("expected a taxed report");
    }
    expect(report.derivedEffectiveRate).toBeCloseTo(5, 10);
    expect(report.derivedBreakdown).toHaveLength(1);
  });

  it("uses a per-call salary percent over the configured one", () => {
    const report = computeBusinessReport({
      grossRevenue: 100000,
      expenses: 20000,
      settings: defaultTaxSettings,
      includeDerivedSalary: true,
      derivedSalaryPercent: 20
    });

    expect(report).toMatchObject({
      derivedSalaryPercent: 20,
      grossDerived: 14100,
      derivedTax: 910,
      netDerived: 13190,
      finalRetained: 56400
    });
  });

  it("does not round revenue or expenses before taxing", () => {
    const report = computeBusinessReport({
      grossRevenue: 100.004,
      expenses: 0,
      settings: defaultTaxSettings,
      includeDerivedSalary: false
    });

    expect(report.netProfit).toBe(100.004);
    if (!report.taxApplies) {
      throw new Error("expected a taxed report");
    }
    expect(report.businessTax).toBeCloseTo(10.0004, 10);
  });

  it("skips tax when there is no profit", () => {
    const report = computeBusinessReport({
      grossRevenue: 1000,
      expenses: 1500,
      settings: defaultTaxSettings,
      includeDerivedSalary: true
    });

    expect(report).toEqual({
      taxApplies: false,
      grossRevenue: 1000,
      expenses: 1500,
      netProfit: -500
    });
  });

  it("rejects a salary percent outside 0 to 100", () => {
    expect(() =>
      computeBusinessReport({
        grossRevenue: 1000,
        expenses: 0,
        settings: defaultTaxSettings,
        includeDerivedSalary: true,
        derivedSalaryPercent: 150
      })
    ).toThrowError(CalculationError);
  });

  it("reports a zero effective rate on a zero base", () => {
    expect(effectiveRate(0, 0)).toBe(0);
  });
});
