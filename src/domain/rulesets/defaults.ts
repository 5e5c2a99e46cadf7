import { bounded, unbounded, type TaxSettings } from "./types.js";

export const defaultTaxSettings: TaxSettings = {
  business: [
    { min: 0, max: bounded(50000), rate: 10 },
    { min: 50000, max: bounded(100000), rate: 15 },
    { min: 100000, max: bounded(500000), rate: 20 },
    { min: 500000, max: unbounded, rate: 25 }
  ],
  individual: [
    { min: 0, max: bounded(10000), rate: 5 },
    { min: 10000, max: bounded(50000), rate: 10 },
    { min: 50000, max: bounded(100000), rate: 15 },
    { min: 100000, max: unbounded, rate: 20 }
  ],
  derivedSalaryPercent: 10
};
