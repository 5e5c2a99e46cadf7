export type ScheduleKind = "business" | "individual";

export const scheduleKinds = ["business", "individual"] as const satisfies readonly ScheduleKind[];

export type BracketCeiling = { kind: "bounded"; amount: number } | { kind: "unbounded" };

export interface TaxBracket {
  min: number;
  max: BracketCeiling;
  rate: number;
}

export type TaxSchedule = readonly TaxBracket[];

export interface TaxSettings {
  business: TaxSchedule;
  individual: TaxSchedule;
  derivedSalaryPercent: number;
}

/** Shape of a bracket in the settings file: `max: null` is the open top bracket. */
export interface StoredTaxBracket {
  min: number;
  max: number | null;
  rate: number;
}

export interface StoredTaxSettings {
  tax_brackets: StoredTaxBracket[];
  ceo_tax_brackets: StoredTaxBracket[];
  ceo_salary_percent: number;
}

export function bounded(amount: number): BracketCeiling {
  return { kind: "bounded", amount };
}

export const unbounded: BracketCeiling = { kind: "unbounded" };

export function ceilingOf(bracket: TaxBracket): number {
  return bracket.max.kind === "bounded" ? bracket.max.amount : Number.POSITIVE_INFINITY;
}

export function sortSchedule(schedule: TaxSchedule): TaxBracket[] {
  return [...schedule].sort((left, right) => left.min - right.min);
}
