import { ConfigurationError } from "../../shared/errors.js";
import { isPercent } from "../../shared/money.js";
import { ceilingOf, sortSchedule, type ScheduleKind, type TaxBracket, type TaxSchedule, type TaxSettings } from "./types.js";

function assertValidBracket(bracket: TaxBracket): void {
  if (!isPercent(bracket.rate)) {
    throw new ConfigurationError("RATE_OUT_OF_RANGE", "Bracket rate must be between 0 and 100.", {
      rate: bracket.rate
    });
  }

  if (!Number.isFinite(bracket.min) || bracket.min < 0) {
    throw new ConfigurationError("BRACKET_BOUNDS_INVALID", "Bracket minimum must be zero or greater.", {
      min: bracket.min
    });
  }

  if (bracket.max.kind === "bounded" && (!Number.isFinite(bracket.max.amount) || bracket.max.amount <= bracket.min)) {
    throw new ConfigurationError("BRACKET_BOUNDS_INVALID", "Bracket maximum must be greater than its minimum.", {
      min: bracket.min,
      max: bracket.max.amount
    });
  }
}

function withSchedule(settings: TaxSettings, kind: ScheduleKind, schedule: TaxSchedule): TaxSettings {
  return kind === "business" ? { ...settings, business: schedule } : { ...settings, individual: schedule };
}

function overlaps(left: TaxBracket, right: TaxBracket): boolean {
  return left.min < ceilingOf(right) && right.min < ceilingOf(left);
}

/** Adds the bracket, or replaces the one that starts at the same minimum. */
export function upsertBracket(settings: TaxSettings, kind: ScheduleKind, bracket: TaxBracket): TaxSettings {
  assertValidBracket(bracket);

  const others = settings[kind].filter((existing) => existing.min !== bracket.min);
  const conflict = others.find((existing) => overlaps(existing, bracket));
  if (conflict) {
    throw new ConfigurationError("BRACKET_OVERLAP", "Bracket overlaps an existing bracket.", {
      schedule: kind,
      conflictingMin: conflict.min
    });
  }

  return withSchedule(settings, kind, sortSchedule([...others, bracket]));
}

export function removeBracket(settings: TaxSettings, kind: ScheduleKind, min: number): TaxSettings {
  const schedule = settings[kind];
  if (!schedule.some((bracket) => bracket.min === min)) {
    throw new ConfigurationError("BRACKET_NOT_FOUND", `No ${kind} bracket starts at ${min}.`, {
      schedule: kind,
      min
    });
  }

  if (schedule.length <= 1) {
    throw new ConfigurationError("SCHEDULE_WOULD_BE_EMPTY", "A schedule must keep at least one bracket.", {
      schedule: kind
    });
  }

  return withSchedule(
    settings,
    kind,
    schedule.filter((bracket) => bracket.min !== min)
  );
}

export function setDerivedSalaryPercent(settings: TaxSettings, percent: number): TaxSettings {
  if (!isPercent(percent)) {
    throw new ConfigurationError("RATE_OUT_OF_RANGE", "Derived salary percent must be between 0 and 100.", {
      percent
    });
  }

  return {
    ...settings,
    derivedSalaryPercent: percent
  };
}
