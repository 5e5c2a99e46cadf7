import { existsSync, readFileSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { logger } from "../../infrastructure/logger.js";
import { defaultTaxSettings } from "./defaults.js";
import {
  bounded,
  sortSchedule,
  unbounded,
  type StoredTaxBracket,
  type StoredTaxSettings,
  type TaxBracket,
  type TaxSchedule,
  type TaxSettings
} from "./types.js";

const storedBracketSchema = z.object({
  min: z.number().min(0),
  max: z.number().positive().nullable(),
  rate: z.number().min(0).max(100)
});

const storedSettingsSchema = z.object({
  tax_brackets: z.array(storedBracketSchema).min(1).optional(),
  ceo_tax_brackets: z.array(storedBracketSchema).min(1).optional(),
  ceo_salary_percent: z.number().min(0).max(100).optional()
});

function fromStoredBracket(bracket: StoredTaxBracket): TaxBracket {
  return {
    min: bracket.min,
    max: bracket.max === null ? unbounded : bounded(bracket.max),
    rate: bracket.rate
  };
}

function toStoredBracket(bracket: TaxBracket): StoredTaxBracket {
  return {
    min: bracket.min,
    max: bracket.max.kind === "bounded" ? bracket.max.amount : null,
    rate: bracket.rate
  };
}

function fromStoredSchedule(brackets: StoredTaxBracket[] | undefined, fallback: TaxSchedule): TaxSchedule {
  return brackets ? sortSchedule(brackets.map(fromStoredBracket)) : fallback;
}

export function toStoredSettings(settings: TaxSettings): StoredTaxSettings {
  return {
    tax_brackets: sortSchedule(settings.business).map(toStoredBracket),
    ceo_tax_brackets: sortSchedule(settings.individual).map(toStoredBracket),
    ceo_salary_percent: settings.derivedSalaryPercent
  };
}

/** Keys missing from the file fall back to the defaults one by one. */
export function parseStoredSettings(raw: unknown): TaxSettings {
  const stored = storedSettingsSchema.parse(raw);

  return {
    business: fromStoredSchedule(stored.tax_brackets, defaultTaxSettings.business),
    individual: fromStoredSchedule(stored.ceo_tax_brackets, defaultTaxSettings.individual),
    derivedSalaryPercent: stored.ceo_salary_percent ?? defaultTaxSettings.derivedSalaryPercent
  };
}

export function loadTaxSettings(filePath: string): TaxSettings {
  const absolutePath = path.resolve(process.cwd(), filePath);
  if (!existsSync(absolutePath)) {
    logger.info({ settingsFile: absolutePath }, "settings file not found, using default schedules");
    return defaultTaxSettings;
  }

  try {
    const contents = readFileSync(absolutePath, "utf8");
    return parseStoredSettings(JSON.parse(contents));
  } catch (error) {
    logger.warn({ settingsFile: absolutePath, error }, "could not read settings file, using default schedules");
    return defaultTaxSettings;
  }
}

export async function saveTaxSettings(filePath: string, settings: TaxSettings): Promise<void> {
  const absolutePath = path.resolve(process.cwd(), filePath);
  await mkdir(path.dirname(absolutePath), { recursive: true });
  await writeFile(absolutePath, `${JSON.stringify(toStoredSettings(settings), null, 2)}\n`, "utf8");
}
