import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ZodError } from "zod";

import { defaultTaxSettings } from "../src/domain/rulesets/defaults.js";
import { loadTaxSettings, parseStoredSettings, saveTaxSettings, toStoredSettings } from "../src/domain/rulesets/loader.js";
import { removeBracket, setDerivedSalaryPercent, upsertBracket } from "../src/domain/rulesets/mutations.js";
import { bounded, unbounded, type TaxSettings } from "../src/domain/rulesets/types.js";
import { auditActions } from "../src/services/audit-service.js";
import { SettingsService } from "../src/services/settings-service.js";
import { ConfigurationError } from "../src/shared/errors.js";

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }

  throw new Error("expected the call to throw");
}

describe("schedule mutations", () => {
  it("replaces the bracket that starts at the same minimum", () => {
    const updated = upsertBracket(defaultTaxSettings, "business", { min: 0, max: bounded(50000), rate: 12 });

    expect(updated.business[0]).toEqual({ min: 0, max: bounded(50000), rate: 12 });
    expect(updated.business).toHaveLength(4);
    expect(defaultTaxSettings.business[0]?.rate).toBe(10);
  });

  it("keeps brackets ordered after adding one", () => {
    const trimmed = removeBracket(defaultTaxSettings, "business", 500000);
    const extended = upsertBracket(trimmed, "business", { min: 500000, max: unbounded, rate: 30 });

    expect(trimmed.business).toHaveLength(3);
    expect(extended.business.map((bracket) => bracket.min)).toEqual([0, 50000, 100000, 500000]);
    expect(extended.business[3]?.rate).toBe(30);
  });

  it("rejects overlapping brackets", () => {
    const error = captureError(() =>
      upsertBracket(defaultTaxSettings, "business", { min: 40000, max: bounded(60000), rate: 12 })
    );

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ code: "BRACKET_OVERLAP", details: { schedule: "business", conflictingMin: 0 } });
  });

  it("rejects out-of-range rates and inverted bounds", () => {
    expect(
      captureError(() => upsertBracket(defaultTaxSettings, "individual", { min: 0, max: bounded(10000), rate: 101 }))
    ).toMatchObject({ code: "RATE_OUT_OF_RANGE" });
    expect(
      captureError(() => upsertBracket(defaultTaxSettings, "individual", { min: 5000, max: bounded(5000), rate: 5 }))
    ).toMatchObject({ code: "BRACKET_BOUNDS_INVALID" });
    expect(captureError(() => setDerivedSalaryPercent(defaultTaxSettings, -1))).toMatchObject({
      code: "RATE_OUT_OF_RANGE"
    });
  });

  it("refuses to remove a missing bracket or the last bracket", () => {
    const single: TaxSettings = {
      ...defaultTaxSettings,
      individual: [{ min: 0, max: unbounded, rate: 5 }]
    };

    expect(captureError(() => removeBracket(defaultTaxSettings, "business", 123))).toMatchObject({
      code: "BRACKET_NOT_FOUND"
    });
    expect(captureError(() => removeBracket(single, "individual", 0))).toMatchObject({
      code: "SCHEDULE_WOULD_BE_EMPTY"
    });
  });
});

describe("settings file", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(os.tmpdir(), "teller-settings-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("falls back to the defaults key by key", () => {
    const settings = parseStoredSettings({ ceo_salary_percent: 15 });

    expect(settings.business).toEqual(defaultTaxSettings.business);
    expect(settings.individual).toEqual(defaultTaxSettings.individual);
    expect(settings.derivedSalaryPercent).toBe(15);
  });

  it("reads a null maximum as the open top bracket", () => {
    const settings = parseStoredSettings({ tax_brackets: [{ min: 0, max: null, rate: 5 }] });

    expect(settings.business).toEqual([{ min: 0, max: unbounded, rate: 5 }]);
  });

  it("rejects an empty schedule", () => {
    expect(() => parseStoredSettings({ tax_brackets: [] })).toThrowError(ZodError);
  });

  it("stores the open top bracket with a null maximum", () => {
    expect(toStoredSettings(defaultTaxSettings).tax_brackets[3]).toEqual({ min: 500000, max: null, rate: 25 });
  });

  it("uses the defaults when the file is missing or malformed", async () => {
    const malformed = path.join(directory, "broken.json");
    await writeFile(malformed, "{ not json", "utf8");

    expect(loadTaxSettings(path.join(directory, "missing.json"))).toEqual(defaultTaxSettings);
    expect(loadTaxSettings(malformed)).toEqual(defaultTaxSettings);
  });

  it("writes settings that load back unchanged", async () => {
    const filePath = path.join(directory, "nested", "settings.json");
    const updated = setDerivedSalaryPercent(defaultTaxSettings, 12.5);

    await saveTaxSettings(filePath, updated);

    expect(loadTaxSettings(filePath)).toEqual(updated);
    const stored = JSON.parse(await readFile(filePath, "utf8"));
    expect(stored.ceo_salary_percent).toBe(12.5);
  });
});

describe("settings service", () => {
  it("persists before the new settings become visible", async () => {
    const persisted: TaxSettings[] = [];
    const audit = vi.fn();
    const service = new SettingsService(
      defaultTaxSettings,
      async (settings) => {
        persisted.push(settings);
      },
      audit
    );

    const updated = await service.upsertBracket(
      "business",
      { min: 0, max: bounded(50000), rate: 11 },
      { actorId: "admin-1", requestId: "req-1" }
    );

    expect(service.current()).toBe(updated);
    expect(persisted).toEqual([updated]);
    expect(audit).toHaveBeenCalledWith(
      expect.objectContaining({
        action: auditActions.BRACKET_UPSERTED,
        actorId: "admin-1",
        entityId: "business",
        requestId: "req-1"
      })
    );
  });

  it("keeps the previous settings when persisting fails", async () => {
    const service = new SettingsService(
      defaultTaxSettings,
      async () => {
        throw new Error("disk full");
      },
      vi.fn()
    );

    await expect(service.setDerivedSalaryPercent(20, { actorId: "admin-1" })).rejects.toThrowError("disk full");
    expect(service.current()).toBe(defaultTaxSettings);
  });

  it("keeps the previous settings when validation fails", async () => {
    const persist = vi.fn(async () => undefined);
    const service = new SettingsService(defaultTaxSettings, persist, vi.fn());

    await expect(service.removeBracket("individual", 42, { actorId: "admin-1" })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    expect(persist).not.toHaveBeenCalled();
    expect(service.current()).toBe(defaultTaxSettings);
  });

  it("applies concurrent mutations one after another", async () => {
    const service = new SettingsService(defaultTaxSettings, async () => undefined, vi.fn());

    await Promise.all([
      service.upsertBracket("business", { min: 0, max: bounded(50000), rate: 11 }, { actorId: "admin-1" }),
      service.setDerivedSalaryPercent(12, { actorId: "admin-2" })
    ]);

    expect(service.current().business[0]?.rate).toBe(11);
    expect(service.current().derivedSalaryPercent).toBe(12);
  });
});
