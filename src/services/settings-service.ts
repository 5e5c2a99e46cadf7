import { loadTaxSettings, saveTaxSettings } from "../domain/rulesets/loader.js";
import { removeBracket, setDerivedSalaryPercent, upsertBracket } from "../domain/rulesets/mutations.js";
import type { ScheduleKind, TaxBracket, TaxSettings } from "../domain/rulesets/types.js";
import { KeyedLock } from "../shared/keyed-lock.js";
import { auditActions, writeAuditEvent, type AuditWriter } from "./audit-service.js";

export interface SettingsProvider {
  current(): TaxSettings;
}

export type SettingsPersister = (settings: TaxSettings) => Promise<void>;

export interface MutationContext {
  actorId: string;
  requestId?: string;
}

const SETTINGS_LOCK_KEY = "tax-settings";

/**
 * Holds the live schedules and derived salary rate. Every mutation is validated
 * first, then persisted, and only then becomes visible to calculations.
 */
export class SettingsService implements SettingsProvider {
  private settings: TaxSettings;
  private readonly lock = new KeyedLock();

  constructor(
    initial: TaxSettings,
    private readonly persist: SettingsPersister,
    private readonly audit: AuditWriter = writeAuditEvent
  ) {
    this.settings = initial;
  }

  static fromFile(filePath: string, audit?: AuditWriter): SettingsService {
    return new SettingsService(
      loadTaxSettings(filePath),
      (settings) => saveTaxSettings(filePath, settings),
      audit
    );
  }

  current(): TaxSettings {
    return this.settings;
  }

  async upsertBracket(kind: ScheduleKind, bracket: TaxBracket, context: MutationContext): Promise<TaxSettings> {
    return this.apply((settings) => upsertBracket(settings, kind, bracket), () =>
      this.audit({
        actorType: "ADMIN",
        actorId: context.actorId,
        action: auditActions.BRACKET_UPSERTED,
        entityType: "TaxSchedule",
        entityId: kind,
        requestId: context.requestId,
        payload: {
          min: bracket.min,
          max: bracket.max.kind === "bounded" ? bracket.max.amount : null,
          rate: bracket.rate
        }
      })
    );
  }

  async removeBracket(kind: ScheduleKind, min: number, context: MutationContext): Promise<TaxSettings> {
    return this.apply((settings) => removeBracket(settings, kind, min), () =>
      this.audit({
        actorType: "ADMIN",
        actorId: context.actorId,
        action: auditActions.BRACKET_REMOVED,
        entityType: "TaxSchedule",
        entityId: kind,
        requestId: context.requestId,
        payload: { min }
      })
    );
  }

  async setDerivedSalaryPercent(percent: number, context: MutationContext): Promise<TaxSettings> {
    return this.apply((settings) => setDerivedSalaryPercent(settings, percent), () =>
      this.audit({
        actorType: "ADMIN",
        actorId: context.actorId,
        action: auditActions.DERIVED_SALARY_UPDATED,
        entityType: "DerivedSalaryPolicy",
        requestId: context.requestId,
        payload: { percent }
      })
    );
  }

  private async apply(mutate: (settings: TaxSettings) => TaxSettings, onApplied: () => void): Promise<TaxSettings> {
    return this.lock.run(SETTINGS_LOCK_KEY, async () => {
      const next = mutate(this.settings);
      await this.persist(next);
      this.settings = next;
      onApplied();
      return next;
    });
  }
}
