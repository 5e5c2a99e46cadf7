import type { Logger } from "pino";

import { advance } from "../domain/conversation/machine.js";
import { greeting, REFUSAL_MESSAGE } from "../domain/conversation/prompts.js";
import type { SessionStore } from "../domain/conversation/session-store.js";
import type { TurnAction } from "../domain/conversation/types.js";
import { logger } from "../infrastructure/logger.js";
import { KeyedLock } from "../shared/keyed-lock.js";
import { auditActions, writeAuditEvent, type AuditWriter } from "./audit-service.js";
import type { LoanNotifier } from "./notification-service.js";
import type { SettingsProvider } from "./settings-service.js";

export interface ConversationServiceOptions {
  store: SessionStore;
  settings: SettingsProvider;
  notifier: LoanNotifier;
  tellerName: string;
  managerRoleId?: string | null;
  includeDerivedSalary?: boolean;
  lock?: KeyedLock;
  audit?: AuditWriter;
  log?: Logger;
}

export type CancelOutcome = "CANCELLED" | "REFUSED" | "NOT_FOUND";

export class ConversationService {
  readonly tellerName: string;
  private readonly store: SessionStore;
  private readonly settings: SettingsProvider;
  private readonly notifier: LoanNotifier;
  private readonly managerRoleId: string | null;
  private readonly includeDerivedSalary: boolean;
  private readonly lock: KeyedLock;
  private readonly audit: AuditWriter;
  private readonly log: Logger;

  constructor(options: ConversationServiceOptions) {
    this.store = options.store;
    this.settings = options.settings;
    this.notifier = options.notifier;
    this.tellerName = options.tellerName;
    this.managerRoleId = options.managerRoleId ?? null;
    this.includeDerivedSalary = options.includeDerivedSalary ?? false;
    this.lock = options.lock ?? new KeyedLock();
    this.audit = options.audit ?? writeAuditEvent;
    this.log = (options.log ?? logger).child({ component: "conversation" });
  }

  /**
   * Starts the guided conversation and returns the greeting. A live session can
   * only be restarted by its owner or an override-authorized actor, and a restart
   * keeps the existing owner.
   */
  async begin(conversationId: string, actorId: string, isOverrideAuthorized = false): Promise<TurnAction> {
    return this.lock.run<TurnAction>(conversationId, () => {
      const existing = this.store.get(conversationId);
      if (existing && existing.ownerId !== actorId && !isOverrideAuthorized) {
        this.audit({
          actorType: "USER",
          actorId,
          action: auditActions.CONVERSATION_REFUSED,
          entityType: "Conversation",
          entityId: conversationId
        });
        return {
          type: "REFUSED",
          text: REFUSAL_MESSAGE
        };
      }

      const ownerId = existing?.ownerId ?? actorId;
      this.store.create(conversationId, ownerId);
      this.audit({
        actorType: ownerId === actorId ? "USER" : "ADMIN",
        actorId,
        action: auditActions.CONVERSATION_STARTED,
        entityType: "Conversation",
        entityId: conversationId
      });

      return {
        type: "PROMPT",
        text: greeting(this.tellerName)
      };
    });
  }

  /**
   * Runs one inbound turn. Returns `null` when the conversation has no live
   * session (never started, finished or idle-expired).
   */
  async onTurn(
    conversationId: string,
    actorId: string,
    rawText: string,
    isOverrideAuthorized: boolean
  ): Promise<TurnAction | null> {
    const action = await this.lock.run(conversationId, () => this.step(conversationId, actorId, rawText, isOverrideAuthorized));

    if (action?.type === "LOAN_READY") {
      try {
        await this.notifier.notifyLoanRequest(conversationId, action.record);
      } catch (error) {
        this.log.error({ conversationId, error }, "loan notification failed");
      }
    }

    return action;
  }

  async cancel(conversationId: string, actorId: string, isOverrideAuthorized: boolean): Promise<CancelOutcome> {
    return this.lock.run<CancelOutcome>(conversationId, () => {
      const session = this.store.get(conversationId);
      if (!session) {
        return "NOT_FOUND";
      }

      if (session.ownerId !== actorId && !isOverrideAuthorized) {
        return "REFUSED";
      }

      this.store.remove(conversationId);
      this.audit({
        actorType: isOverrideAuthorized ? "ADMIN" : "USER",
        actorId,
        action: auditActions.CONVERSATION_CANCELLED,
        entityType: "Conversation",
        entityId: conversationId
      });
      return "CANCELLED";
    });
  }

  /** Removes idle sessions, leaving alone any conversation with a turn in flight. */
  sweepExpired(): string[] {
    const removed = this.store.sweepExpired((conversationId) => this.lock.isLocked(conversationId));
    if (removed.length > 0) {
      this.audit({
        actorType: "SYSTEM",
        action: auditActions.SESSIONS_SWEPT,
        entityType: "Conversation",
        payload: { removed }
      });
    }

    return removed;
  }

  private step(conversationId: string, actorId: string, rawText: string, isOverrideAuthorized: boolean): TurnAction | null {
    const session = this.store.get(conversationId);
    if (!session) {
      return null;
    }

    if (session.ownerId !== actorId && !isOverrideAuthorized) {
      this.audit({
        actorType: "USER",
        actorId,
        action: auditActions.CONVERSATION_REFUSED,
        entityType: "Conversation",
        entityId: conversationId
      });
      return {
        type: "REFUSED",
        text: REFUSAL_MESSAGE
      };
    }

    this.store.touch(session);
    const transition = advance(session.state, rawText, {
      actorId,
      settings: this.settings.current(),
      includeDerivedSalary: this.includeDerivedSalary,
      managerRoleId: this.managerRoleId
    });

    this.log.debug(
      { conversationId, actorId, from: session.state.kind, to: transition.state.kind, action: transition.action.type },
      "conversation turn"
    );
    session.state = transition.state;

    if (transition.state.kind === "FINISHED") {
      this.store.remove(conversationId);
      this.audit({
        actorType: session.ownerId === actorId ? "USER" : "ADMIN",
        actorId,
        action: auditActions.CONVERSATION_FINISHED,
        entityType: "Conversation",
        entityId: conversationId,
        payload: { outcome: transition.action.type }
      });
    }

    return transition.action;
  }
}
