import type { Logger } from "pino";

import { logger } from "../infrastructure/logger.js";

export const auditActions = {
  CONVERSATION_STARTED: "CONVERSATION_STARTED",
  CONVERSATION_FINISHED: "CONVERSATION_FINISHED",
  CONVERSATION_CANCELLED: "CONVERSATION_CANCELLED",
  CONVERSATION_REFUSED: "CONVERSATION_REFUSED",
  SESSIONS_SWEPT: "SESSIONS_SWEPT",
  BRACKET_UPSERTED: "BRACKET_UPSERTED",
  BRACKET_REMOVED: "BRACKET_REMOVED",
  DERIVED_SALARY_UPDATED: "DERIVED_SALARY_UPDATED"
} as const;

export type AuditAction = (typeof auditActions)[keyof typeof auditActions];

export interface AuditInput {
  actorType: "USER" | "ADMIN" | "SYSTEM";
  actorId?: string | null;
  action: AuditAction;
  entityType: string;
  entityId?: string | null;
  requestId?: string | null;
  payload?: Record<string, unknown>;
}

export type AuditWriter = (input: AuditInput) => void;

export function createAuditWriter(log: Logger = logger): AuditWriter {
  const audit = log.child({ channel: "audit" });

  return (input) => {
    audit.info(
      {
        actorType: input.actorType,
        actorId: input.actorId ?? null,
        action: input.action,
        entityType: input.entityType,
        entityId: input.entityId ?? null,
        requestId: input.requestId ?? null,
        payload: input.payload ?? null
      },
      "audit event"
    );
  };
}

export const writeAuditEvent: AuditWriter = createAuditWriter();
