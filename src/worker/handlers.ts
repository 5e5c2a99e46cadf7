import { logger } from "../infrastructure/logger.js";
import type { ConversationService } from "../services/conversation-service.js";

export async function handleSweepExpiredSessions(conversations: ConversationService) {
  const removed = conversations.sweepExpired();
  if (removed.length > 0) {
    logger.info({ removedCount: removed.length }, "sweep_expired_sessions removed idle sessions");
  }

  return {
    removedCount: removed.length
  };
}
