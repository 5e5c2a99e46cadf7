import { env } from "../config/env.js";
import { logger } from "../infrastructure/logger.js";
import type { ConversationService } from "../services/conversation-service.js";
import { handleSweepExpiredSessions } from "./handlers.js";
import { createQueue, createWorker, queueNames } from "./queues.js";

export interface SessionSweeper {
  close(): Promise<void>;
}

/**
 * Schedules the idle-session sweep and runs its worker in this process. Sessions
 * live in memory, so the worker must share the process with the HTTP server.
 */
export async function startSessionSweeper(conversations: ConversationService): Promise<SessionSweeper> {
  const queue = createQueue(queueNames.sweepExpiredSessions);
  const worker = createWorker<Record<string, never>, { removedCount: number }>(
    queueNames.sweepExpiredSessions,
    async () => handleSweepExpiredSessions(conversations)
  );

  await queue.upsertJobScheduler(
    queueNames.sweepExpiredSessions,
    { every: env.SESSION_SWEEP_INTERVAL_MINUTES * 60 * 1000 },
    { name: queueNames.sweepExpiredSessions, data: {} }
  );

  logger.info({ everyMinutes: env.SESSION_SWEEP_INTERVAL_MINUTES }, "session sweeper started");

  return {
    async close() {
      await worker.close();
      await queue.close();
    }
  };
}

export type SweeperStarter = (conversations: ConversationService) => Promise<SessionSweeper>;

/**
 * Starts the sweeper in the background. Startup failures are logged and the HTTP
 * server keeps serving; an unreachable Redis leaves the start pending until it connects.
 */
export function launchSessionSweeper(
  conversations: ConversationService,
  start: SweeperStarter = startSessionSweeper
): SessionSweeper {
  let running: SessionSweeper | null = null;
  let closed = false;

  const starting = start(conversations).then(
    async (sweeper) => {
      if (closed) {
        await sweeper.close();
        return;
      }

      running = sweeper;
    },
    (error: unknown) => {
      logger.error({ error }, "session sweeper failed to start");
    }
  );

  starting.catch((error: unknown) => {
    logger.error({ error }, "session sweeper failed to stop after shutdown");
  });

  return {
    async close() {
      closed = true;
      if (running) {
        await running.close();
      }
    }
  };
}
