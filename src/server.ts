import { buildApp, createDefaultDependencies } from "./app.js";
import { env } from "./config/env.js";
import { logger } from "./infrastructure/logger.js";
import { launchSessionSweeper, type SessionSweeper } from "./worker/index.js";
import { schedulerEnabled } from "./worker/queues.js";

const dependencies = createDefaultDependencies();
const app = await buildApp(dependencies);
let sweeper: SessionSweeper | null = null;

app.addHook("onClose", async () => {
  await sweeper?.close();
});

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    logger.info({ signal }, "shutting down");
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ error }, "shutdown failed");
        process.exit(1);
      }
    );
  });
}

await app.listen({ port: env.PORT, host: env.HOST });

// The sweep is housekeeping; the server keeps serving while Redis is unavailable.
if (schedulerEnabled()) {
  sweeper = launchSessionSweeper(dependencies.conversations);
}
