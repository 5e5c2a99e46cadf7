import { Redis } from "ioredis";

import { env } from "../config/env.js";
import { logger } from "./logger.js";

declare global {
  // eslint-disable-next-line no-var
  var __redis__: Redis | undefined;
}

let client: Redis | undefined;

// BullMQ workers block on the connection, so retries per request must stay unbounded.
function createClient(): Redis {
  const redis = new Redis(env.REDIS_URL, {
    maxRetriesPerRequest: null
  });

  redis.on("error", (error) => {
    logger.error({ error }, "redis connection error");
  });

  return redis;
}

export function getRedis(): Redis {
  if (!client) {
    client = globalThis.__redis__ ?? createClient();
  }

  if (process.env.NODE_ENV !== "production") {
    globalThis.__redis__ = client;
  }

  return client;
}
