import pino from "pino";

import { env } from "../config/env.js";

function buildLogger() {
  if (env.NODE_ENV === "production") {
    return pino({
      level: "info",
      base: {
        service: "teller-desk"
      }
    });
  }

  if (env.NODE_ENV === "test") {
    return pino({
      level: "silent"
    });
  }

  return pino({
    level: "debug",
    transport: {
      target: "pino/file",
      options: {
        destination: 1
      }
    }
  });
}

export const logger = buildLogger();
