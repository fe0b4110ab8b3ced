/**
 * @subledger/node — Logger.
 *
 * JSON lines through pino; human-readable through pino-pretty when
 * running in development.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";

export type { Logger } from "pino";

export function createLogger(config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  return pino({
    level: config.LOG_LEVEL,
    base: { service: "subledger" },
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}
