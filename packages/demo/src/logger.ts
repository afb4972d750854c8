/**
 * Root logger for the demo, built from config.
 *
 * Pretty-printed in development, JSON lines otherwise.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { DemoConfig } from "./config.js";

export function createLogger(config: Pick<DemoConfig, "LOG_LEVEL" | "NODE_ENV">): Logger {
  return pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}
