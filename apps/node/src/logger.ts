import pino from "pino";
import type { Logger } from "pino";
import { config } from "./config";

export type { Logger } from "pino";

export function makeLogger(bindings?: Record<string, unknown>): Logger {
  // Silent under the test runner.
  const isTest = process.env.VITEST === "true" || process.env.NODE_ENV === "test";

  return pino({
    level: config.logLevel,
    enabled: !isTest,
    base: { ...bindings, service: "yieldlock-node" },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export const logger = makeLogger();
