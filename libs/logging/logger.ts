import pino from "pino";
import type { Logger } from "pino";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export type { Logger };

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: {
    system: "restore-orchestrator"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger bound to one orchestration run.
 */
export function getRunLogger(databaseName: string, runId: string): Logger {
  return logger.child({
    databaseName,
    runId
  });
}
