/**
 * Structured logging with credential redaction and poll-cycle correlation.
 *
 * Redaction policy:
 * - INFO never carries message subjects, senders or credentials; counts and ids only
 * - All paths listed in `redact.paths` are replaced with "[REDACTED]"
 */
import pino from "pino";
import { getCurrentCycle } from "../core/correlation.js";

export function createLogger(name?: string) {
  const logger = pino({
    name: name ?? "mailwatch",
    level: process.env.LOG_LEVEL ?? "info",
    serializers: {
      // Pino only serializes Error objects for the `err` key by default.
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        "password",
        "pass",
        "credentials",
        "auth.pass",
        "*.password",
        "*.pass",
        "*.credentials",
      ],
      censor: "[REDACTED]",
    },
    mixin() {
      const cycle = getCurrentCycle();
      return cycle ? { cycleId: cycle.cycleId } : {};
    },
    transport:
      process.env.NODE_ENV !== "production"
        ? { target: "pino-pretty", options: { colorize: true } }
        : undefined,
  });

  return logger;
}

export type Logger = pino.Logger;
