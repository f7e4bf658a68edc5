import { pino, type Logger } from "pino";

const REDACT_PATHS = [
  "apiKey",
  "apiSecret",
  "secret",
  "private_key",
  "authorization",
  "*.apiKey",
  "*.apiSecret",
  "*.private_key",
  "headers.authorization",
];

export type { Logger };

export const logger = pino({
  name: "drawdown-allocator",
  level: process.env.LOG_LEVEL || "info",
  redact: {
    paths: REDACT_PATHS,
    censor: "[REDACTED]",
  },
});

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}
