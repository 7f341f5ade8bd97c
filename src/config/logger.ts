// src/config/logger.ts
/** Winston logger: JSON output, secret redaction, and stream for morgan (dev HTTP logs). */
import { createLogger, format, transports } from "winston";

import { env } from "./env.js";

export const redact = (obj: Record<string, unknown>) => {
  const clone = { ...obj };
  for (const key of Object.keys(clone)) {
    if (/authorization|password|token|secret/i.test(key)) {
      clone[key] = "[redacted]";
    }
  }
  return clone;
};

export const logger = createLogger({
  level: env.LOG_LEVEL,
  format: format.combine(
    format.timestamp(),
    format.errors({ stack: true }),
    format.printf((info) => {
      const { timestamp, level, message, ...rest } = info;
      return JSON.stringify({ timestamp, level, message, ...redact(rest) });
    })
  ),
  transports: [new transports.Console({ silent: env.NODE_ENV === "test" })],
});

// tiny helper for morgan stream
export const httpLogStream = {
  write: (line: string) => logger.info(line.trim(), { source: "http" }),
};
