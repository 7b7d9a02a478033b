/**
 * Structured logging with Pino
 */

import pino from "pino";
import type { Logger } from "pino";

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
  /** Write to stderr so stdout stays free for command output. */
  stderr?: boolean;
}

export function createLogger({
  level = process.env.LOG_LEVEL || "info",
  pretty = process.env.LOG_PRETTY === "true",
  stderr = false,
}: LoggerOptions = {}): Logger {
  const fd = stderr ? 2 : 1;

  if (pretty) {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
          destination: fd,
        },
      },
    });
  }

  return pino({ level }, pino.destination(fd));
}
