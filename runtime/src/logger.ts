import { pino, type Logger } from "pino";

export type { Logger };

export const logger: Logger = pino({
  name: "lucid",
  level: process.env.LUCID_LOG_LEVEL || "info",
  redact: ["*.apiKey", "*.authorization"],
});

export function createLogger(component: string): Logger {
  return logger.child({ component });
}
