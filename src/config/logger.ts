import pino, { type Logger } from "pino";
import { env } from "./env";

export type { Logger };

export function createLogger(options?: { level?: string; name?: string }): Logger {
  return pino({
    name: options?.name ?? "arena",
    level: options?.level ?? env.LOG_LEVEL,
  });
}

export const rootLogger: Logger = createLogger();
