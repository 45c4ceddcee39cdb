import pino, { Logger } from "pino";
import { env } from "../config/env";

export type LoggerLike = {
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
};

export function createLogger(name: string): Logger {
  return pino({
    name,
    level: env.LOG_LEVEL
  });
}
