import { pino } from "pino";

export interface Logger {
  debug(obj: Record<string, unknown>, msg?: string): void;
  debug(msg: string): void;
  info(obj: Record<string, unknown>, msg?: string): void;
  info(msg: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  warn(msg: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  error(msg: string): void;
}

export function createLogger(name?: string): Logger {
  return pino({
    name: name ?? "limitkit",
    level: process.env["LOG_LEVEL"] ?? "info",
  });
}
