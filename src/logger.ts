/**
 * 日志（pino）：根 logger + 按组件划分的子 logger
 */

import pino from "pino";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as readonly string[]).includes(value);
}

function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL;
  return envLevel && isLogLevel(envLevel) ? envLevel : "info";
}

export const logger = pino({
  name: "ukb-assistant",
  level: getLogLevel(),
});

export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}
