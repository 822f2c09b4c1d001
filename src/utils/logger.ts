import pino from "pino";
import { DEFAULT_LOG_LEVEL } from "./constants";

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const satisfies readonly LogLevel[];

/** LOG_LEVEL from the environment when it names a pino level, else "warn". */
export function default_log_level(): LogLevel {
  const from_env = process.env.LOG_LEVEL;
  const match = LOG_LEVELS.find((level) => level === from_env);
  return match ?? DEFAULT_LOG_LEVEL;
}

/**
 * Create a logger tagged with a component name.
 * @param component - Name attached to every entry (e.g. the world name)
 */
export function create_logger(
  component: string,
  level: LogLevel = default_log_level(),
): Logger {
  return pino({
    level,
    base: { component },
  });
}
