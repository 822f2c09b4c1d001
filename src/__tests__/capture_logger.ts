import pino from "pino";
import type { Logger, LogLevel } from "../utils/logger";

export type LogLine = Record<string, unknown>;

/** A pino logger writing parsed JSON lines into an array instead of stdout. */
export function capture_logger(level: LogLevel = "trace"): {
  logger: Logger;
  lines: LogLine[];
} {
  const lines: LogLine[] = [];
  const logger = pino(
    { level, base: { component: "test" } },
    {
      write(msg: string) {
        const line: LogLine = JSON.parse(msg);
        lines.push(line);
      },
    },
  );
  return { logger, lines };
}
