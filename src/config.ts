/***
 * WorldOptions — validated World configuration.
 *
 * Every field is optional; parse_world_options fills defaults and
 * rejects bad values with INVALID_WORLD_OPTIONS, carrying the zod
 * issues in the error context.
 *
 *   new World({ name: "editor", initial_capacity: 4096, log_level: "debug" });
 *
 ***/

import { z } from "zod";
import {
  LOG_LEVELS,
  default_log_level,
  type Logger,
} from "./utils/logger";
import { ECS_ERROR, ECSError } from "./utils/error";
import {
  DEFAULT_INITIAL_CAPACITY,
  DEFAULT_WORLD_NAME,
} from "./utils/constants";

export const WorldOptionsSchema = z.object({
  name: z
    .string()
    .min(1, { message: "World name cannot be empty" })
    .default(DEFAULT_WORLD_NAME),
  initial_capacity: z
    .number()
    .int({ message: "initial_capacity must be an integer" })
    .positive({ message: "initial_capacity must be positive" })
    .default(DEFAULT_INITIAL_CAPACITY),
  log_level: z.enum(LOG_LEVELS).default(() => default_log_level()),
});

export type WorldConfig = z.output<typeof WorldOptionsSchema>;

export type WorldOptions = z.input<typeof WorldOptionsSchema> & {
  /** Use this logger instead of creating one from name and log_level. */
  logger?: Logger;
};

export function parse_world_options(options?: WorldOptions): WorldConfig {
  const result = WorldOptionsSchema.safeParse({
    name: options?.name,
    initial_capacity: options?.initial_capacity,
    log_level: options?.log_level,
  });
  if (!result.success) {
    throw new ECSError(
      ECS_ERROR.INVALID_WORLD_OPTIONS,
      result.error.issues.map((issue) => issue.message).join("; "),
      { issues: result.error.issues },
    );
  }
  return result.data;
}
