/***
 * System — Function-based system types.
 *
 * Systems are plain functions, not classes. A SystemConfig holds the
 * per-frame function and optional lifecycle hooks; SystemRunner assigns
 * a unique SystemID and returns a frozen SystemDescriptor, the identity
 * handle used to remove the system again.
 *
 * Lifecycle:
 *   on_added(world)  — called once by runner.startup()
 *   fn(world, dt)    — called every runner.run(dt), in insertion order
 *   on_removed()     — called when the system is removed
 *   dispose()        — called by runner.dispose()
 *
 ***/

import {
  type Brand,
  validate_and_cast,
  is_non_negative_integer,
} from "type_primitives";
import type { World } from "../world";

export type SystemID = Brand<number, "system_id">;

export const as_system_id = (value: number) =>
  validate_and_cast<number, SystemID>(
    value,
    is_non_negative_integer,
    "SystemID must be a non-negative integer",
  );

export type SystemFn = (world: World, delta_time: number) => void;

export interface SystemConfig {
  fn: SystemFn;
  name?: string;
  on_added?: (world: World) => void;
  on_removed?: () => void;
  dispose?: () => void;
}

export interface SystemDescriptor extends Readonly<SystemConfig> {
  readonly id: SystemID;
  readonly name: string;
}
