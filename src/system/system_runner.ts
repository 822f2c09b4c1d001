/***
 *
 * SystemRunner - Owns system descriptors and runs them each frame.
 *
 * There is no dependency-driven ordering: systems run one after another
 * in the order they were added. Before the systems of a frame run, the
 * Time resource is advanced by the frame delta (and inserted if the
 * world does not have one yet).
 *
 * A system that throws stops the frame. The failure is logged and
 * rethrown as SYSTEM_FAILED with the original error as `cause`.
 *
 ***/

import type { World } from "../world";
import { ECS_ERROR, ECSError } from "../utils/error";
import { Time, advance_time, create_time } from "../resource/time";
import {
  as_system_id,
  type SystemConfig,
  type SystemDescriptor,
  type SystemFn,
  type SystemID,
} from "./system";

export class SystemRunner {
  private systems: Map<SystemID, SystemDescriptor> = new Map();
  private next_id = 0;
  private started = false;

  constructor(private readonly world: World) {}

  /** Number of registered systems. */
  public get system_count(): number {
    return this.systems.size;
  }

  /** Registered systems in run order. */
  public get_all(): SystemDescriptor[] {
    return [...this.systems.values()];
  }

  /**
   * Register a system and assign it a SystemID.
   * Returns a frozen SystemDescriptor - the identity handle.
   * Systems added after startup() get on_added right away.
   */
  public add_system(fn_or_config: SystemFn | SystemConfig): SystemDescriptor {
    const config: SystemConfig =
      typeof fn_or_config === "function" ? { fn: fn_or_config } : fn_or_config;
    if (config.name !== undefined) {
      for (const existing of this.systems.values()) {
        if (existing.name === config.name) {
          throw new ECSError(
            ECS_ERROR.DUPLICATE_SYSTEM,
            `A system named "${config.name}" is already registered`,
            { system: config.name },
          );
        }
      }
    }

    const id = as_system_id(this.next_id++);
    const name = config.name ?? `system_${id}`;

    const descriptor: SystemDescriptor = Object.freeze({ ...config, id, name });
    this.systems.set(id, descriptor);
    this.world.logger.debug(
      { event: "system_added", system: name, id },
      `System ${name} added`,
    );

    if (this.started) descriptor.on_added?.(this.world);
    return descriptor;
  }

  /** Remove a system. Calls on_removed if defined. False if it was not registered. */
  public remove_system(descriptor: SystemDescriptor): boolean {
    if (!this.systems.delete(descriptor.id)) return false;
    descriptor.on_removed?.();
    this.world.logger.debug(
      { event: "system_removed", system: descriptor.name, id: descriptor.id },
      `System ${descriptor.name} removed`,
    );
    return true;
  }

  /** Call on_added on every registered system, in insertion order. */
  public startup(): void {
    this.ensure_time();
    for (const descriptor of this.get_all()) {
      descriptor.on_added?.(this.world);
    }
    this.started = true;
  }

  /** Advance Time by delta_time, then run every system once. */
  public run(delta_time: number): void {
    const world = this.world;
    this.ensure_time();
    world.with_resource_mut(Time, (time) => {
      if (time !== undefined) advance_time(time, delta_time);
    });

    // Snapshot so systems may add or remove systems mid-frame
    for (const descriptor of this.get_all()) {
      try {
        descriptor.fn(world, delta_time);
      } catch (error) {
        world.logger.error(
          { event: "system_failed", system: descriptor.name, err: error },
          `System ${descriptor.name} failed`,
        );
        throw new ECSError(
          ECS_ERROR.SYSTEM_FAILED,
          `System ${descriptor.name} failed`,
          { system: descriptor.name },
          error,
        );
      }
    }
  }

  /** Dispose all systems: dispose() then on_removed() on each, then forget them. */
  public dispose(): void {
    for (const descriptor of this.systems.values()) {
      descriptor.dispose?.();
      descriptor.on_removed?.();
    }
    this.systems.clear();
    this.started = false;
  }

  private ensure_time(): void {
    if (!this.world.has_resource(Time)) this.world.add_resource(Time, create_time());
  }
}
