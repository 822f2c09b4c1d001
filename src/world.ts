/***
 * World — Public ECS facade.
 *
 * Composes EntityManager (who exists), ComponentManager (per-entity
 * data) and ResourceManager (singletons) behind one object. External
 * code, systems included, talks to the World only.
 *
 * The World is where the liveness invariant is enforced: every
 * component operation checks is_alive first and, for a dead or stale
 * entity, behaves as if the component were absent without consulting
 * the component manager at all. Despawn clears the liveness bit and
 * every row of the entity before returning.
 *
 * Usage:
 *
 *   const Position = define_type<{ x: number; y: number }>("Position");
 *   const Score = define_type<{ value: number }>("Score");
 *
 *   const world = new World({ name: "game" });
 *   const e = world.spawn().with(Position, { x: 0, y: 0 }).build();
 *
 *   world.add_resource(Score, { value: 0 });
 *   world.with_resource_mut(Score, (s) => { if (s) s.value += 5; });
 *
 *   for (const [entity, pos] of world.query(Position)) { ... }
 *   world.despawn(e);
 *
 ***/

import { EntityManager } from "./entity/entity_manager";
import { EntityBuilder, type ComponentSink } from "./entity/entity_builder";
import { type EntityID, format_entity } from "./entity/entity";
import { ComponentManager } from "./component/component_manager";
import type { TypeKey } from "./component/component";
import { ResourceManager } from "./resource/resource_manager";
import {
  QueryBuilder,
  snapshot_query,
  type QuerySource,
} from "./query/query";
import { parse_world_options, type WorldOptions } from "./config";
import { create_logger, type Logger } from "./utils/logger";

export class World implements QuerySource, ComponentSink {
  public readonly name: string;
  public readonly logger: Logger;

  private readonly _entities: EntityManager;
  private readonly _components: ComponentManager;
  private readonly _resources: ResourceManager;

  constructor(options?: WorldOptions) {
    const config = parse_world_options(options);
    this.name = config.name;
    this.logger = options?.logger ?? create_logger(config.name, config.log_level);

    this._entities = new EntityManager(config.initial_capacity);
    this._components = new ComponentManager(config.initial_capacity);
    this._resources = new ResourceManager(this.logger);

    this.logger.debug(
      { event: "world_created", initial_capacity: config.initial_capacity },
      `World "${this.name}" created`,
    );
  }

  //=========================================================
  // Managers
  //=========================================================

  public get entities(): EntityManager {
    return this._entities;
  }

  public get components(): ComponentManager {
    return this._components;
  }

  public get resources(): ResourceManager {
    return this._resources;
  }

  //=========================================================
  // Entities
  //=========================================================

  /** Allocate an entity now; components attach when the builder is built. */
  public spawn(): EntityBuilder {
    return new EntityBuilder(this, this._entities.create());
  }

  public spawn_with<T>(type: TypeKey<T>, value: T): EntityID {
    const entity = this._entities.create();
    this._components.add_component(entity, type, value);
    return entity;
  }

  /**
   * Kill an entity and drop all of its components.
   * False (and nothing happens) if it was not alive. While any component
   * table is borrowed this throws BORROW_CONFLICT and the entity stays
   * alive with every row intact.
   */
  public despawn(entity: EntityID): boolean {
    if (!this._entities.is_alive(entity)) return false;

    // rows go first: remove_all_components is the step that can throw
    const removed = this._components.remove_all_components(entity);
    this._entities.destroy(entity);
    this.logger.trace(
      { event: "entity_despawned", entity: format_entity(entity), removed },
      "Entity despawned",
    );
    return true;
  }

  public is_alive(entity: EntityID): boolean {
    return this._entities.is_alive(entity);
  }

  public get entity_count(): number {
    return this._entities.alive_count;
  }

  /** Snapshot of all live entities; later spawns/despawns do not affect it. */
  public iter_entities(): EntityID[] {
    return this._entities.iter_alive();
  }

  //=========================================================
  // Components (liveness-gated)
  //=========================================================

  /** Attach or overwrite a component. No-op on a dead entity. */
  public add_component<T>(entity: EntityID, type: TypeKey<T>, value: T): this {
    if (this._entities.is_alive(entity)) {
      this._components.add_component(entity, type, value);
    }
    return this;
  }

  public get_component<T>(entity: EntityID, type: TypeKey<T>): T | undefined {
    if (!this._entities.is_alive(entity)) return undefined;
    return this._components.get_component(entity, type);
  }

  public with_component<T, R>(
    entity: EntityID,
    type: TypeKey<T>,
    fn: (value: T | undefined) => R,
  ): R {
    if (!this._entities.is_alive(entity)) return fn(undefined);
    return this._components.with_component(entity, type, fn);
  }

  /**
   * Mutable scoped borrow. T's table stays write-locked while fn runs:
   * reading or writing T again from inside fn (despawn included) throws
   * BORROW_CONFLICT. Other component types and resources are fine.
   */
  public with_component_mut<T, R>(
    entity: EntityID,
    type: TypeKey<T>,
    fn: (value: T | undefined) => R,
  ): R {
    if (!this._entities.is_alive(entity)) return fn(undefined);
    return this._components.with_component_mut(entity, type, fn);
  }

  public update_component<T>(
    entity: EntityID,
    type: TypeKey<T>,
    fn: (value: T) => T,
  ): boolean {
    if (!this._entities.is_alive(entity)) return false;
    return this._components.update_component(entity, type, fn);
  }

  public remove_component<T>(
    entity: EntityID,
    type: TypeKey<T>,
  ): T | undefined {
    if (!this._entities.is_alive(entity)) return undefined;
    return this._components.remove_component(entity, type);
  }

  public has_component<T>(entity: EntityID, type: TypeKey<T>): boolean {
    return (
      this._entities.is_alive(entity) &&
      this._components.has_component(entity, type)
    );
  }

  //=========================================================
  // Resources
  //=========================================================

  /** Store a singleton. An existing resource of the same type is silently replaced. */
  public add_resource<T>(type: TypeKey<T>, value: T): this {
    this._resources.add(type, value);
    return this;
  }

  public get_resource<T>(type: TypeKey<T>): T | undefined {
    return this._resources.get(type);
  }

  public with_resource<T, R>(
    type: TypeKey<T>,
    fn: (value: T | undefined) => R,
  ): R {
    return this._resources.with_resource(type, fn);
  }

  public with_resource_mut<T, R>(
    type: TypeKey<T>,
    fn: (value: T | undefined) => R,
  ): R {
    return this._resources.with_resource_mut(type, fn);
  }

  public update_resource<T>(type: TypeKey<T>, fn: (value: T) => T): boolean {
    return this._resources.update(type, fn);
  }

  public remove_resource<T>(type: TypeKey<T>): T | undefined {
    return this._resources.remove(type);
  }

  public has_resource<T>(type: TypeKey<T>): boolean {
    return this._resources.has(type);
  }

  //=========================================================
  // Queries
  //=========================================================

  /** Every live entity holding T, paired with a copy of its value. */
  public query<T>(type: TypeKey<T>): [EntityID, T][] {
    return snapshot_query(this, type);
  }

  /**
   * Visit every live entity holding T with its stored value, under T's
   * write lock. Mutate the value in place, or call `set` to replace it
   * (needed for primitive values). Returns the number of rows visited.
   */
  public query_mut<T>(
    type: TypeKey<T>,
    fn: (entity: EntityID, value: T, set: (next: T) => void) => void,
  ): number {
    const entities = this._entities;
    return this._components.with_storage_mut(type, (table) => {
      if (table === undefined) return 0;
      let visited = 0;
      table.for_each((entity, value) => {
        if (!entities.is_alive(entity)) return;
        fn(entity, value, (next) => {
          table.set(entity, next);
        });
        visited++;
      });
      return visited;
    });
  }

  public query_builder(): QueryBuilder {
    return new QueryBuilder<[]>(this, []);
  }

  //=========================================================
  // Lifecycle
  //=========================================================

  /**
   * Drop every entity, component row and resource. Registered tables stay.
   * A borrowed table or resource throws BORROW_CONFLICT before anything
   * is dropped.
   */
  public clear(): void {
    this._components.ensure_unborrowed();
    this._resources.ensure_unborrowed();

    const entities = this._entities.alive_count;
    const resources = this._resources.count;

    this._entities.clear();
    this._components.clear();
    this._resources.clear();

    this.logger.info(
      { event: "world_cleared", entities, resources },
      `World "${this.name}" cleared`,
    );
  }
}
