/***
 * Query — Snapshot reads over component tables.
 *
 * Single-type queries copy the live rows of one table while holding
 * its read lock, then release it before returning:
 *
 *   world.query(Position)   → [[e1, { x: 0, y: 0 }], ...]
 *
 * Multi-type queries are built from those same single-table reads
 * rather than a join engine. The smallest required table drives the
 * scan; every other table is probed one entity at a time, so no two
 * table locks are ever held together:
 *
 *   world.query_builder()
 *     .with(Position)
 *     .with(Velocity)
 *     .without(Frozen)
 *     .collect();          → [[e, pos, vel], ...]
 *
 * Results are copies. An entity may die right after a snapshot
 * returns, and callers must tolerate that.
 *
 ***/

import { unsafe_cast } from "type_primitives";
import type { EntityID } from "../entity/entity";
import type { TypeKey } from "../component/component";
import type { ComponentManager } from "../component/component_manager";

export type AnyTypeKey = TypeKey<unknown>;

// Maps a tuple of keys to a tuple of their value types.
// e.g. [TypeKey<Position>, TypeKey<Velocity>] → [Position, Velocity]
export type ValuesOf<Keys extends readonly AnyTypeKey[]> = {
  -readonly [K in keyof Keys]: Keys[K] extends TypeKey<infer T> ? T : never;
};

export type QueryRow<Keys extends readonly AnyTypeKey[]> = [
  EntityID,
  ...ValuesOf<Keys>,
];

/** What a query needs from its World. */
export interface QuerySource {
  readonly components: ComponentManager;
  is_alive(entity: EntityID): boolean;
  iter_entities(): EntityID[];
}

/** Live (entity, copy) pairs of one table. */
export function snapshot_query<T>(
  source: QuerySource,
  type: TypeKey<T>,
): [EntityID, T][] {
  return source.components.with_storage(type, (table) => {
    const out: [EntityID, T][] = [];
    if (table === undefined) return out;
    table.for_each((entity, value) => {
      if (source.is_alive(entity)) out.push([entity, type.clone(value)]);
    });
    return out;
  });
}

export class QueryBuilder<Keys extends readonly AnyTypeKey[] = []> {
  constructor(
    private readonly source: QuerySource,
    private readonly include: Keys,
    private readonly exclude: readonly AnyTypeKey[] = [],
  ) {}

  /** Require T and append its value to every result row. */
  with<T>(type: TypeKey<T>): QueryBuilder<[...Keys, TypeKey<T>]> {
    const include: [...Keys, TypeKey<T>] = [...this.include, type];
    return new QueryBuilder(this.source, include, this.exclude);
  }

  /** Skip entities that hold T. */
  without<T>(type: TypeKey<T>): QueryBuilder<Keys> {
    return new QueryBuilder(this.source, this.include, [...this.exclude, type]);
  }

  /** Matching entities, ordered by the driving table. */
  entities(): EntityID[] {
    const components = this.source.components;
    const out: EntityID[] = [];
    for (const entity of this.candidates()) {
      if (this.matches(components, entity)) out.push(entity);
    }
    return out;
  }

  count(): number {
    return this.entities().length;
  }

  /** Matching entities with a copy of each requested value. */
  collect(): QueryRow<Keys>[] {
    const out: QueryRow<Keys>[] = [];
    for (const entity of this.entities()) out.push(this.row(entity));
    return out;
  }

  /**
   * Same rows as collect(), read and handed to fn one at a time.
   * Each entity is checked again right before its row is read, so one
   * that an earlier callback despawned or stripped of a type is skipped.
   */
  for_each(fn: (...row: QueryRow<Keys>) => void): void {
    const source = this.source;
    for (const entity of this.entities()) {
      if (!source.is_alive(entity)) continue;
      if (!this.matches(source.components, entity)) continue;
      fn(...this.row(entity));
    }
  }

  //=========================================================
  // Internal
  //=========================================================

  // Live entities of the smallest required table, or every live entity
  // when nothing is required
  private candidates(): EntityID[] {
    const source = this.source;
    if (this.include.length === 0) return source.iter_entities();

    let driver = this.include[0];
    let smallest = source.components.storage_size(driver);
    for (let i = 1; i < this.include.length; i++) {
      const size = source.components.storage_size(this.include[i]);
      if (size < smallest) {
        smallest = size;
        driver = this.include[i];
      }
    }
    if (smallest === 0) return [];

    return source.components.with_storage(driver, (table) => {
      const out: EntityID[] = [];
      table?.for_each((entity) => {
        if (source.is_alive(entity)) out.push(entity);
      });
      return out;
    });
  }

  private row(entity: EntityID): QueryRow<Keys> {
    const components = this.source.components;
    const row: unknown[] = [entity];
    for (const type of this.include) {
      row.push(components.get_component(entity, type));
    }
    // built from this.include in order, so it matches QueryRow<Keys>
    return unsafe_cast<QueryRow<Keys>>(row);
  }

  private matches(components: ComponentManager, entity: EntityID): boolean {
    for (const type of this.include) {
      if (!components.has_component(entity, type)) return false;
    }
    for (const type of this.exclude) {
      if (components.has_component(entity, type)) return false;
    }
    return true;
  }
}
