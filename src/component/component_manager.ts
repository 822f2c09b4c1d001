/***
 *
 * ComponentManager - Registry of type-erased component tables.
 *
 * Maps TypeID → Table. Tables are created lazily on first use and are
 * never removed or replaced, only emptied, which is what makes the
 * locking cheap:
 *
 *   - the outer map has its own RwLock and is only write-locked to
 *     register a new type;
 *   - finding a table takes the outer read lock just long enough to
 *     fetch it, so even a write to the table only read-locks the map;
 *   - each table is then locked on its own, so work on Position never
 *     contends with work on Velocity.
 *
 * No liveness checks happen here. Adding to a dead entity leaves an
 * orphan row that only World's filtering keeps out of sight.
 *
 ***/

import { RwLock } from "type_primitives";
import { type EntityID, get_entity_index } from "../entity/entity";
import type { TypeID, TypeKey } from "./component";
import {
  Table,
  type ErasedTable,
  type TableView,
  type TableViewMut,
} from "./table";
import { DEFAULT_INITIAL_CAPACITY } from "../utils/constants";

export class ComponentManager {
  private readonly tables: RwLock<Map<TypeID, ErasedTable>> = new RwLock(
    new Map(),
    "component_tables",
  );
  private readonly initial_capacity: number;

  constructor(initial_capacity = DEFAULT_INITIAL_CAPACITY) {
    this.initial_capacity = initial_capacity;
  }

  /** Number of registered component types. */
  public get table_count(): number {
    return this.tables.read((tables) => tables.size);
  }

  //=========================================================
  // Registration
  //=========================================================

  public register<T>(type: TypeKey<T>): void {
    this.table_or_create(type);
  }

  public is_registered<T>(type: TypeKey<T>): boolean {
    return this.table(type) !== undefined;
  }

  //=========================================================
  // Per-entity access
  //=========================================================

  public add_component<T>(entity: EntityID, type: TypeKey<T>, value: T): void {
    this.table_or_create(type).insert(entity, value);
  }

  public get_component<T>(entity: EntityID, type: TypeKey<T>): T | undefined {
    return this.table(type)?.get(entity);
  }

  public with_component<T, R>(
    entity: EntityID,
    type: TypeKey<T>,
    fn: (value: T | undefined) => R,
  ): R {
    const table = this.table(type);
    return table === undefined ? fn(undefined) : table.borrow(entity, fn);
  }

  /**
   * Mutable scoped borrow. fn runs while T's table is write-locked:
   * touching T again from inside fn throws BORROW_CONFLICT, touching
   * any other type is fine.
   */
  public with_component_mut<T, R>(
    entity: EntityID,
    type: TypeKey<T>,
    fn: (value: T | undefined) => R,
  ): R {
    const table = this.table(type);
    return table === undefined ? fn(undefined) : table.borrow_mut(entity, fn);
  }

  /** Replace the value with fn(value). False if the entity has no T. */
  public update_component<T>(
    entity: EntityID,
    type: TypeKey<T>,
    fn: (value: T) => T,
  ): boolean {
    return this.table(type)?.update(entity, fn) ?? false;
  }

  public remove_component<T>(
    entity: EntityID,
    type: TypeKey<T>,
  ): T | undefined {
    return this.table(type)?.remove(entity);
  }

  public has_component<T>(entity: EntityID, type: TypeKey<T>): boolean {
    return this.table(type)?.contains(entity) ?? false;
  }

  /**
   * Remove the row at the entity's index from every table.
   * Returns how many rows were dropped. If any table is borrowed this
   * throws BORROW_CONFLICT before a single row is removed.
   */
  public remove_all_components(entity: EntityID): number {
    const index = get_entity_index(entity);
    const tables = this.snapshot_tables();
    for (const table of tables) table.ensure_unborrowed();

    let removed = 0;
    for (const table of tables) {
      if (table.remove_index(index)) removed++;
    }
    return removed;
  }

  //=========================================================
  // Bulk access
  //=========================================================

  public with_storage<T, R>(
    type: TypeKey<T>,
    fn: (table: TableView<T> | undefined) => R,
  ): R {
    const table = this.table(type);
    return table === undefined ? fn(undefined) : table.read(fn);
  }

  public with_storage_mut<T, R>(
    type: TypeKey<T>,
    fn: (table: TableViewMut<T> | undefined) => R,
  ): R {
    const table = this.table(type);
    return table === undefined ? fn(undefined) : table.write(fn);
  }

  /** Row count for T, 0 when T was never registered. */
  public storage_size<T>(type: TypeKey<T>): number {
    return this.table(type)?.size ?? 0;
  }

  /** Throws BORROW_CONFLICT if any table is borrowed. */
  public ensure_unborrowed(): void {
    for (const table of this.snapshot_tables()) table.ensure_unborrowed();
  }

  /**
   * Empty every table. The tables themselves stay registered.
   * Nothing is emptied when one of them is borrowed.
   */
  public clear(): void {
    const tables = this.snapshot_tables();
    for (const table of tables) table.ensure_unborrowed();
    for (const table of tables) table.clear();
  }

  //=========================================================
  // Internal
  //=========================================================

  private table<T>(type: TypeKey<T>): Table<T> | undefined {
    return this.tables.read((tables) => tables.get(type.id))?.downcast(type);
  }

  private table_or_create<T>(type: TypeKey<T>): Table<T> {
    const existing = this.table(type);
    if (existing !== undefined) return existing;

    const table = new Table(type, this.initial_capacity);
    this.tables.write((tables) => {
      tables.set(type.id, table);
    });
    return table;
  }

  // Copy of the table list so no table lock is taken while the outer map is held
  private snapshot_tables(): ErasedTable[] {
    return this.tables.read((tables) => [...tables.values()]);
  }
}
