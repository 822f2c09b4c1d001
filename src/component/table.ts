/***
 *
 * Table - Per-type component storage behind its own RwLock.
 *
 * Rows are keyed by entity index in a SparseMap and remember the full
 * EntityID that owns them. A lookup whose generation differs from the
 * row owner's reports the row as absent, so a stale handle never reads
 * the value of whoever holds the slot now.
 *
 * ComponentManager only sees tables through ErasedTable: the handful
 * of operations that do not need T (remove by index, clear, size) plus
 * a checked downcast back to Table<T>.
 *
 ***/

import { RwLock, SparseMap, unsafe_cast } from "type_primitives";
import { type EntityID, get_entity_index } from "../entity/entity";
import type { TypeID, TypeKey } from "./component";
import { DEFAULT_INITIAL_CAPACITY } from "../utils/constants";

interface Row<T> {
  readonly entity: EntityID;
  value: T;
}

/** Read access to a whole table. Only valid inside the callback that received it. */
export interface TableView<T> extends Iterable<[EntityID, T]> {
  readonly type_name: string;
  readonly size: number;
  has(entity: EntityID): boolean;
  get(entity: EntityID): T | undefined;
  for_each(fn: (entity: EntityID, value: T) => void): void;
}

export interface TableViewMut<T> extends TableView<T> {
  /** Overwrite the value of an existing row. Returns false if the entity has none. */
  set(entity: EntityID, value: T): boolean;
}

export interface ErasedTable {
  readonly type_id: TypeID;
  readonly type_name: string;
  readonly size: number;
  /** Throws BORROW_CONFLICT if the table is borrowed anywhere up the stack. */
  ensure_unborrowed(): void;
  remove_index(index: number): boolean;
  clear(): void;
  downcast<U>(key: TypeKey<U>): Table<U> | undefined;
}

class RowsView<T> implements TableViewMut<T> {
  constructor(
    public readonly type_name: string,
    private readonly rows: SparseMap<Row<T>>,
  ) {}

  get size(): number {
    return this.rows.size;
  }

  has(entity: EntityID): boolean {
    return owned_row(this.rows, entity) !== undefined;
  }

  get(entity: EntityID): T | undefined {
    return owned_row(this.rows, entity)?.value;
  }

  set(entity: EntityID, value: T): boolean {
    const row = owned_row(this.rows, entity);
    if (row === undefined) return false;
    row.value = value;
    return true;
  }

  for_each(fn: (entity: EntityID, value: T) => void): void {
    this.rows.for_each((_index, row) => fn(row.entity, row.value));
  }

  *[Symbol.iterator](): IterableIterator<[EntityID, T]> {
    for (const [, row] of this.rows) yield [row.entity, row.value];
  }
}

function owned_row<T>(
  rows: SparseMap<Row<T>>,
  entity: EntityID,
): Row<T> | undefined {
  const row = rows.get(get_entity_index(entity));
  return row !== undefined && row.entity === entity ? row : undefined;
}

export class Table<T> implements ErasedTable {
  public readonly type_id: TypeID;
  public readonly type_name: string;
  private readonly key: TypeKey<T>;
  private readonly rows: RwLock<SparseMap<Row<T>>>;

  constructor(key: TypeKey<T>, initial_capacity = DEFAULT_INITIAL_CAPACITY) {
    this.key = key;
    this.type_id = key.id;
    this.type_name = key.name;
    this.rows = new RwLock(
      new SparseMap<Row<T>>(initial_capacity),
      `table:${key.name}`,
    );
  }

  get size(): number {
    return this.rows.read((rows) => rows.size);
  }

  /** Insert or overwrite the row at the entity's index. */
  insert(entity: EntityID, value: T): void {
    this.rows.write((rows) => {
      rows.set(get_entity_index(entity), { entity, value });
    });
  }

  contains(entity: EntityID): boolean {
    return this.rows.read((rows) => owned_row(rows, entity) !== undefined);
  }

  /** Copy of the value, made with the key's clone function. */
  get(entity: EntityID): T | undefined {
    return this.rows.read((rows) => {
      const row = owned_row(rows, entity);
      return row === undefined ? undefined : this.key.clone(row.value);
    });
  }

  borrow<R>(entity: EntityID, fn: (value: T | undefined) => R): R {
    return this.rows.read((rows) => fn(owned_row(rows, entity)?.value));
  }

  borrow_mut<R>(entity: EntityID, fn: (value: T | undefined) => R): R {
    return this.rows.write((rows) => fn(owned_row(rows, entity)?.value));
  }

  update(entity: EntityID, fn: (value: T) => T): boolean {
    return this.rows.write((rows) => {
      const row = owned_row(rows, entity);
      if (row === undefined) return false;
      row.value = fn(row.value);
      return true;
    });
  }

  remove(entity: EntityID): T | undefined {
    return this.rows.write((rows) => {
      const index = get_entity_index(entity);
      if (owned_row(rows, entity) === undefined) return undefined;
      return rows.take(index)?.value;
    });
  }

  ensure_unborrowed(): void {
    this.rows.write(() => undefined);
  }

  /** Drop whatever row sits at this index, regardless of which generation owns it. */
  remove_index(index: number): boolean {
    return this.rows.write((rows) => rows.delete(index));
  }

  clear(): void {
    this.rows.write((rows) => rows.clear());
  }

  read<R>(fn: (view: TableView<T>) => R): R {
    return this.rows.read((rows) => fn(new RowsView(this.type_name, rows)));
  }

  write<R>(fn: (view: TableViewMut<T>) => R): R {
    return this.rows.write((rows) => fn(new RowsView(this.type_name, rows)));
  }

  downcast<U>(key: TypeKey<U>): Table<U> | undefined {
    // Type ids are unique per define_type() call, so equal ids mean U is T
    return key.id === this.type_id ? unsafe_cast<Table<U>>(this) : undefined;
  }
}
