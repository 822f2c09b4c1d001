/***
 * ResourceManager — World-wide singletons keyed by type.
 *
 * Resources are values that belong to no entity: time, input state,
 * configuration, handles owned by the renderer. At most one value per
 * TypeKey exists at a time.
 *
 * Like ComponentManager, the TypeID → slot map has one RwLock and every
 * slot has its own, so a system holding Time mutably can still read
 * Config. Adding a resource that already exists swaps the value in
 * place through the slot lock: nothing flags the overwrite beyond a
 * debug log line, and swapping a value that is currently borrowed
 * throws BORROW_CONFLICT.
 *
 * Usage:
 *
 *   const Score = define_type<{ value: number }>("Score");
 *   resources.add(Score, { value: 0 });
 *   resources.with_resource_mut(Score, (s) => { if (s) s.value += 5; });
 *   resources.get(Score); // { value: 5 } (a copy)
 *
 ***/

import { RwLock, unsafe_cast } from "type_primitives";
import type { TypeID, TypeKey } from "../component/component";
import type { Logger } from "../utils/logger";

interface ErasedSlot {
  readonly type_id: TypeID;
  readonly type_name: string;
  /** Throws BORROW_CONFLICT if the value is borrowed anywhere up the stack. */
  ensure_unborrowed(): void;
  downcast<U>(key: TypeKey<U>): ResourceSlot<U> | undefined;
}

class ResourceSlot<T> implements ErasedSlot {
  public readonly type_id: TypeID;
  public readonly type_name: string;
  public readonly cell: RwLock<T>;

  constructor(
    public readonly key: TypeKey<T>,
    value: T,
  ) {
    this.type_id = key.id;
    this.type_name = key.name;
    this.cell = new RwLock(value, `resource:${key.name}`);
  }

  ensure_unborrowed(): void {
    this.cell.write(() => undefined);
  }

  downcast<U>(key: TypeKey<U>): ResourceSlot<U> | undefined {
    // Type ids are unique per define_type() call, so equal ids mean U is T
    return key.id === this.type_id ? unsafe_cast<ResourceSlot<U>>(this) : undefined;
  }
}

export class ResourceManager {
  private readonly slots: RwLock<Map<TypeID, ErasedSlot>> = new RwLock(
    new Map(),
    "resource_slots",
  );

  constructor(private readonly logger?: Logger) {}

  /** Number of resources currently stored. */
  public get count(): number {
    return this.slots.read((slots) => slots.size);
  }

  public add<T>(type: TypeKey<T>, value: T): void {
    const existing = this.slot(type);
    if (existing !== undefined) {
      existing.cell.replace(value);
      this.logger?.debug(
        { event: "resource_replaced", resource: type.name },
        `Resource ${type.name} replaced`,
      );
      return;
    }

    const slot = new ResourceSlot(type, value);
    this.slots.write((slots) => {
      slots.set(type.id, slot);
    });
  }

  /** Copy of the resource, made with the key's clone function. */
  public get<T>(type: TypeKey<T>): T | undefined {
    const slot = this.slot(type);
    return slot?.cell.read((value) => type.clone(value));
  }

  public with_resource<T, R>(
    type: TypeKey<T>,
    fn: (value: T | undefined) => R,
  ): R {
    const slot = this.slot(type);
    return slot === undefined ? fn(undefined) : slot.cell.read(fn);
  }

  public with_resource_mut<T, R>(
    type: TypeKey<T>,
    fn: (value: T | undefined) => R,
  ): R {
    const slot = this.slot(type);
    return slot === undefined ? fn(undefined) : slot.cell.write(fn);
  }

  /** Replace the value with fn(value). False if the resource is absent. */
  public update<T>(type: TypeKey<T>, fn: (value: T) => T): boolean {
    const slot = this.slot(type);
    if (slot === undefined) return false;
    slot.cell.update(fn);
    return true;
  }

  public remove<T>(type: TypeKey<T>): T | undefined {
    const slot = this.slot(type);
    if (slot === undefined) return undefined;

    slot.ensure_unborrowed();
    this.slots.write((slots) => {
      slots.delete(type.id);
    });
    return slot.cell.read((value) => value);
  }

  public has<T>(type: TypeKey<T>): boolean {
    return this.slot(type) !== undefined;
  }

  /** Throws BORROW_CONFLICT if any resource is borrowed. */
  public ensure_unborrowed(): void {
    const all = this.slots.read((slots) => [...slots.values()]);
    for (const slot of all) slot.ensure_unborrowed();
  }

  public clear(): void {
    this.ensure_unborrowed();
    this.slots.write((slots) => slots.clear());
  }

  private slot<T>(type: TypeKey<T>): ResourceSlot<T> | undefined {
    return this.slots.read((slots) => slots.get(type.id))?.downcast(type);
  }
}
