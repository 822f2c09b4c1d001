/***
 *
 * TypeKey - Runtime stand-in for a component or resource type.
 *
 * TypeScript types are erased, so every type that goes into a World is
 * named by a key created once with define_type<T>(). The key carries a
 * unique TypeID (the registry key), a display name for diagnostics, and
 * the clone function used whenever a value is copied out of storage.
 *
 * The generic T is phantom: it exists only at compile time, so
 * world.get_component(e, Position) is typed as Position | undefined
 * without any cast at the call site.
 *
 *   interface Position { x: number; y: number }
 *   const Position = define_type<Position>("Position");
 *
 *   // class values lose their prototype under structuredClone
 *   const Transform = define_type<Transform>("Transform", {
 *     clone: (t) => t.copy(),
 *   });
 *
 ***/

import { define_handle, type Handle } from "../handle";

//=========================================================
// TypeID
//=========================================================
export type TypeID = Handle<"type_id">;

const type_ids = define_handle("type_id");

//=========================================================
// TypeKey<T>
//=========================================================

declare const __value: unique symbol;

export interface TypeKey<T> {
  readonly id: TypeID;
  readonly name: string;
  clone(value: T): T;
  /** Phantom: never present at runtime. */
  readonly [__value]?: T;
}

/** Key used for per-entity values. */
export type ComponentType<T> = TypeKey<T>;

/** Key used for world-wide singletons. */
export type ResourceType<T> = TypeKey<T>;

/** The value type a key stands for. */
export type ValueOf<K> = K extends TypeKey<infer T> ? T : never;

export interface DefineTypeOptions<T> {
  clone?: (value: T) => T;
}

export function define_type<T>(
  name: string,
  options?: DefineTypeOptions<T>,
): TypeKey<T> {
  const clone = options?.clone ?? ((value: T): T => structuredClone(value));
  return Object.freeze({ id: type_ids.next(), name, clone });
}
