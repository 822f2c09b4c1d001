/***
 * Handle — Opaque, comparable identifiers.
 *
 * Two flavours:
 *
 *   Handle<Name>  a branded u32 handed out by a HandleAllocator. Cheap,
 *                 compared with ===, and typed so that handles of
 *                 different kinds never mix. TypeIDs are minted this way,
 *                 and callers can define their own kinds:
 *
 *                   type MeshHandle = Handle<"mesh">;
 *                   const meshes = define_handle("mesh");
 *                   const h: MeshHandle = meshes.next();
 *
 *   Id            a random uuid v4 string for identities that must stay
 *                 unique across processes (saved scenes, assets).
 *
 ***/

import { v4, validate } from "uuid";
import {
  type Brand,
  is_uint32,
  unsafe_cast,
  validate_and_cast,
} from "type_primitives";

export type Handle<Name extends string> = Brand<number, Name>;

export class HandleAllocator<H extends number> {
  private next_index = 0;

  constructor(public readonly kind: string) {}

  /** Number of handles handed out so far. */
  get allocated(): number {
    return this.next_index;
  }

  next(): H {
    return this.from_index(this.next_index++);
  }

  /** Rebuild a handle from its raw index (e.g. after deserialization). */
  from_index(index: number): H {
    return validate_and_cast<number, H>(
      index,
      is_uint32,
      `${this.kind} handle must be an unsigned 32-bit integer`,
    );
  }
}

export const define_handle = <Name extends string>(
  kind: Name,
): HandleAllocator<Handle<Name>> => new HandleAllocator<Handle<Name>>(kind);

export type Id = Brand<string, "id">;

export const create_id = (): Id => unsafe_cast<Id>(v4());

export const as_id = (value: string): Id =>
  validate_and_cast<string, Id>(value, validate, "Id must be a uuid");
