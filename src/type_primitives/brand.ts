/***
 * Brand — Nominal typing for TypeScript.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol never exists at runtime; it only keeps
 * structurally identical types apart at compile time.
 *
 * EntityID and TypeID are both plain numbers at runtime, but
 * Brand<number, "entity_id"> cannot be passed where a
 * Brand<number, "type_id"> is expected.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
