/***
 * Entity — Generational ID (32-bit index + 21-bit generation).
 *
 * Each entity ID carries a slot index (the full unsigned 32-bit range)
 * and a generation counter. Destroying an entity bumps its slot's
 * generation, so an old ID captured before a despawn never compares
 * equal to the ID handed out when the slot is reused, and lookups
 * with it treat the entity as dead.
 *
 * The pair is packed into one double, exact up to 2^53:
 *
 *   create_entity_id(index, gen) → gen * 2^32 + index
 *   get_entity_index(id)         → id >>> 0        (low 32 bits)
 *   get_entity_generation(id)    → floor(id / 2^32)
 *
 ***/

import { type Brand, unsafe_cast } from "type_primitives";
import { ECS_ERROR, ECSError } from "../utils/error";
import { GENERATION_BITS, INDEX_BITS } from "../utils/constants";

export type EntityID = Brand<number, "entity_id">;

export const INDEX_SPAN = 2 ** INDEX_BITS; // 4,294,967,296
export const MAX_INDEX = INDEX_SPAN - 1; // 0xFFFFFFFF
export const MAX_GENERATION = 2 ** GENERATION_BITS - 1; // 2,097,151

export const create_entity_id = (
  index: number,
  generation: number,
): EntityID => {
  if (__DEV__) {
    if (!Number.isInteger(index) || index < 0 || index > MAX_INDEX) {
      throw new ECSError(ECS_ERROR.EID_MAX_INDEX_OVERFLOW, undefined, { index });
    }

    if (
      !Number.isInteger(generation) ||
      generation < 0 ||
      generation > MAX_GENERATION
    ) {
      throw new ECSError(ECS_ERROR.EID_MAX_GEN_OVERFLOW, undefined, {
        generation,
      });
    }
  }
  return unsafe_cast<EntityID>(generation * INDEX_SPAN + index);
};

// >>> 0 is ToUint32, i.e. the value modulo 2^32, exact for any safe integer
export const get_entity_index = (id: EntityID): number => id >>> 0;

export const get_entity_generation = (id: EntityID): number =>
  Math.floor(id / INDEX_SPAN);

export const format_entity = (id: EntityID): string =>
  `${get_entity_index(id)}v${get_entity_generation(id)}`;
