/***
 * Entity — Generational ID packed into one safe integer.
 *
 * Each entity ID encodes a slot index (low 32 bits) and a generation
 * counter (the 21 bits above it). When an entity is despawned, its
 * slot's generation increments; lookups with the old ID see the
 * stale generation and treat the entity as dead.
 *
 * JS bitwise operators truncate to 32 bits, so the layout is built
 * with multiplication instead of shifts. The largest ID is
 * 2^53 - 1 (Number.MAX_SAFE_INTEGER), so IDs compare with === and
 * work as Map keys.
 *
 * Layout: generation * 2^32 + index
 *
 *   create_entity_id(index, gen) → gen * INDEX_RANGE + index
 *   get_entity_index(id)         → id % INDEX_RANGE
 *   get_entity_generation(id)    → floor(id / INDEX_RANGE)
 *
 ***/

import { type Brand, unsafe_cast } from "type_primitives";
import { ECS_ERROR, ECSError } from "../utils/error";

export type EntityID = Brand<number, "entity_id">;

export const INDEX_BITS = 32;
export const INDEX_RANGE = 2 ** INDEX_BITS;
export const MAX_INDEX = INDEX_RANGE - 1; // 4,294,967,295
export const GENERATION_BITS = 21;
export const MAX_GENERATION = 2 ** GENERATION_BITS - 1; // 2,097,151

export const create_entity_id = (
  index: number,
  generation: number,
): EntityID => {
  if (__DEV__) {
    if (!Number.isInteger(index) || index < 0 || index > MAX_INDEX) {
      throw new ECSError(ECS_ERROR.EID_MAX_INDEX_OVERFLOW, undefined, {
        index,
      });
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
  return unsafe_cast<EntityID>(generation * INDEX_RANGE + index);
};

export const get_entity_index = (id: EntityID): number => id % INDEX_RANGE;

export const get_entity_generation = (id: EntityID): number =>
  Math.floor(id / INDEX_RANGE);

/** Human-readable form used in error messages and logs: `index`v`generation`. */
export const format_entity_id = (id: EntityID): string =>
  `${get_entity_index(id)}v${get_entity_generation(id)}`;
