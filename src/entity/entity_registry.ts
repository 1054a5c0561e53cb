/***
 *
 * EntityRegistry - Allocates and recycles generational entity IDs.
 *
 * One slot per index: the slot's current generation plus a liveness
 * flag. Despawned slots go on a free stack with their generation
 * already bumped, so the next allocation at that index hands out a
 * fresh ID while every old ID stays stale.
 *
 ***/

import {
  type EntityID,
  MAX_GENERATION,
  MAX_INDEX,
  create_entity_id,
  format_entity_id,
  get_entity_generation,
  get_entity_index,
} from "./entity";
import { ECS_ERROR, ECSError } from "../utils/error";
import { DEFAULT_INITIAL_CAPACITY, INITIAL_GENERATION } from "../utils/constants";
import { grow_array } from "../utils/arrays";
import { is_non_negative_integer, validate_and_cast } from "type_primitives";
import { SILENT_LOGGER, type Logger } from "../utils/logger";

export interface EntityRegistryOptions {
  initial_capacity?: number;
  /** Highest generation a slot may reach before it is retired. */
  max_generation?: number;
  logger?: Logger;
}

export class EntityRegistry {
  private generations: number[];
  private live: boolean[];
  private high_water = 0;
  private free_indices: number[] = [];
  private alive_count = 0;
  private retired_count = 0;

  private readonly max_generation: number;
  private readonly logger: Logger;

  constructor(options?: EntityRegistryOptions) {
    const capacity = options?.initial_capacity ?? DEFAULT_INITIAL_CAPACITY;
    this.generations = new Array<number>(capacity).fill(INITIAL_GENERATION);
    this.live = new Array<boolean>(capacity).fill(false);
    this.max_generation = Math.min(
      validate_and_cast(
        options?.max_generation ?? MAX_GENERATION,
        is_non_negative_integer,
        "max_generation must be a non-negative integer",
      ),
      MAX_GENERATION,
    );
    this.logger = options?.logger ?? SILENT_LOGGER;
  }

  //=========================================================
  // Queries
  //=========================================================

  /** Number of entities currently alive. */
  public get count(): number {
    return this.alive_count;
  }

  /** Number of slots ever opened (live, free or retired). */
  public get capacity(): number {
    return this.high_water;
  }

  /** Number of slots taken out of circulation after exhausting their generations. */
  public get retired(): number {
    return this.retired_count;
  }

  /**
   * Check whether an ID refers to a living entity.
   *
   * Three conditions must hold:
   *   1. The index falls within the opened range.
   *   2. The slot is marked live.
   *   3. The generation baked into the ID matches the slot's.
   *
   * A freed slot already carries the next generation, so (2) is what
   * keeps a not-yet-issued ID for that generation from passing.
   */
  public is_alive(id: EntityID): boolean {
    const index = get_entity_index(id);
    return (
      index < this.high_water &&
      this.live[index] &&
      this.generations[index] === get_entity_generation(id)
    );
  }

  //=========================================================
  // Mutations
  //=========================================================

  /**
   * Allocate a new entity.
   *
   * Reuses a freed slot when one is available (its generation was
   * bumped during despawn). Otherwise opens a new slot at
   * generation 0, growing the backing arrays when needed.
   */
  public allocate(): EntityID {
    let index: number;
    const recycled = this.free_indices.pop();

    if (recycled !== undefined) {
      index = recycled;
    } else {
      index = this.high_water;
      if (index > MAX_INDEX) {
        throw new ECSError(
          ECS_ERROR.EID_MAX_INDEX_OVERFLOW,
          `Entity index space exhausted (${MAX_INDEX + 1} slots)`,
        );
      }
      this.high_water++;
      if (index >= this.generations.length) this.grow(index + 1);
      this.generations[index] = INITIAL_GENERATION;
    }

    this.live[index] = true;
    this.alive_count++;
    return create_entity_id(index, this.generations[index]);
  }

  /**
   * Despawn a living entity.
   *
   * Marks the slot dead and bumps its generation so the old ID goes
   * stale. A slot already at max_generation cannot be bumped without
   * wrapping back onto IDs that may still be held, so it is retired
   * instead of being recycled.
   *
   * Returns false for stale or unknown IDs.
   */
  public despawn(id: EntityID): boolean {
    if (!this.is_alive(id)) return false;

    const index = get_entity_index(id);
    const generation = get_entity_generation(id);
    this.live[index] = false;
    this.alive_count--;

    if (generation >= this.max_generation) {
      this.retired_count++;
      this.logger.warn(
        `retired entity slot ${index} at generation ${generation}`,
        { entity: format_entity_id(id) },
      );
      return true;
    }

    this.generations[index] = generation + 1;
    this.free_indices.push(index);
    return true;
  }

  //=========================================================
  // Internal
  //=========================================================

  private grow(min_capacity: number): void {
    this.generations = grow_array(
      this.generations,
      min_capacity,
      INITIAL_GENERATION,
    );
    this.live = grow_array(this.live, min_capacity, false);
  }
}
