/***
 *
 * EntityManager - Allocates and recycles generational entity IDs.
 *
 * Liveness is a BitSet over slot indices; the generation of each slot
 * lives in a parallel number[]. Freed indices go on a LIFO free list,
 * so the most recently destroyed slot is the first one reused.
 *
 ***/

import { BitSet } from "type_primitives";
import {
  type EntityID,
  MAX_GENERATION,
  create_entity_id,
  get_entity_generation,
  get_entity_index,
} from "./entity";
import { grow_number_array } from "../utils/arrays";
import {
  DEFAULT_INITIAL_CAPACITY,
  INITIAL_GENERATION,
} from "../utils/constants";

export class EntityManager {
  private readonly alive: BitSet;
  private generations: number[];
  private high_water = 0;
  private free_indices: number[] = [];
  private alive_total = 0;

  constructor(initial_capacity = DEFAULT_INITIAL_CAPACITY) {
    this.alive = new BitSet(initial_capacity);
    this.generations = new Array(Math.max(initial_capacity, 1)).fill(
      INITIAL_GENERATION,
    );
  }

  //=========================================================
  // Queries
  //=========================================================

  /** Number of entities currently alive. */
  public get alive_count(): number {
    return this.alive_total;
  }

  /** Number of indices waiting on the free list. */
  public get free_count(): number {
    return this.free_indices.length;
  }

  /**
   * Check whether an ID refers to a living entity.
   *
   * The index must be below the high-water mark with its liveness bit
   * set, and the generation baked into the ID must match the slot's
   * current generation. An ID from before the slot was recycled fails
   * the generation check.
   */
  public is_alive(id: EntityID): boolean {
    const index = get_entity_index(id);
    return (
      index < this.high_water &&
      this.alive.has(index) &&
      this.generations[index] === get_entity_generation(id)
    );
  }

  /** Snapshot of every live entity in ascending index order. */
  public iter_alive(): EntityID[] {
    const out: EntityID[] = [];
    const generations = this.generations;
    this.alive.for_each((index) => {
      out.push(create_entity_id(index, generations[index]));
    });
    return out;
  }

  //=========================================================
  // Mutations
  //=========================================================

  /**
   * Allocate an entity.
   *
   * Pops a recycled index if one is free (its generation was bumped
   * during destroy). Otherwise advances the high-water mark and uses
   * whatever generation the slot holds: 0 for a never-used slot, or the
   * bumped value a slot keeps across clear().
   */
  public create(): EntityID {
    let index: number;

    const recycled = this.free_indices.pop();
    if (recycled !== undefined) {
      index = recycled;
    } else {
      index = this.high_water++;
      if (index >= this.generations.length) {
        this.generations = grow_number_array(
          this.generations,
          index + 1,
          INITIAL_GENERATION,
        );
      }
    }

    this.alive.set(index);
    this.alive_total++;
    return create_entity_id(index, this.generations[index]);
  }

  /**
   * Destroy a living entity.
   *
   * Returns false without touching anything when the ID is not alive,
   * so destroying twice is harmless. Otherwise clears the liveness bit,
   * bumps the slot generation (wrapping at MAX_GENERATION) and pushes
   * the index onto the free list.
   */
  public destroy(id: EntityID): boolean {
    if (!this.is_alive(id)) return false;

    const index = get_entity_index(id);
    this.alive.clear(index);
    this.generations[index] = (this.generations[index] + 1) & MAX_GENERATION;
    this.free_indices.push(index);
    this.alive_total--;
    return true;
  }

  /**
   * Forget every entity: index counter back to 0, free list and
   * liveness set emptied. Slots that were alive get their generation
   * bumped so handles from before the reset stay dead.
   */
  public clear(): void {
    const generations = this.generations;
    this.alive.for_each((index) => {
      generations[index] = (generations[index] + 1) & MAX_GENERATION;
    });
    this.alive.clear_all();
    this.free_indices.length = 0;
    this.high_water = 0;
    this.alive_total = 0;
  }
}
