/***
 *
 * ComponentStore - One store per component type
 *
 * Sparse/dense layout keyed by entity index. Parallel dense arrays hold
 * the owning EntityID and the value, packed at 0..size-1 for linear
 * iteration. A sparse Int32Array maps entity index → dense row for
 * O(1) get/insert/remove; removal uses swap-and-pop.
 *
 * The dense ID array keeps the full generational ID, so a stale ID
 * whose index has since been recycled never matches a stored row.
 *
 * Iteration order is dense order. It is stable as long as nothing is
 * inserted or removed mid-pass; the World only hands out a StoreView,
 * which holds the world lock while it iterates.
 *
 ***/

import {
  type EntityID,
  get_entity_index,
} from "../entity/entity";
import type { Component, ComponentType } from "../component/component";
import { ABSENT, DEFAULT_INITIAL_CAPACITY } from "../utils/constants";
import { grow_int32 } from "../utils/arrays";

/**
 * What the World hands out for direct store access: lookups and
 * in-place mutation, no membership changes. See StoreView.
 */
export interface ComponentView<T extends Component> extends Iterable<
  [EntityID, Readonly<T>]
> {
  readonly type: ComponentType<T>;
  readonly size: number;
  contains(id: EntityID): boolean;
  get(id: EntityID): Readonly<T> | undefined;
  get_mut(id: EntityID): T | undefined;
  entries_mut(): IterableIterator<[EntityID, T]>;
  for_each(fn: (id: EntityID, value: Readonly<T>) => void): void;
}

export class ComponentStore<T extends Component> implements ComponentView<T> {
  public readonly type: ComponentType<T>;

  private _dense_ids: EntityID[] = [];
  private _dense_vals: T[] = [];
  private _sparse: Int32Array;

  constructor(type: ComponentType<T>, initial_capacity = DEFAULT_INITIAL_CAPACITY) {
    this.type = type;
    this._sparse = new Int32Array(initial_capacity).fill(ABSENT);
  }

  get size(): number {
    return this._dense_ids.length;
  }

  /** Live view of stored IDs. Valid rows: 0..size-1. Do not mutate. */
  get ids(): readonly EntityID[] {
    return this._dense_ids;
  }

  contains(id: EntityID): boolean {
    return this.row_of(id) !== ABSENT;
  }

  get(id: EntityID): Readonly<T> | undefined {
    return this.get_mut(id);
  }

  get_mut(id: EntityID): T | undefined {
    const row = this.row_of(id);
    return row === ABSENT ? undefined : this._dense_vals[row];
  }

  /**
   * Insert or overwrite. Overwriting keeps the row, so dense order
   * does not change. A row held by an older generation of the same
   * index is taken over.
   */
  insert(id: EntityID, value: T): void {
    const index = get_entity_index(id);
    const row = this.raw_row(index);
    if (row !== ABSENT) {
      this._dense_ids[row] = id;
      this._dense_vals[row] = value;
      return;
    }
    this._ensure(index);
    this._sparse[index] = this._dense_ids.length;
    this._dense_ids.push(id);
    this._dense_vals.push(value);
  }

  /** Remove via swap-and-pop. Returns the removed value, if any. */
  remove(id: EntityID): T | undefined {
    const row = this.row_of(id);
    if (row === ABSENT) return undefined;

    const value = this._dense_vals[row];
    const last = this._dense_ids.length - 1;
    const last_id = this._dense_ids[last];

    this._dense_ids[row] = last_id;
    this._dense_vals[row] = this._dense_vals[last];
    this._sparse[get_entity_index(last_id)] = row;
    this._dense_ids.pop();
    this._dense_vals.pop();
    this._sparse[get_entity_index(id)] = ABSENT;
    return value;
  }

  clear(): void {
    for (let i = 0; i < this._dense_ids.length; i++) {
      this._sparse[get_entity_index(this._dense_ids[i])] = ABSENT;
    }
    this._dense_ids.length = 0;
    this._dense_vals.length = 0;
  }

  //=========================================================
  // Row access (query engine)
  //=========================================================

  id_at(row: number): EntityID {
    return this._dense_ids[row];
  }

  value_at(row: number): T {
    return this._dense_vals[row];
  }

  //=========================================================
  // Iteration
  //=========================================================

  for_each(fn: (id: EntityID, value: Readonly<T>) => void): void {
    for (let i = 0; i < this._dense_ids.length; i++) {
      fn(this._dense_ids[i], this._dense_vals[i]);
    }
  }

  [Symbol.iterator](): IterableIterator<[EntityID, Readonly<T>]> {
    return this.entries_mut();
  }

  entries_mut(): IterableIterator<[EntityID, T]> {
    let i = 0;
    const ids = this._dense_ids;
    const vals = this._dense_vals;
    const it: IterableIterator<[EntityID, T]> = {
      next(): IteratorResult<[EntityID, T]> {
        if (i < ids.length) {
          const row = i++;
          return { value: [ids[row], vals[row]], done: false };
        }
        return { value: undefined, done: true };
      },
      [Symbol.iterator]() {
        return it;
      },
    };
    return it;
  }

  //=========================================================
  // Internal
  //=========================================================

  private raw_row(index: number): number {
    return index < this._sparse.length ? this._sparse[index] : ABSENT;
  }

  private row_of(id: EntityID): number {
    const row = this.raw_row(get_entity_index(id));
    return row !== ABSENT && this._dense_ids[row] === id ? row : ABSENT;
  }

  private _ensure(index: number): void {
    if (index < this._sparse.length) return;
    this._sparse = grow_int32(this._sparse, index + 1, ABSENT);
  }
}
