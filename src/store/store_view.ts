/***
 * StoreView — The guarded face of a ComponentStore.
 *
 * world.store(T) hands out a StoreView rather than the store itself.
 * Lookups and in-place mutation pass straight through; iteration holds
 * the world lock like a query does, so a despawn or remove mid-pass
 * throws instead of shuffling rows under the cursor.
 *
 ***/

import type { EntityID } from "../entity/entity";
import type { Component, ComponentType } from "../component/component";
import { Borrow, type BorrowSource } from "../utils/borrow";
import type { ComponentStore, ComponentView } from "./component_store";

export class StoreView<T extends Component> implements ComponentView<T> {
  private readonly source: BorrowSource;
  private readonly store: ComponentStore<T>;

  constructor(source: BorrowSource, store: ComponentStore<T>) {
    this.source = source;
    this.store = store;
  }

  get type(): ComponentType<T> {
    return this.store.type;
  }

  get size(): number {
    return this.store.size;
  }

  contains(id: EntityID): boolean {
    return this.store.contains(id);
  }

  get(id: EntityID): Readonly<T> | undefined {
    return this.store.get(id);
  }

  get_mut(id: EntityID): T | undefined {
    return this.store.get_mut(id);
  }

  entries_mut(): StoreIter<T> {
    return new StoreIter(this.source, this.store);
  }

  [Symbol.iterator](): StoreIter<T> {
    return this.entries_mut();
  }

  for_each(fn: (id: EntityID, value: Readonly<T>) => void): void {
    const it = this.entries_mut();
    try {
      for (let r = it.next(); r.done !== true; r = it.next()) {
        fn(r.value[0], r.value[1]);
      }
    } finally {
      it.return();
    }
  }
}

/** Dense-order pass over one store. Same lock rules as QueryIter. */
export class StoreIter<T extends Component>
  implements IterableIterator<[EntityID, T]>
{
  private readonly store: ComponentStore<T>;
  private readonly borrow: Borrow;
  private row = 0;
  private done = false;

  constructor(source: BorrowSource, store: ComponentStore<T>) {
    this.store = store;
    this.borrow = new Borrow(source, "store");
  }

  next(): IteratorResult<[EntityID, T]> {
    if (this.done) return this.finish();
    this.borrow.check();
    this.borrow.acquire();

    if (this.row < this.store.size) {
      const row = this.row++;
      return {
        value: [this.store.id_at(row), this.store.value_at(row)],
        done: false,
      };
    }
    return this.finish();
  }

  return(): IteratorResult<[EntityID, T]> {
    return this.finish();
  }

  [Symbol.iterator](): StoreIter<T> {
    return this;
  }

  private finish(): IteratorResult<[EntityID, T]> {
    this.done = true;
    this.borrow.release();
    return { value: undefined, done: true };
  }
}
