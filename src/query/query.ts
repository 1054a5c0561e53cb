/***
 * Query — Typed multi-component iteration.
 *
 * A query is a fixed list of terms. Each term names a component class
 * and an access mode, or asks for the entity ID itself:
 *
 *   Position           — read  (yields Readonly<Position>)
 *   read(Position)     — read, spelled out
 *   write(Velocity)    — write (yields Velocity, mutate in place)
 *   ENTITY             — the matching EntityID
 *
 * The row type is computed from the terms, so
 *
 *   world.query_mut(ENTITY, Name, write(Color))
 *
 * iterates [EntityID, Readonly<Name>, Color] tuples. world.query() only
 * accepts read terms; a write term there fails to type-check.
 *
 * Structural typing means two classes with the same shape are the same
 * type to the compiler, so the aliasing rule (one class requested twice
 * with a write among them) is enforced when the query is built, before
 * any row is produced.
 *
 * Iteration drives from the smallest requested store (ties go to the
 * earliest term) and probes the others for membership. QueryIter is its
 * own iterator: lazy, single-pass, not restartable.
 *
 * The first step locks the world against structural changes until the
 * iterator finishes. A for..of loop releases the lock on break or throw;
 * an iterator stepped by hand must be run to the end or closed with
 * return().
 *
 ***/

import type { EntityID } from "../entity/entity";
import {
  component_name,
  type Component,
  type ComponentType,
} from "../component/component";
import type { ComponentStore } from "../store/component_store";
import { ECS_ERROR, ECSError } from "../utils/error";
import { Borrow, type BorrowSource } from "../utils/borrow";
import { unsafe_cast } from "type_primitives";

//=========================================================
// Terms
//=========================================================

export enum TERM {
  ENTITY = "entity",
  READ = "read",
  WRITE = "write",
}

export interface EntityTerm {
  readonly kind: TERM.ENTITY;
}

export interface Read<T extends Component> {
  readonly kind: TERM.READ;
  readonly type: ComponentType<T>;
}

export interface Write<T extends Component> {
  readonly kind: TERM.WRITE;
  readonly type: ComponentType<T>;
}

export const ENTITY: EntityTerm = Object.freeze({ kind: TERM.ENTITY });

export function read<T extends Component>(type: ComponentType<T>): Read<T> {
  return { kind: TERM.READ, type };
}

export function write<T extends Component>(type: ComponentType<T>): Write<T> {
  return { kind: TERM.WRITE, type };
}

/** Terms accepted by world.query(). */
export type ReadTerm = ComponentType | Read<Component> | EntityTerm;

/** Terms accepted by world.query_mut(). */
export type QueryTerm = ReadTerm | Write<Component>;

/** Value a single term contributes to a row. */
export type TermValue<Q> = Q extends EntityTerm
  ? EntityID
  : Q extends Write<infer T>
    ? T
    : Q extends Read<infer T>
      ? Readonly<T>
      : Q extends ComponentType<infer T>
        ? Readonly<T>
        : never;

/** Maps a tuple of terms to the tuple each matching entity yields. */
export type QueryRow<Q extends readonly QueryTerm[]> = {
  [K in keyof Q]: TermValue<Q[K]>;
};

//=========================================================
// Compilation
//=========================================================

export interface CompiledTerm {
  readonly kind: TERM;
  /** null for ENTITY. */
  readonly type: ComponentType | null;
}

function is_component_type(term: QueryTerm): term is ComponentType {
  return typeof term === "function";
}

function normalize_term(term: QueryTerm): CompiledTerm {
  if (is_component_type(term)) return { kind: TERM.READ, type: term };
  if (term.kind === TERM.ENTITY) return { kind: TERM.ENTITY, type: null };
  return { kind: term.kind, type: term.type };
}

/**
 * Validate and normalize a term list.
 *
 * Throws before anything is read:
 *   EMPTY_QUERY               — no component term at all
 *   WRITE_TERM_IN_READ_QUERY  — write term passed to a read-only query
 *   QUERY_ACCESS_CONFLICT     — same class twice with at least one write
 */
export function compile_terms(
  terms: readonly QueryTerm[],
  allow_write: boolean,
): CompiledTerm[] {
  const compiled: CompiledTerm[] = new Array(terms.length);
  const seen = new Map<ComponentType, TERM>();

  for (let i = 0; i < terms.length; i++) {
    const term = normalize_term(terms[i]);
    compiled[i] = term;
    if (term.type === null) continue;

    const name = component_name(term.type);
    if (term.kind === TERM.WRITE && !allow_write) {
      throw new ECSError(
        ECS_ERROR.WRITE_TERM_IN_READ_QUERY,
        `write(${name}) requires query_mut()`,
        { component: name, position: i },
      );
    }

    const prior = seen.get(term.type);
    if (prior !== undefined && (prior === TERM.WRITE || term.kind === TERM.WRITE)) {
      throw new ECSError(
        ECS_ERROR.QUERY_ACCESS_CONFLICT,
        `Query requests component "${name}" with conflicting access (${prior} + ${term.kind})`,
        { component: name, accesses: [prior, term.kind] },
      );
    }
    seen.set(term.type, term.kind);
  }

  if (seen.size === 0) {
    throw new ECSError(
      ECS_ERROR.EMPTY_QUERY,
      "Query must request at least one component type",
    );
  }

  return compiled;
}

//=========================================================
// QueryIter
//=========================================================

/** What a QueryIter needs from the World. */
export interface QuerySource extends BorrowSource {
  _store_for(type: ComponentType): ComponentStore<Component> | undefined;
  is_alive(id: EntityID): boolean;
}

export class QueryIter<Row> implements IterableIterator<Row> {
  private readonly source: QuerySource;
  private readonly borrow: Borrow;
  private readonly terms: readonly CompiledTerm[];
  // Store per term, parallel to terms (null for ENTITY)
  private readonly term_stores: (ComponentStore<Component> | null)[];
  // Distinct stores to probe for each candidate, driver excluded
  private readonly probes: ComponentStore<Component>[] = [];
  private readonly driver: ComponentStore<Component> | null = null;
  private cursor = 0;
  private done = false;

  constructor(source: QuerySource, terms: readonly CompiledTerm[]) {
    this.source = source;
    this.borrow = new Borrow(source, "query");
    this.terms = terms;
    this.term_stores = new Array(terms.length).fill(null);

    const distinct: ComponentStore<Component>[] = [];
    for (let i = 0; i < terms.length; i++) {
      const type = terms[i].type;
      if (type === null) continue;
      const store = source._store_for(type);
      if (store === undefined) {
        // A type nobody has stored yet matches nothing
        this.done = true;
        return;
      }
      this.term_stores[i] = store;
      if (!distinct.includes(store)) distinct.push(store);
    }

    let driver = distinct[0];
    for (let i = 1; i < distinct.length; i++) {
      if (distinct[i].size < driver.size) driver = distinct[i];
    }
    this.driver = driver;
    for (const store of distinct) {
      if (store !== driver) this.probes.push(store);
    }
  }

  next(): IteratorResult<Row> {
    const driver = this.driver;
    if (this.done || driver === null) return this.finish();
    this.borrow.check();
    this.borrow.acquire();

    while (this.cursor < driver.size) {
      const row_index = this.cursor++;
      const id = driver.id_at(row_index);
      if (!this.matches(id)) continue;
      return { value: this.build_row(id), done: false };
    }
    return this.finish();
  }

  return(): IteratorResult<Row> {
    return this.finish();
  }

  [Symbol.iterator](): IterableIterator<Row> {
    return this;
  }

  /**
   * Consume the remaining rows. The World is locked for the duration:
   * spawn, despawn, insert and remove throw from inside `fn`.
   */
  for_each(fn: (row: Row) => void): void {
    try {
      for (let r = this.next(); r.done !== true; r = this.next()) fn(r.value);
    } finally {
      this.borrow.release();
    }
  }

  /** Consume the remaining rows and return how many matched. */
  count(): number {
    let n = 0;
    for (let r = this.next(); r.done !== true; r = this.next()) n++;
    return n;
  }

  //=========================================================
  // Internal
  //=========================================================

  private finish(): IteratorResult<Row> {
    this.done = true;
    this.borrow.release();
    return { value: undefined, done: true };
  }

  private matches(id: EntityID): boolean {
    if (!this.source.is_alive(id)) return false;
    const probes = this.probes;
    for (let i = 0; i < probes.length; i++) {
      if (!probes[i].contains(id)) return false;
    }
    return true;
  }

  private build_row(id: EntityID): Row {
    const terms = this.terms;
    const row: unknown[] = new Array(terms.length);
    for (let i = 0; i < terms.length; i++) {
      const store = this.term_stores[i];
      row[i] = store === null ? id : store.get_mut(id);
    }
    // Term i yields the value its TermValue<> describes.
    return unsafe_cast<Row>(row);
  }
}
