/***
 * World — Public ECS facade.
 *
 * Owns the EntityRegistry and one ComponentStore per component class,
 * created on first use. Every structural change goes through here:
 * spawn, despawn, insert and remove. Lookups (entity, get, has) treat a
 * stale or unknown ID as absent and never throw.
 *
 * Storage is a Map from class to sparse-set store; there are no
 * archetypes. Despawn scans every store and removes the entity from
 * those holding it.
 *
 * Usage:
 *
 *   class Name { constructor(public value: string) {} }
 *   class Color { constructor(public value: "red" | "green" | "blue") {} }
 *   class CanFly {}
 *
 *   const world = new World();
 *   world.spawn(new Name("Sky"), new Color("blue"));
 *   world.spawn(new Name("Red Bird"), new Color("red"), new CanFly());
 *   world.spawn(new Name("Airplane"), new CanFly());
 *
 *   for (const [name, , color] of world.query_mut(Name, CanFly, write(Color))) {
 *     color.value = "green";          // in place, visible immediately
 *   }
 *
 * Borrow rules: while a query or store pass is open the world is locked,
 * and spawn, despawn, insert and remove throw before touching anything.
 * A pass opens on its first step and closes when it runs out, on break,
 * or on return(). Iterators and EntityRefs also remember the structural
 * epoch they were created at and throw on their next use once it has
 * moved.
 *
 ***/

import { EntityRegistry } from "./entity/entity_registry";
import { EntityRef, type EntityRefSource } from "./entity/entity_ref";
import { type EntityID, format_entity_id } from "./entity/entity";
import {
  component_name,
  component_type_of,
  type Component,
  type ComponentType,
} from "./component/component";
import { ComponentStore, type ComponentView } from "./store/component_store";
import { StoreView } from "./store/store_view";
import {
  QueryIter,
  compile_terms,
  type QueryRow,
  type QuerySource,
  type QueryTerm,
  type ReadTerm,
} from "./query/query";
import {
  is_positive_integer,
  unsafe_cast,
  validate_and_cast,
} from "type_primitives";
import { ECS_ERROR, ECSError } from "./utils/error";
import { DEFAULT_INITIAL_CAPACITY } from "./utils/constants";
import {
  SILENT_LOGGER,
  create_console_logger,
  type Logger,
} from "./utils/logger";

export interface WorldOptions {
  /** Starting size of the slot table and of each store's sparse index. */
  initial_capacity?: number;
  logger?: Logger;
  /** Log to the console when no logger is supplied. */
  debug?: boolean;
}

export class World implements QuerySource, EntityRefSource {
  private readonly registry: EntityRegistry;
  private readonly stores: Map<ComponentType, ComponentStore<Component>> =
    new Map();
  private readonly initial_capacity: number;
  private readonly logger: Logger;

  // Open query and store passes; structural changes are refused while > 0
  private iterating = 0;
  // Bumped on every structural change; outstanding iterators and refs compare against it
  private epoch = 0;

  constructor(options?: WorldOptions) {
    this.initial_capacity = validate_and_cast(
      options?.initial_capacity ?? DEFAULT_INITIAL_CAPACITY,
      is_positive_integer,
      "initial_capacity must be a positive integer",
    );
    this.logger =
      options?.logger ??
      (options?.debug === true ? create_console_logger() : SILENT_LOGGER);
    this.registry = new EntityRegistry({
      initial_capacity: this.initial_capacity,
      logger: this.logger,
    });
  }

  //=========================================================
  // Entities
  //=========================================================

  /**
   * Create an entity carrying the given components.
   *
   * The bundle is validated as a whole first (class instances only,
   * each class at most once), so a rejected bundle leaves the world
   * untouched. An empty bundle creates a bare entity.
   */
  public spawn(...bundle: Component[]): EntityID {
    this.assert_not_iterating("spawn");

    const types: ComponentType[] = new Array(bundle.length);
    for (let i = 0; i < bundle.length; i++) {
      const type = component_type_of(bundle[i]);
      if (types.includes(type)) {
        throw new ECSError(
          ECS_ERROR.DUPLICATE_BUNDLE_COMPONENT,
          `Bundle contains more than one "${component_name(type)}"`,
          { component: component_name(type) },
        );
      }
      types[i] = type;
    }

    const id = this.registry.allocate();
    for (let i = 0; i < bundle.length; i++) {
      this.store_or_create(types[i]).insert(id, bundle[i]);
    }
    this.epoch++;
    return id;
  }

  /**
   * Despawn an entity and drop all of its components.
   * Returns false if the ID was already stale or never issued.
   */
  public despawn(id: EntityID): boolean {
    this.assert_not_iterating("despawn");

    if (!this.registry.despawn(id)) {
      this.logger.debug(`despawn ignored for stale entity ${format_entity_id(id)}`);
      return false;
    }
    for (const store of this.stores.values()) store.remove(id);
    this.epoch++;
    return true;
  }

  public is_alive(id: EntityID): boolean {
    return this.registry.is_alive(id);
  }

  public get entity_count(): number {
    return this.registry.count;
  }

  /** Read-only handle for a live entity, undefined otherwise. */
  public entity(id: EntityID): EntityRef | undefined {
    return this.registry.is_alive(id) ? new EntityRef(this, id) : undefined;
  }

  //=========================================================
  // Components
  //=========================================================

  public get<T extends Component>(
    id: EntityID,
    type: ComponentType<T>,
  ): Readonly<T> | undefined {
    if (!this.registry.is_alive(id)) return undefined;
    return this.store_for(type)?.get(id);
  }

  public has(id: EntityID, type: ComponentType): boolean {
    if (!this.registry.is_alive(id)) return false;
    return this.store_for(type)?.contains(id) ?? false;
  }

  /**
   * Add a component to a live entity, or replace the one it already
   * has. Only adding moves the structural epoch, but both are refused
   * while a pass is open: a replaced value would detach the row the
   * pass handed out.
   */
  public insert(id: EntityID, value: Component): void {
    this.assert_not_iterating("insert");
    const type = component_type_of(value);
    if (!this.registry.is_alive(id)) {
      throw new ECSError(
        ECS_ERROR.ENTITY_NOT_ALIVE,
        `Cannot insert "${component_name(type)}" into dead entity ${format_entity_id(id)}`,
        { entity: format_entity_id(id), component: component_name(type) },
      );
    }

    const existing = this.store_for(type);
    if (existing !== undefined && existing.contains(id)) {
      existing.insert(id, value);
      return;
    }

    this.store_or_create(type).insert(id, value);
    this.epoch++;
  }

  /** Remove one component type from an entity, returning the old value. */
  public remove<T extends Component>(
    id: EntityID,
    type: ComponentType<T>,
  ): T | undefined {
    this.assert_not_iterating("remove");
    if (!this.registry.is_alive(id)) return undefined;

    const removed = this.store_for(type)?.remove(id);
    if (removed !== undefined) this.epoch++;
    return removed;
  }

  /** Direct access to one component store, if any entity has used the type. */
  public store<T extends Component>(
    type: ComponentType<T>,
  ): ComponentView<T> | undefined {
    const store = this.store_for(type);
    return store === undefined ? undefined : new StoreView(this, store);
  }

  /** Component classes that have a store. */
  public get component_types(): ComponentType[] {
    return [...this.stores.keys()];
  }

  //=========================================================
  // Queries
  //=========================================================

  /**
   * Iterate entities holding every requested component, read-only.
   *
   *   for (const [id, name] of world.query(ENTITY, Name)) { ... }
   */
  public query<Q extends [ReadTerm, ...ReadTerm[]]>(
    ...terms: Q
  ): QueryIter<QueryRow<Q>> {
    return new QueryIter<QueryRow<Q>>(this, compile_terms(terms, false));
  }

  /**
   * Like query(), but write(T) terms yield mutable references.
   * Requesting one class twice with a write among them throws
   * QUERY_ACCESS_CONFLICT here, before iteration starts.
   */
  public query_mut<Q extends [QueryTerm, ...QueryTerm[]]>(
    ...terms: Q
  ): QueryIter<QueryRow<Q>> {
    return new QueryIter<QueryRow<Q>>(this, compile_terms(terms, true));
  }

  //=========================================================
  // QuerySource / EntityRefSource / BorrowSource
  //=========================================================

  get _epoch(): number {
    return this.epoch;
  }

  _store_for(type: ComponentType): ComponentStore<Component> | undefined {
    return this.stores.get(type);
  }

  _enter_iteration(): void {
    this.iterating++;
  }

  _leave_iteration(): void {
    this.iterating--;
  }

  //=========================================================
  // Internal
  //=========================================================

  private store_for<T extends Component>(
    type: ComponentType<T>,
  ): ComponentStore<T> | undefined {
    // Stores are keyed by the class they hold, so the store under T holds T.
    return unsafe_cast<ComponentStore<T> | undefined>(this.stores.get(type));
  }

  private store_or_create<T extends Component>(
    type: ComponentType<T>,
  ): ComponentStore<T> {
    const existing = this.store_for(type);
    if (existing !== undefined) return existing;

    const store = new ComponentStore(type, this.initial_capacity);
    this.stores.set(type, store);
    this.logger.debug(`created store for ${component_name(type)}`);
    return store;
  }

  private assert_not_iterating(operation: string): void {
    if (this.iterating > 0) {
      throw new ECSError(
        ECS_ERROR.STRUCTURAL_MUTATION_WHILE_BORROWED,
        `Cannot ${operation} while the world is being iterated`,
        { operation },
      );
    }
  }
}
