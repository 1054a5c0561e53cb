/***
 * EntityRef — Read-only handle on one live entity.
 *
 * Returned by world.entity(id) for ad hoc lookups by component class:
 *
 *   const bird = world.entity(id);
 *   bird?.get(Name)?.value;      // "Red Bird"
 *   bird?.has(CanFly);           // true
 *
 * There is no mutation here; values change through query_mut() rows or
 * world.insert(). The ref records the world's structural epoch when it
 * is created, and any use after a spawn, despawn, insert of a new
 * component type or remove throws STRUCTURAL_MUTATION_WHILE_BORROWED.
 *
 ***/

import { type EntityID, format_entity_id } from "./entity";
import type { Component, ComponentType } from "../component/component";
import { ECS_ERROR, ECSError } from "../utils/error";

/** What an EntityRef needs from the World. */
export interface EntityRefSource {
  readonly _epoch: number;
  get<T extends Component>(id: EntityID, type: ComponentType<T>): Readonly<T> | undefined;
  has(id: EntityID, type: ComponentType): boolean;
}

export class EntityRef {
  private readonly source: EntityRefSource;
  private readonly epoch: number;
  public readonly id: EntityID;

  constructor(source: EntityRefSource, id: EntityID) {
    this.source = source;
    this.epoch = source._epoch;
    this.id = id;
  }

  /** The entity's T, or undefined if it has none. */
  get<T extends Component>(type: ComponentType<T>): Readonly<T> | undefined {
    this.check_epoch();
    return this.source.get(this.id, type);
  }

  has(type: ComponentType): boolean {
    this.check_epoch();
    return this.source.has(this.id, type);
  }

  private check_epoch(): void {
    if (this.source._epoch !== this.epoch) {
      throw new ECSError(
        ECS_ERROR.STRUCTURAL_MUTATION_WHILE_BORROWED,
        `EntityRef ${format_entity_id(this.id)} used after the world was structurally modified`,
        { entity: format_entity_id(this.id) },
      );
    }
  }
}
