/***
 *
 * Component - Class instances keyed by their constructor
 *
 * Any class can be a component; there is no registration step. The
 * constructor is the component's type identity, so every instance of
 * `Position` lands in the Position store:
 *
 *   class Position { constructor(public x = 0, public y = 0) {} }
 *   class CanFly {}                 // tag: no fields, membership only
 *
 *   world.spawn(new Position(1, 2), new CanFly());
 *
 * Plain object literals are rejected: they all share `Object` as their
 * constructor and would collapse into a single store.
 *
 ***/

import { unsafe_cast } from "type_primitives";
import { ECS_ERROR, ECSError } from "../utils/error";

//=========================================================
// Types
//=========================================================

/** Marker for values that can be stored. Carries no behaviour. */
export type Component = object;

/**
 * A component class. `never[]` parameters accept any constructor
 * signature; `abstract` admits abstract base classes as well.
 */
export type ComponentType<T extends Component = Component> = abstract new (
  ...args: never[]
) => T;

/** Readable name for diagnostics. Anonymous classes fall back to a placeholder. */
export function component_name(type: ComponentType): string {
  return type.name === "" ? "<anonymous component>" : type.name;
}

//=========================================================
// Type identity
//=========================================================

/**
 * Resolve the component type of a value.
 *
 * Throws INVALID_COMPONENT for values whose constructor cannot serve
 * as a type key: object literals, null-prototype objects, arrays and
 * functions.
 */
export function component_type_of(value: Component): ComponentType {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new ECSError(
      ECS_ERROR.INVALID_COMPONENT,
      "Components must be class instances",
      { received: Array.isArray(value) ? "array" : typeof value },
    );
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || proto === Object.prototype) {
    throw new ECSError(
      ECS_ERROR.INVALID_COMPONENT,
      "Components must be class instances, not plain objects",
    );
  }

  const ctor: unknown = value.constructor;
  if (typeof ctor !== "function") {
    throw new ECSError(
      ECS_ERROR.INVALID_COMPONENT,
      "Component prototype has no constructor",
    );
  }

  // The constructor of an instance of T constructs T.
  return unsafe_cast<ComponentType>(ctor);
}
