import { describe, expect, it, vi } from "vitest";
import { World } from "../world";
import {
  create_entity_id,
  get_entity_generation,
  get_entity_index,
} from "../entity/entity";
import { ECS_ERROR, ECSError } from "../utils/error";
import { AssertionError } from "type_primitives";
import type { Logger } from "../utils/logger";

class Name {
  constructor(public value: string) {}
}
class Health {
  constructor(public hp: number) {}
}
class Frozen {}

function fake_logger() {
  return { debug: vi.fn(), warn: vi.fn() } satisfies Logger;
}

function category_of(fn: () => unknown): ECS_ERROR {
  try {
    fn();
  } catch (e) {
    if (e instanceof ECSError) return e.category;
    throw e;
  }
  throw new Error("expected an ECSError");
}

describe("World", () => {
  //=========================================================
  // Construction
  //=========================================================

  it("starts empty", () => {
    const world = new World();
    expect(world.entity_count).toBe(0);
    expect(world.component_types).toEqual([]);
  });

  it("rejects a non-positive initial_capacity", () => {
    expect(() => new World({ initial_capacity: 0 })).toThrow(AssertionError);
    expect(() => new World({ initial_capacity: 2.5 })).toThrow(AssertionError);
  });

  it("grows past a small initial_capacity", () => {
    const world = new World({ initial_capacity: 1 });
    const ids = [0, 1, 2, 3, 4].map((i) => world.spawn(new Health(i)));
    expect(ids.map((id) => world.get(id, Health)?.hp)).toEqual([0, 1, 2, 3, 4]);
  });

  //=========================================================
  // Spawn
  //=========================================================

  it("spawn returns distinct live IDs", () => {
    const world = new World();
    const a = world.spawn(new Name("a"));
    const b = world.spawn(new Name("b"));
    expect(a).not.toBe(b);
    expect(world.is_alive(a)).toBe(true);
    expect(world.is_alive(b)).toBe(true);
    expect(world.entity_count).toBe(2);
  });

  it("stores the bundle objects themselves", () => {
    const world = new World();
    const name = new Name("a");
    const id = world.spawn(name, new Health(10));
    expect(world.get(id, Name)).toBe(name);
    expect(world.get(id, Health)?.hp).toBe(10);
  });

  it("an empty bundle creates a bare entity", () => {
    const world = new World();
    const id = world.spawn();
    expect(world.is_alive(id)).toBe(true);
    expect(world.has(id, Name)).toBe(false);
  });

  it("a tag component marks membership", () => {
    const world = new World();
    const id = world.spawn(new Frozen());
    expect(world.has(id, Frozen)).toBe(true);
  });

  it("a duplicate class in the bundle throws and leaves the world untouched", () => {
    const world = new World();
    expect(category_of(() => world.spawn(new Name("a"), new Name("b")))).toBe(
      ECS_ERROR.DUPLICATE_BUNDLE_COMPONENT,
    );
    expect(world.entity_count).toBe(0);
    expect(world.store(Name)).toBeUndefined();
  });

  it("a plain object in the bundle throws INVALID_COMPONENT", () => {
    const world = new World();
    expect(category_of(() => world.spawn(new Name("a"), { hp: 1 }))).toBe(
      ECS_ERROR.INVALID_COMPONENT,
    );
    expect(world.entity_count).toBe(0);
    expect(world.store(Name)).toBeUndefined();
  });

  //=========================================================
  // Lookup
  //=========================================================

  it("get returns undefined for a component the entity lacks", () => {
    const world = new World();
    const id = world.spawn(new Name("a"));
    expect(world.get(id, Health)).toBeUndefined();
    expect(world.has(id, Health)).toBe(false);
  });

  it("lookups on a never-issued ID are absent, not errors", () => {
    const world = new World();
    world.spawn(new Name("a"));
    const unknown = create_entity_id(99, 0);
    expect(world.is_alive(unknown)).toBe(false);
    expect(world.get(unknown, Name)).toBeUndefined();
    expect(world.has(unknown, Name)).toBe(false);
    expect(world.entity(unknown)).toBeUndefined();
  });

  it("entity() returns a ref for a live entity", () => {
    const world = new World();
    const id = world.spawn(new Name("a"));
    const ref = world.entity(id);
    expect(ref?.id).toBe(id);
    expect(ref?.get(Name)?.value).toBe("a");
    expect(ref?.has(Health)).toBe(false);
  });

  //=========================================================
  // Despawn and recycling
  //=========================================================

  it("despawn drops every component", () => {
    const world = new World();
    const id = world.spawn(new Name("a"), new Health(3));
    expect(world.despawn(id)).toBe(true);
    expect(world.is_alive(id)).toBe(false);
    expect(world.entity_count).toBe(0);
    expect(world.store(Name)?.size).toBe(0);
    expect(world.store(Health)?.size).toBe(0);
  });

  it("despawning twice returns false the second time", () => {
    const world = new World();
    const id = world.spawn(new Name("a"));
    world.despawn(id);
    expect(world.despawn(id)).toBe(false);
  });

  it("recycles the slot with a bumped generation", () => {
    const world = new World();
    const old_id = world.spawn(new Name("old"));
    world.despawn(old_id);
    const new_id = world.spawn(new Name("new"));

    expect(get_entity_index(new_id)).toBe(get_entity_index(old_id));
    expect(get_entity_generation(new_id)).toBe(1);
    expect(new_id).not.toBe(old_id);
  });

  it("a stale ID never sees the recycled slot's components", () => {
    const world = new World();
    const old_id = world.spawn(new Name("old"));
    world.despawn(old_id);
    const new_id = world.spawn(new Name("new"));

    expect(world.is_alive(old_id)).toBe(false);
    expect(world.get(old_id, Name)).toBeUndefined();
    expect(world.has(old_id, Name)).toBe(false);
    expect(world.entity(old_id)).toBeUndefined();
    expect(world.despawn(old_id)).toBe(false);
    expect(world.get(new_id, Name)?.value).toBe("new");
  });

  it("despawn leaves other entities' components in place", () => {
    const world = new World();
    const a = world.spawn(new Name("a"));
    const b = world.spawn(new Name("b"));
    const c = world.spawn(new Name("c"));
    world.despawn(a);
    expect(world.get(b, Name)?.value).toBe("b");
    expect(world.get(c, Name)?.value).toBe("c");
  });

  //=========================================================
  // Insert / remove
  //=========================================================

  it("insert adds a component to a live entity", () => {
    const world = new World();
    const id = world.spawn(new Name("a"));
    world.insert(id, new Health(7));
    expect(world.get(id, Health)?.hp).toBe(7);
  });

  it("insert replaces an existing component", () => {
    const world = new World();
    const id = world.spawn(new Health(1));
    const replacement = new Health(2);
    world.insert(id, replacement);
    expect(world.get(id, Health)).toBe(replacement);
    expect(world.store(Health)?.size).toBe(1);
  });

  it("insert into a dead entity throws ENTITY_NOT_ALIVE", () => {
    const world = new World();
    const id = world.spawn();
    world.despawn(id);
    expect(category_of(() => world.insert(id, new Health(1)))).toBe(
      ECS_ERROR.ENTITY_NOT_ALIVE,
    );
    expect(world.store(Health)).toBeUndefined();
  });

  it("insert rejects a plain object", () => {
    const world = new World();
    const id = world.spawn();
    expect(category_of(() => world.insert(id, { hp: 1 }))).toBe(
      ECS_ERROR.INVALID_COMPONENT,
    );
  });

  it("remove returns the old value and clears membership", () => {
    const world = new World();
    const health = new Health(4);
    const id = world.spawn(new Name("a"), health);
    expect(world.remove(id, Health)).toBe(health);
    expect(world.has(id, Health)).toBe(false);
    expect(world.has(id, Name)).toBe(true);
  });

  it("remove of an absent component or dead entity returns undefined", () => {
    const world = new World();
    const id = world.spawn(new Name("a"));
    expect(world.remove(id, Health)).toBeUndefined();
    world.despawn(id);
    expect(world.remove(id, Name)).toBeUndefined();
  });

  //=========================================================
  // Stores
  //=========================================================

  it("store() exposes one store per class, created on first use", () => {
    const world = new World();
    expect(world.store(Name)).toBeUndefined();
    const id = world.spawn(new Name("a"), new Health(2));

    const names = world.store(Name);
    expect(names?.type).toBe(Name);
    expect(names?.size).toBe(1);
    expect(names?.get(id)?.value).toBe("a");
    expect(world.component_types).toEqual([Name, Health]);
  });

  it("store() allows in-place mutation", () => {
    const world = new World();
    const id = world.spawn(new Health(2));
    for (const [, h] of world.store(Health)?.entries_mut() ?? []) h.hp *= 10;
    expect(world.get(id, Health)?.hp).toBe(20);
  });

  //=========================================================
  // Logging
  //=========================================================

  it("logs store creation to the supplied logger", () => {
    const logger = fake_logger();
    const world = new World({ logger });
    world.spawn(new Name("a"));
    world.spawn(new Name("b"));
    expect(logger.debug).toHaveBeenCalledTimes(1);
    expect(logger.debug).toHaveBeenCalledWith("created store for Name");
  });

  it("logs a stale despawn", () => {
    const logger = fake_logger();
    const world = new World({ logger });
    const id = world.spawn();
    world.despawn(id);
    world.despawn(id);
    expect(logger.debug).toHaveBeenLastCalledWith(
      "despawn ignored for stale entity 0v0",
    );
  });

  it("debug: true logs to the console", () => {
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
    try {
      new World({ debug: true }).spawn(new Name("a"));
      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy.mock.calls[0][0]).toMatch(
        /^\[\d\d:\d\d:\d\d\] \[DEBUG\] \[ecs\] created store for Name$/,
      );
    } finally {
      spy.mockRestore();
    }
  });

  it("is silent by default", () => {
    const spy = vi.spyOn(console, "debug").mockImplementation(() => {});
    try {
      new World().spawn(new Name("a"));
      expect(spy).not.toHaveBeenCalled();
    } finally {
      spy.mockRestore();
    }
  });
});
