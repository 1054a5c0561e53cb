import { bench, describe } from "vitest";
import { World } from "../world";
import { ENTITY, write } from "../query/query";
import type { EntityID } from "../entity/entity";

class Position {
  constructor(
    public x = 0,
    public y = 0,
  ) {}
}
class Velocity {
  constructor(
    public dx = 1,
    public dy = 1,
  ) {}
}
class Health {
  constructor(public hp = 100) {}
}
class Dead {}

//=========================================================
// Helpers
//=========================================================

function xorshift32(seed: number) {
  let state = seed;
  return () => {
    state ^= state << 13;
    state ^= state >> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}

function populated(n: number): World {
  const w = new World();
  const rand = xorshift32(42);
  for (let i = 0; i < n; i++) {
    const id = w.spawn(new Position(), new Velocity());
    if (rand() < 0.5) w.insert(id, new Health());
    if (rand() < 0.1) w.insert(id, new Dead());
  }
  return w;
}

//=========================================================
// Entity lifecycle
//=========================================================

describe("entity lifecycle", () => {
  bench("spawn_empty_10k", () => {
    const w = new World();
    for (let i = 0; i < 10_000; i++) w.spawn();
  });

  bench("spawn_bundle_10k", () => {
    const w = new World();
    for (let i = 0; i < 10_000; i++) w.spawn(new Position(), new Velocity());
  });

  bench("spawn_despawn_cycle", () => {
    const w = new World();
    for (let c = 0; c < 10; c++) {
      const ids: EntityID[] = [];
      for (let i = 0; i < 1_000; i++) ids.push(w.spawn(new Position()));
      for (let i = 0; i < ids.length; i++) w.despawn(ids[i]);
    }
  });
});

//=========================================================
// Component access
//=========================================================

describe("component access", () => {
  const w = new World();
  const ids: EntityID[] = [];
  for (let i = 0; i < 10_000; i++) ids.push(w.spawn(new Position(i, i)));

  bench("get_10k", () => {
    let sum = 0;
    for (let i = 0; i < ids.length; i++) sum += w.get(ids[i], Position)?.x ?? 0;
    if (sum < 0) throw new Error("unreachable");
  });

  bench("insert_overwrite_10k", () => {
    for (let i = 0; i < ids.length; i++) w.insert(ids[i], new Position(i, 0));
  });
});

//=========================================================
// Queries
//=========================================================

describe("queries", () => {
  const w = populated(10_000);

  bench("query_mut_integrate_10k", () => {
    for (const [pos, vel] of w.query_mut(write(Position), Velocity)) {
      pos.x += vel.dx;
      pos.y += vel.dy;
    }
  });

  bench("query_for_each_10k", () => {
    w.query_mut(write(Position), Velocity).for_each(([pos, vel]) => {
      pos.x += vel.dx;
      pos.y += vel.dy;
    });
  });

  bench("query_sparse_driver", () => {
    let n = 0;
    for (const [id] of w.query(ENTITY, Position, Dead)) n += id > -1 ? 1 : 0;
    if (n < 0) throw new Error("unreachable");
  });

  bench("query_count_three_terms", () => {
    w.query(Position, Velocity, Health).count();
  });
});
