import { bench, describe } from "vitest";
import { World } from "../world";
import { define_type } from "../component/component";
import type { EntityID } from "../entity/entity";

//=========================================================
// Helpers
//=========================================================

interface Position {
  x: number;
  y: number;
}
interface Velocity {
  dx: number;
  dy: number;
}

const Position = define_type<Position>("Position", {
  clone: (p) => ({ x: p.x, y: p.y }),
});
const Velocity = define_type<Velocity>("Velocity", {
  clone: (v) => ({ dx: v.dx, dy: v.dy }),
});

const N = 10_000;

function populated_world(): World {
  const world = new World({ log_level: "silent", initial_capacity: N });
  for (let i = 0; i < N; i++) {
    const builder = world.spawn().with(Position, { x: i, y: 0 });
    if (i % 2 === 0) builder.with(Velocity, { dx: 1, dy: 1 });
    builder.build();
  }
  return world;
}

//=========================================================
// Benchmarks
//=========================================================

describe("entity lifecycle", () => {
  bench("spawn + despawn 10k", () => {
    const world = new World({ log_level: "silent" });
    const ids: EntityID[] = [];
    for (let i = 0; i < N; i++) ids.push(world.spawn().build());
    for (let i = 0; i < N; i++) world.despawn(ids[i]);
  });

  bench("spawn 10k with two components", () => {
    populated_world();
  });
});

describe("queries", () => {
  const world = populated_world();

  bench("query snapshot (10k rows)", () => {
    world.query(Position);
  });

  bench("query_mut integrate (10k rows)", () => {
    world.query_mut(Position, (_e, pos) => {
      pos.x += 1;
    });
  });

  bench("query_builder Position+Velocity (5k matches)", () => {
    world.query_builder().with(Position).with(Velocity).collect();
  });
});
