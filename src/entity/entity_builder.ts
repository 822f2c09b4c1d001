/***
 *
 * EntityBuilder - Deferred component attachment for a freshly spawned entity.
 *
 * world.spawn() allocates the entity immediately and returns a builder.
 * Each .with() call records a pending attach; .build() runs them in
 * call order through the World (so liveness still gates them) and
 * returns the entity.
 *
 *   const e = world.spawn()
 *     .with(Position, { x: 0, y: 0 })
 *     .with(Velocity, { dx: 1, dy: 0 })
 *     .build();
 *
 ***/

import type { EntityID } from "./entity";
import type { TypeKey } from "../component/component";
import { ECS_ERROR, ECSError } from "../utils/error";

/** The slice of World a builder writes through. */
export interface ComponentSink {
  add_component<T>(entity: EntityID, type: TypeKey<T>, value: T): unknown;
}

type PendingAttach = (sink: ComponentSink) => void;

export class EntityBuilder {
  private readonly pending: PendingAttach[] = [];
  private built = false;

  constructor(
    private readonly sink: ComponentSink,
    public readonly entity: EntityID,
  ) {}

  /** Number of attachments waiting for build(). */
  public get pending_count(): number {
    return this.pending.length;
  }

  public with<T>(type: TypeKey<T>, value: T): this {
    if (this.built) this.already_built("with");
    const entity = this.entity;
    this.pending.push((sink) => sink.add_component(entity, type, value));
    return this;
  }

  public build(): EntityID {
    if (this.built) this.already_built("build");
    this.built = true;

    for (let i = 0; i < this.pending.length; i++) this.pending[i](this.sink);
    this.pending.length = 0;
    return this.entity;
  }

  private already_built(method: string): never {
    throw new ECSError(
      ECS_ERROR.ENTITY_ALREADY_BUILT,
      `EntityBuilder.${method}() called after build()`,
      { entity: this.entity },
    );
  }
}
