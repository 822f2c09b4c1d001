import { describe, expect, it } from "vitest";
import { ComponentManager } from "../component_manager";
import { define_type } from "../component";
import { create_entity_id } from "../../entity/entity";
import { PRIMITIVE_ERROR, PrimitiveError } from "type_primitives";

const Position = define_type<{ x: number; y: number }>("Position");
const Velocity = define_type<{ dx: number; dy: number }>("Velocity");
const Tag = define_type<string>("Tag");

const e0 = create_entity_id(0, 0);
const e1 = create_entity_id(1, 0);

describe("ComponentManager", () => {
  //=========================================================
  // Registration
  //=========================================================

  it("registers tables lazily and idempotently", () => {
    const cm = new ComponentManager();
    expect(cm.table_count).toBe(0);
    expect(cm.is_registered(Position)).toBe(false);

    cm.register(Position);
    cm.register(Position);
    cm.add_component(e0, Velocity, { dx: 1, dy: 0 });

    expect(cm.table_count).toBe(2);
    expect(cm.is_registered(Position)).toBe(true);
    expect(cm.is_registered(Velocity)).toBe(true);
  });

  //=========================================================
  // Per-entity access
  //=========================================================

  it("keeps component types and entities isolated", () => {
    const cm = new ComponentManager();
    cm.add_component(e0, Position, { x: 1, y: 1 });
    cm.add_component(e0, Velocity, { dx: 2, dy: 2 });
    cm.add_component(e1, Position, { x: 3, y: 3 });

    cm.add_component(e0, Position, { x: 9, y: 9 });

    expect(cm.get_component(e0, Position)).toEqual({ x: 9, y: 9 });
    expect(cm.get_component(e0, Velocity)).toEqual({ dx: 2, dy: 2 });
    expect(cm.get_component(e1, Position)).toEqual({ x: 3, y: 3 });
  });

  it("unregistered types read as absent", () => {
    const cm = new ComponentManager();
    expect(cm.get_component(e0, Tag)).toBeUndefined();
    expect(cm.has_component(e0, Tag)).toBe(false);
    expect(cm.remove_component(e0, Tag)).toBeUndefined();
    expect(cm.update_component(e0, Tag, (t) => t)).toBe(false);
    expect(cm.with_component(e0, Tag, (t) => t === undefined)).toBe(true);
    expect(cm.storage_size(Tag)).toBe(0);
  });

  it("with_component_mut mutates in place", () => {
    const cm = new ComponentManager();
    cm.add_component(e0, Position, { x: 0, y: 0 });
    cm.with_component_mut(e0, Position, (p) => {
      if (p) p.x = 5;
    });
    expect(cm.get_component(e0, Position)).toEqual({ x: 5, y: 0 });
  });

  it("update_component replaces a primitive value", () => {
    const cm = new ComponentManager();
    cm.add_component(e0, Tag, "a");
    expect(cm.update_component(e0, Tag, (t) => t + "b")).toBe(true);
    expect(cm.get_component(e0, Tag)).toBe("ab");
  });

  it("remove_all_components clears the index in every table", () => {
    const cm = new ComponentManager();
    cm.add_component(e0, Position, { x: 0, y: 0 });
    cm.add_component(e0, Tag, "gone");
    cm.add_component(e1, Tag, "kept");
    cm.register(Velocity);

    expect(cm.remove_all_components(e0)).toBe(2);
    expect(cm.has_component(e0, Position)).toBe(false);
    expect(cm.has_component(e0, Tag)).toBe(false);
    expect(cm.get_component(e1, Tag)).toBe("kept");
  });

  it("remove_all_components also sweeps a row left by an older generation", () => {
    const cm = new ComponentManager();
    cm.add_component(e0, Tag, "orphan");
    expect(cm.remove_all_components(create_entity_id(0, 1))).toBe(1);
    expect(cm.storage_size(Tag)).toBe(0);
  });

  //=========================================================
  // Lock discipline
  //=========================================================

  it("another type can be touched, even registered, inside a mutable borrow", () => {
    const cm = new ComponentManager();
    cm.add_component(e0, Position, { x: 1, y: 2 });

    cm.with_component_mut(e0, Position, (p) => {
      if (p) cm.add_component(e0, Tag, `at ${p.x},${p.y}`);
    });
    expect(cm.get_component(e0, Tag)).toBe("at 1,2");
  });

  it("the same type inside a mutable borrow is a borrow conflict", () => {
    const cm = new ComponentManager();
    cm.add_component(e0, Position, { x: 1, y: 2 });

    let caught: unknown;
    try {
      cm.with_component_mut(e0, Position, () => cm.get_component(e1, Position));
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(PrimitiveError);
    if (!(caught instanceof PrimitiveError)) return;
    expect(caught.category).toBe(PRIMITIVE_ERROR.BORROW_CONFLICT);

    // guard released after the throw
    expect(cm.get_component(e0, Position)).toEqual({ x: 1, y: 2 });
  });

  it("remove_all_components removes nothing while any table is borrowed", () => {
    const cm = new ComponentManager();
    cm.add_component(e0, Tag, "kept");
    cm.add_component(e0, Position, { x: 1, y: 2 });

    expect(() =>
      cm.with_component(e0, Position, () => cm.remove_all_components(e0)),
    ).toThrow(PrimitiveError);
    expect(cm.get_component(e0, Tag)).toBe("kept");
    expect(cm.get_component(e0, Position)).toEqual({ x: 1, y: 2 });
  });

  it("clear empties nothing while any table is borrowed", () => {
    const cm = new ComponentManager();
    cm.add_component(e0, Tag, "kept");
    cm.add_component(e1, Position, { x: 0, y: 0 });

    expect(() => cm.with_storage(Position, () => cm.clear())).toThrow(
      PrimitiveError,
    );
    expect(cm.storage_size(Tag)).toBe(1);
    expect(cm.storage_size(Position)).toBe(1);
  });

  it("nested reads of the same type are allowed", () => {
    const cm = new ComponentManager();
    cm.add_component(e0, Position, { x: 1, y: 2 });
    const x = cm.with_component(
      e0,
      Position,
      (p) => (p?.x ?? 0) + (cm.get_component(e0, Position)?.x ?? 0),
    );
    expect(x).toBe(2);
  });

  //=========================================================
  // Bulk access
  //=========================================================

  it("with_storage exposes the whole table", () => {
    const cm = new ComponentManager();
    cm.add_component(e0, Tag, "a");
    cm.add_component(e1, Tag, "b");

    const seen = cm.with_storage(Tag, (table) => {
      const out: string[] = [];
      table?.for_each((_e, v) => out.push(v));
      return out;
    });
    expect(seen).toEqual(["a", "b"]);
    expect(cm.with_storage(Velocity, (table) => table)).toBeUndefined();
  });

  it("with_storage_mut can set values", () => {
    const cm = new ComponentManager();
    cm.add_component(e0, Tag, "a");
    cm.with_storage_mut(Tag, (table) => table?.set(e0, "z"));
    expect(cm.get_component(e0, Tag)).toBe("z");
  });

  it("clear empties rows but keeps tables registered", () => {
    const cm = new ComponentManager();
    cm.add_component(e0, Tag, "a");
    cm.add_component(e1, Position, { x: 0, y: 0 });
    cm.clear();

    expect(cm.table_count).toBe(2);
    expect(cm.storage_size(Tag)).toBe(0);
    expect(cm.storage_size(Position)).toBe(0);
  });
});
