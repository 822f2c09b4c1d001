import { describe, expect, it } from "vitest";
import { Table } from "../table";
import { define_type } from "../component";
import { create_entity_id } from "../../entity/entity";
import { PRIMITIVE_ERROR, PrimitiveError } from "type_primitives";

interface Health {
  hp: number;
}

const Health = define_type<Health>("Health");
const Armor = define_type<number>("Armor");

const e0 = create_entity_id(0, 0);
const e1 = create_entity_id(1, 0);
const stale_e0 = create_entity_id(0, 1);

describe("Table", () => {
  //=========================================================
  // Rows
  //=========================================================

  it("insert then get returns a copy", () => {
    const table = new Table(Health);
    const value = { hp: 10 };
    table.insert(e0, value);

    const got = table.get(e0);
    expect(got).toEqual({ hp: 10 });
    expect(got).not.toBe(value);
    expect(table.size).toBe(1);
  });

  it("insert overwrites the row at the same index", () => {
    const table = new Table(Health);
    table.insert(e0, { hp: 10 });
    table.insert(e0, { hp: 3 });
    expect(table.get(e0)).toEqual({ hp: 3 });
    expect(table.size).toBe(1);
  });

  it("a handle with another generation does not see the row", () => {
    const table = new Table(Health);
    table.insert(e0, { hp: 10 });

    expect(table.contains(stale_e0)).toBe(false);
    expect(table.get(stale_e0)).toBeUndefined();
    expect(table.update(stale_e0, () => ({ hp: 0 }))).toBe(false);
    expect(table.remove(stale_e0)).toBeUndefined();
    expect(table.get(e0)).toEqual({ hp: 10 });
  });

  it("remove returns the stored value", () => {
    const table = new Table(Health);
    table.insert(e0, { hp: 10 });
    table.insert(e1, { hp: 20 });

    expect(table.remove(e0)).toEqual({ hp: 10 });
    expect(table.contains(e0)).toBe(false);
    expect(table.get(e1)).toEqual({ hp: 20 });
  });

  it("remove_index drops the row whatever its generation", () => {
    const table = new Table(Health);
    table.insert(stale_e0, { hp: 1 });
    expect(table.remove_index(0)).toBe(true);
    expect(table.remove_index(0)).toBe(false);
    expect(table.size).toBe(0);
  });

  it("update replaces primitive values", () => {
    const table = new Table(Armor);
    table.insert(e0, 5);
    expect(table.update(e0, (a) => a + 2)).toBe(true);
    expect(table.get(e0)).toBe(7);
  });

  it("clear removes every row", () => {
    const table = new Table(Armor);
    table.insert(e0, 1);
    table.insert(e1, 2);
    table.clear();
    expect(table.size).toBe(0);
    expect(table.contains(e1)).toBe(false);
  });

  //=========================================================
  // Borrows
  //=========================================================

  it("borrow_mut hands out the stored value for in-place mutation", () => {
    const table = new Table(Health);
    table.insert(e0, { hp: 10 });
    table.borrow_mut(e0, (h) => {
      if (h) h.hp -= 4;
    });
    expect(table.get(e0)).toEqual({ hp: 6 });
  });

  it("borrow gives undefined for a missing row", () => {
    const table = new Table(Health);
    expect(table.borrow(e1, (h) => h)).toBeUndefined();
  });

  it("touching the table from inside borrow_mut is a borrow conflict", () => {
    const table = new Table(Health);
    table.insert(e0, { hp: 10 });

    let caught: unknown;
    try {
      table.borrow_mut(e0, () => table.get(e1));
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(PrimitiveError);
    if (!(caught instanceof PrimitiveError)) return;
    expect(caught.category).toBe(PRIMITIVE_ERROR.BORROW_CONFLICT);
    expect(caught.context).toEqual({
      lock: "table:Health",
      mode: "read",
      readers: 0,
      writing: true,
    });
  });

  //=========================================================
  // Views
  //=========================================================

  it("read view iterates (entity, value) pairs", () => {
    const table = new Table(Armor);
    table.insert(e0, 1);
    table.insert(e1, 2);

    const rows = table.read((view) => [...view]);
    expect(rows).toEqual([
      [e0, 1],
      [e1, 2],
    ]);
  });

  it("write view set only replaces rows owned by the entity", () => {
    const table = new Table(Armor);
    table.insert(e0, 1);

    const results = table.write((view) => [
      view.set(e0, 9),
      view.set(stale_e0, 100),
      view.set(e1, 100),
    ]);
    expect(results).toEqual([true, false, false]);
    expect(table.get(e0)).toBe(9);
    expect(table.size).toBe(1);
  });

  //=========================================================
  // Type erasure
  //=========================================================

  it("downcast succeeds only for the table's own key", () => {
    const table = new Table(Health);
    expect(table.downcast(Health)).toBe(table);
    expect(table.downcast(Armor)).toBeUndefined();
  });

  it("exposes the key's id and name", () => {
    const table = new Table(Health);
    expect(table.type_id).toBe(Health.id);
    expect(table.type_name).toBe("Health");
  });
});
