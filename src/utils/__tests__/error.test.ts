import { describe, expect, it } from "vitest";
import { AppError, ECSError, ECS_ERROR, is_ecs_error } from "../error";
import { PRIMITIVE_ERROR, PrimitiveError } from "type_primitives";

describe("ECSError", () => {
  //=========================================================
  // Construction & properties
  //=========================================================

  it("stores the category", () => {
    const err = new ECSError(ECS_ERROR.ENTITY_ALREADY_BUILT);
    expect(err.category).toBe(ECS_ERROR.ENTITY_ALREADY_BUILT);
  });

  it("uses category as default message when message is omitted", () => {
    const err = new ECSError(ECS_ERROR.EID_MAX_GEN_OVERFLOW);
    expect(err.message).toBe("EID_MAX_GEN_OVERFLOW");
  });

  it("uses provided message when given", () => {
    const err = new ECSError(
      ECS_ERROR.EID_MAX_INDEX_OVERFLOW,
      "index exceeded limit",
    );
    expect(err.message).toBe("index exceeded limit");
  });

  it("is always operational", () => {
    const err = new ECSError(ECS_ERROR.INVALID_WORLD_OPTIONS);
    expect(err.is_operational).toBe(true);
  });

  it("context is undefined when not provided", () => {
    const err = new ECSError(ECS_ERROR.DUPLICATE_SYSTEM);
    expect(err.context).toBeUndefined();
  });

  it("stores provided context", () => {
    const err = new ECSError(ECS_ERROR.DUPLICATE_SYSTEM, "dup", {
      system: "physics",
    });
    expect(err.context).toEqual({ system: "physics" });
  });

  it("carries the cause when given", () => {
    const root = new Error("root");
    const err = new ECSError(ECS_ERROR.SYSTEM_FAILED, "failed", {}, root);
    expect(err.cause).toBe(root);
  });

  it("has no cause when none is given", () => {
    const err = new ECSError(ECS_ERROR.SYSTEM_FAILED);
    expect("cause" in err).toBe(false);
  });

  it("sets name to ECSError", () => {
    const err = new ECSError(ECS_ERROR.ENTITY_ALREADY_BUILT);
    expect(err.name).toBe("ECSError");
  });

  //=========================================================
  // Inheritance
  //=========================================================

  it("is an instance of AppError and Error", () => {
    const err = new ECSError(ECS_ERROR.SYSTEM_FAILED);
    expect(err).toBeInstanceOf(AppError);
    expect(err).toBeInstanceOf(Error);
  });

  //=========================================================
  // is_ecs_error guard
  //=========================================================

  it("is_ecs_error returns true for ECSError instances", () => {
    expect(is_ecs_error(new ECSError(ECS_ERROR.SYSTEM_FAILED))).toBe(true);
  });

  it("is_ecs_error returns false for other errors and values", () => {
    expect(is_ecs_error(new Error("plain"))).toBe(false);
    expect(
      is_ecs_error(
        new PrimitiveError(PRIMITIVE_ERROR.BORROW_CONFLICT, "conflict"),
      ),
    ).toBe(false);
    expect(is_ecs_error(null)).toBe(false);
    expect(is_ecs_error("string")).toBe(false);
    expect(is_ecs_error({})).toBe(false);
  });
});

describe("PrimitiveError", () => {
  it("is a non-operational AppError named PrimitiveError", () => {
    const err = new PrimitiveError(PRIMITIVE_ERROR.BORROW_CONFLICT, "nope", {
      lock: "x",
    });
    expect(err).toBeInstanceOf(AppError);
    expect(err.name).toBe("PrimitiveError");
    expect(err.is_operational).toBe(false);
    expect(err.category).toBe(PRIMITIVE_ERROR.BORROW_CONFLICT);
    expect(err.context).toEqual({ lock: "x" });
  });
});
