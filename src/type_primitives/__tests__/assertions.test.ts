import { describe, expect, it } from "vitest";
import {
  is_non_negative_integer,
  is_uint32,
  unsafe_cast,
  validate_and_cast,
} from "../assertions";
import { PRIMITIVE_ERROR, PrimitiveError } from "../error";
import type { Brand } from "../brand";

type Slot = Brand<number, "slot">;

describe("assertions", () => {
  //=========================================================
  // is_non_negative_integer / is_uint32
  //=========================================================

  it("is_non_negative_integer accepts zero and positive integers", () => {
    expect(is_non_negative_integer(0)).toBe(true);
    expect(is_non_negative_integer(42)).toBe(true);
    expect(is_non_negative_integer(2 ** 40)).toBe(true);
  });

  it("is_non_negative_integer rejects negatives and non-integers", () => {
    expect(is_non_negative_integer(-1)).toBe(false);
    expect(is_non_negative_integer(1.5)).toBe(false);
    expect(is_non_negative_integer(NaN)).toBe(false);
    expect(is_non_negative_integer(Infinity)).toBe(false);
  });

  it("is_uint32 caps at 0xFFFFFFFF", () => {
    expect(is_uint32(0xffffffff)).toBe(true);
    expect(is_uint32(2 ** 32)).toBe(false);
    expect(is_uint32(-1)).toBe(false);
  });

  //=========================================================
  // validate_and_cast
  //=========================================================

  it("validate_and_cast returns the value when validation passes", () => {
    const slot = validate_and_cast<number, Slot>(
      42,
      is_non_negative_integer,
      "slot must be a non-negative integer",
    );
    expect(slot).toBe(42);
  });

  it("validate_and_cast throws VALIDATION_FAIL_CONDITION on failure", () => {
    let caught: unknown;
    try {
      validate_and_cast(-1, is_non_negative_integer, "non-negative integer");
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(PrimitiveError);
    if (!(caught instanceof PrimitiveError)) return;
    expect(caught.category).toBe(PRIMITIVE_ERROR.VALIDATION_FAIL_CONDITION);
    expect(caught.message).toBe(
      "Expected value to meet validation: non-negative integer",
    );
    expect(caught.context).toEqual({ value: -1 });
    expect(caught.is_operational).toBe(false);
  });

  //=========================================================
  // unsafe_cast
  //=========================================================

  it("unsafe_cast returns the same reference", () => {
    const obj = { a: 1 };
    expect(unsafe_cast<{ a: number }>(obj)).toBe(obj);
  });
});
