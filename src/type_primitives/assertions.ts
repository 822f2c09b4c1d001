/***
 * Assertions — Dev-only runtime validation and branded casting.
 *
 * Checks are guarded by __DEV__ and drop out of production builds.
 * validate_and_cast is how branded IDs are minted: it validates in dev
 * and hands the value back as the branded type. unsafe_cast skips every
 * check and is reserved for callers that have already proven the type.
 *
 ***/

import { PRIMITIVE_ERROR, PrimitiveError } from "./error";

export const is_non_negative_integer = (v: number): boolean =>
  Number.isInteger(v) && v >= 0;

export const is_uint32 = (v: number): boolean =>
  is_non_negative_integer(v) && v <= 0xffffffff;

export function validate_and_cast<T, Result extends T = T>(
  value: T,
  validator: (v: T) => boolean,
  err_message: string,
): Result {
  if (__DEV__ && !validator(value)) {
    throw new PrimitiveError(
      PRIMITIVE_ERROR.VALIDATION_FAIL_CONDITION,
      `Expected value to meet validation: ${err_message}`,
      { value },
    );
  }
  return value as Result;
}

export function unsafe_cast<T>(value: unknown): T {
  return value as T;
}
