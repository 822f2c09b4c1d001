/***
 * Primitive errors — validation and borrow failures.
 *
 * Kept apart from ECSError so the primitives never depend on the
 * ECS error hierarchy.
 *
 ***/

import { AppError } from "utils/error";

export enum PRIMITIVE_ERROR {
  VALIDATION_FAIL_CONDITION = "VALIDATION_FAIL_CONDITION",
  BORROW_CONFLICT = "BORROW_CONFLICT",
}

export class PrimitiveError extends AppError {
  constructor(
    public readonly category: PRIMITIVE_ERROR,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message, false, context);
  }
}
