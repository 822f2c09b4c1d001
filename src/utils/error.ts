export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum ECS_ERROR {
  EID_MAX_INDEX_OVERFLOW = "EID_MAX_INDEX_OVERFLOW",
  EID_MAX_GEN_OVERFLOW = "EID_MAX_GEN_OVERFLOW",
  INVALID_WORLD_OPTIONS = "INVALID_WORLD_OPTIONS",
  ENTITY_ALREADY_BUILT = "ENTITY_ALREADY_BUILT",
  DUPLICATE_SYSTEM = "DUPLICATE_SYSTEM",
  SYSTEM_FAILED = "SYSTEM_FAILED",
}

export class ECSError extends AppError {
  constructor(
    public readonly category: ECS_ERROR,
    message?: string,
    context?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message ?? category, true, context, cause === undefined ? undefined : { cause });
  }
}

export function is_ecs_error(error: unknown): error is ECSError {
  return error instanceof ECSError;
}
