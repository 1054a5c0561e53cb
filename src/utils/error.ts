export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum ECS_ERROR {
  EID_MAX_INDEX_OVERFLOW = "EID_MAX_INDEX_OVERFLOW",
  EID_MAX_GEN_OVERFLOW = "EID_MAX_GEN_OVERFLOW",
  ENTITY_NOT_ALIVE = "ENTITY_NOT_ALIVE",
  INVALID_COMPONENT = "INVALID_COMPONENT",
  DUPLICATE_BUNDLE_COMPONENT = "DUPLICATE_BUNDLE_COMPONENT",
  QUERY_ACCESS_CONFLICT = "QUERY_ACCESS_CONFLICT",
  EMPTY_QUERY = "EMPTY_QUERY",
  WRITE_TERM_IN_READ_QUERY = "WRITE_TERM_IN_READ_QUERY",
  STRUCTURAL_MUTATION_WHILE_BORROWED = "STRUCTURAL_MUTATION_WHILE_BORROWED",
}

export class ECSError extends AppError {
  constructor(
    public readonly category: ECS_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_ecs_error(error: unknown): error is ECSError {
  return error instanceof ECSError;
}
