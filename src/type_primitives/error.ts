/***
 * Assertion errors — Validation and assertion failure errors.
 *
 * Separate from ECSError so type-primitive assertions don't depend
 * on the ECS error hierarchy.
 *
 ***/

import { AppError } from "utils/error";

export enum ASSERTION_ERROR {
  VALIDATION_FAIL_CONDITION = "VALIDATION_FAIL_CONDITION",
}

export class AssertionError extends AppError {
  constructor(
    public readonly category: ASSERTION_ERROR,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message, false, context);
  }
}
