/**
 * Wrapper around StandardSchemaV1.validate() that normalizes sync/async
 * results and returns a Result type.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import { type Result, ok, err } from "../types/common.js";
import { type ValidationError, createValidationError } from "./errors.js";

/**
 * Validates a value against a Standard Schema V1 compatible schema.
 *
 * Zod validates synchronously; other implementations may return a promise.
 * Both are awaited here.
 *
 * @param schema - A StandardSchemaV1 compatible schema
 * @param value - The value to validate
 * @returns The validated output or a ValidationError
 *
 * @example
 * ```ts
 * const result = await validate(personSchema, { org: "acme", id: "alice" });
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */
export const validate = async <Output>(
  schema: StandardSchemaV1<unknown, Output>,
  value: unknown,
): Promise<Result<Output, ValidationError>> => {
  const result = await schema["~standard"].validate(value);

  if (result.issues) {
    return err(createValidationError(result.issues));
  }

  return ok(result.value);
};
