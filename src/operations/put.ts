/**
 * Put operation: validates data, encodes it, and writes an item.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { StorageError } from "../types/operations.js";
import type { Condition } from "../types/condition-expression.js";
import type { OperationContext } from "./context.js";
import { type Result, ok, err } from "../types/common.js";
import { validate } from "../validation/validate.js";
import { nonEmpty } from "../utils/records.js";
import { compileConditions } from "./condition.js";
import { logCall, writeFailure } from "./context.js";

/** Options for Put operations. */
export interface PutOptions {
  /** Schema the entity is checked against before it is written. Unset skips validation. */
  readonly schema?: StandardSchemaV1 | undefined;
}

/**
 * Executes a Put operation for the given entity.
 *
 * @param ctx - The operation context
 * @param entity - The entity to write
 * @param conditions - Guards the stored item must satisfy
 * @param options - Optional put options (validation schema)
 * @returns The written entity, or a StorageError: `preConditionFailed`
 * when a condition rejects the write
 */
export const executePut = async <T, K>(
  ctx: OperationContext<T, K>,
  entity: T,
  conditions: readonly Condition[] = [],
  options?: PutOptions,
): Promise<Result<T, StorageError<never>>> => {
  // 1. Validate via schema (unless skipped)
  if (options?.schema) {
    const validationResult = await validate(options.schema, entity);
    if (!validationResult.success) return validationResult;
  }

  // 2. Encode the item
  const item = ctx.codec.encode(entity);
  if (!item.success) return item;

  // 3. Compile condition expression
  const condition = compileConditions(ctx.codec, conditions);
  if (!condition.success) return condition;

  // 4. Call adapter
  try {
    logCall(ctx, "putItem");
    await ctx.adapter.putItem({
      tableName: ctx.target.tableName,
      item: item.data,
      conditionExpression: condition.data.expression,
      expressionAttributeNames: nonEmpty(condition.data.names),
      expressionAttributeValues: nonEmpty(condition.data.values),
    });
    return ok(entity);
  } catch (cause) {
    return err(writeFailure(ctx, "putItem", cause, condition.data));
  }
};
