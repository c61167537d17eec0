/**
 * Remove operation: builds a key and deletes an item.
 */

import type { StorageError } from "../types/operations.js";
import type { Condition } from "../types/condition-expression.js";
import type { AttributeMap } from "../marshalling/types.js";
import type { OperationContext } from "./context.js";
import { type Result, ok, err } from "../types/common.js";
import { nonEmpty } from "../utils/records.js";
import { compileConditions } from "./condition.js";
import { logCall, writeFailure } from "./context.js";

/**
 * Executes a DeleteItem for the given key.
 *
 * @param ctx - The operation context
 * @param key - An object with the key fields of the item
 * @param conditions - Guards the stored item must satisfy
 * @returns The item as it was before removal; the key itself when no item
 * was stored under it
 */
export const executeRemove = async <T, K>(
  ctx: OperationContext<T, K>,
  key: K,
  conditions: readonly Condition[] = [],
): Promise<Result<T | K, StorageError<never>>> => {
  // 1. Build key
  const encoded = ctx.codec.encodeKey(key);
  if (!encoded.success) return encoded;

  // 2. Compile condition expression
  const condition = compileConditions(ctx.codec, conditions);
  if (!condition.success) return condition;

  // 3. Call adapter
  let attributes: AttributeMap | undefined;
  try {
    logCall(ctx, "deleteItem");
    const result = await ctx.adapter.deleteItem({
      tableName: ctx.target.tableName,
      key: encoded.data,
      conditionExpression: condition.data.expression,
      expressionAttributeNames: nonEmpty(condition.data.names),
      expressionAttributeValues: nonEmpty(condition.data.values),
      returnValues: "ALL_OLD",
    });
    attributes = result.attributes;
  } catch (cause) {
    return err(writeFailure(ctx, "deleteItem", cause, condition.data));
  }

  // 4. Decode the old image
  return attributes === undefined ? ok(key) : ctx.codec.decode(attributes);
};
