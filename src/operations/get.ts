/**
 * Get operation: builds a key, fetches an item, and decodes it.
 */

import type { StorageError } from "../types/operations.js";
import type { AttributeMap } from "../marshalling/types.js";
import type { OperationContext } from "./context.js";
import { type Result, err } from "../types/common.js";
import { createNotFoundError } from "../types/operations.js";
import { logCall, projectionOf, serviceFailure } from "./context.js";

/** Options for Get operations. */
export interface GetOptions {
  readonly consistentRead?: boolean | undefined;
}

/**
 * Executes a Get operation for the given key.
 *
 * Only the attributes the entity declares are read.
 *
 * @param ctx - The operation context
 * @param key - An object with the key fields of the item
 * @param options - Optional get options (consistent read)
 * @returns The decoded item; a `notFound` error carrying the key when the
 * table holds no such item
 */
export const executeGet = async <T, K>(
  ctx: OperationContext<T, K>,
  key: K,
  options?: GetOptions,
): Promise<Result<T, StorageError<never>>> => {
  // 1. Build key
  const encoded = ctx.codec.encodeKey(key);
  if (!encoded.success) return encoded;

  // 2. Build projection expression
  const projection = projectionOf(ctx.codec.attributeNames);

  // 3. Call adapter
  let item: AttributeMap | undefined;
  try {
    logCall(ctx, "getItem");
    const result = await ctx.adapter.getItem({
      tableName: ctx.target.tableName,
      key: encoded.data,
      consistentRead: options?.consistentRead,
      projectionExpression: projection.expression,
      expressionAttributeNames: projection.names,
    });
    item = result.item;
  } catch (cause) {
    return err(serviceFailure(ctx, "getItem", cause));
  }

  // 4. Item not found
  if (item === undefined) {
    return err(createNotFoundError(ctx.codec.keyPair(encoded.data)));
  }

  return ctx.codec.decode(item);
};
