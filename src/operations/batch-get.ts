/**
 * BatchGet operation: reads many items of one entity by key.
 *
 * DynamoDB limits batch get to 100 keys per request; requests are chunked
 * accordingly. Keys the backend leaves unprocessed are reported back to
 * the caller, never retried here.
 */

import type { AttributeMap } from "../marshalling/types.js";
import type { StorageError } from "../types/operations.js";
import type { OperationContext } from "./context.js";
import { type Result, ok, err, traverseResults } from "../types/common.js";
import { createBatchPartialIOError } from "../types/operations.js";
import { chunk } from "../utils/chunk.js";
import { logCall, projectionOf, serviceFailure } from "./context.js";

/** Maximum items per BatchGetItem request. */
export const BATCH_GET_LIMIT = 100;

/** Options for batch get operations. */
export interface BatchGetOptions {
  readonly consistentRead?: boolean | undefined;
}

/**
 * Executes a BatchGet for the given keys.
 *
 * Items come back in the order the backend returns them, which need not
 * be the order of `keys`. Keys with no stored item are left out.
 *
 * @param ctx - The operation context
 * @param keys - The keys to read
 * @param options - Optional batch get options (consistent read)
 * @returns The decoded items; a `batchPartialIO` error carrying the keys
 * the backend did not process and the items it did return
 */
export const executeBatchGet = async <T, K>(
  ctx: OperationContext<T, K>,
  keys: readonly K[],
  options?: BatchGetOptions,
): Promise<Result<readonly T[], StorageError<K, T>>> => {
  if (keys.length === 0) return ok([]);

  // 1. Build keys
  const encoded = traverseResults(keys, (key) => ctx.codec.encodeKey(key));
  if (!encoded.success) return encoded;

  // 2. Build projection expression
  const projection = projectionOf(ctx.codec.attributeNames);

  // 3. Read chunks
  const found: AttributeMap[] = [];
  const unprocessed: AttributeMap[] = [];
  for (const chunkKeys of chunk(encoded.data, BATCH_GET_LIMIT)) {
    try {
      logCall(ctx, "batchGetItem", { count: chunkKeys.length });
      const result = await ctx.adapter.batchGetItem([
        {
          tableName: ctx.target.tableName,
          keys: chunkKeys,
          consistentRead: options?.consistentRead,
          projectionExpression: projection.expression,
          expressionAttributeNames: projection.names,
        },
      ]);
      found.push(...(result.responses[ctx.target.tableName] ?? []));
      for (const req of result.unprocessedKeys) unprocessed.push(...req.keys);
    } catch (cause) {
      return err(serviceFailure(ctx, "batchGetItem", cause));
    }
  }

  // 4. Decode items
  const items = traverseResults(found, (item) => ctx.codec.decode(item));
  if (!items.success || unprocessed.length === 0) return items;

  // 5. Report unprocessed keys alongside what was read
  const rest = traverseResults(unprocessed, (key) => ctx.codec.decodeKey(key));
  return rest.success ? err(createBatchPartialIOError(rest.data, items.data)) : rest;
};
