/**
 * BatchWrite operations: writes or deletes many items of one entity.
 *
 * DynamoDB limits batch write to 25 items per request; requests are
 * chunked accordingly. Items the backend leaves unprocessed are reported
 * back to the caller, never retried here.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { BatchWriteEntry, SDKAdapter } from "../adapters/adapter.js";
import type { StorageError } from "../types/operations.js";
import type { OperationContext, OperationScope } from "./context.js";
import { type Result, ok, err, traverseResults } from "../types/common.js";
import { createBatchPartialIOError } from "../types/operations.js";
import { validate } from "../validation/validate.js";
import { chunk } from "../utils/chunk.js";
import { logCall, serviceFailure } from "./context.js";

/** Maximum items per BatchWriteItem request. */
export const BATCH_WRITE_LIMIT = 25;

/** Options for batch put. */
export interface BatchPutOptions {
  /** Schema every entity is checked against before anything is written. Unset skips validation. */
  readonly schema?: StandardSchemaV1 | undefined;
}

/** Sends write entries in chunks and collects what the backend left unprocessed. */
const writeChunks = async (
  ctx: OperationScope & { readonly adapter: SDKAdapter },
  entries: readonly BatchWriteEntry[],
): Promise<Result<readonly BatchWriteEntry[], StorageError<never>>> => {
  const unprocessed: BatchWriteEntry[] = [];

  for (const requests of chunk(entries, BATCH_WRITE_LIMIT)) {
    try {
      logCall(ctx, "batchWriteItem", { count: requests.length });
      const result = await ctx.adapter.batchWriteItem([
        { tableName: ctx.target.tableName, requests },
      ]);
      for (const req of result.unprocessedItems) unprocessed.push(...req.requests);
    } catch (cause) {
      return err(serviceFailure(ctx, "batchWriteItem", cause));
    }
  }

  return ok(unprocessed);
};

/**
 * Writes entities in batches.
 *
 * @param ctx - The operation context
 * @param entities - The entities to write
 * @param options - Optional batch put options (validation schema)
 * @returns An empty list when every entity was written; a `batchPartialIO`
 * error carrying the entities the backend did not process otherwise
 */
export const executeBatchPut = async <T, K>(
  ctx: OperationContext<T, K>,
  entities: readonly T[],
  options?: BatchPutOptions,
): Promise<Result<readonly T[], StorageError<T>>> => {
  if (entities.length === 0) return ok([]);

  // 1. Validate via schema (unless skipped)
  if (options?.schema) {
    for (const entity of entities) {
      const validationResult = await validate(options.schema, entity);
      if (!validationResult.success) return validationResult;
    }
  }

  // 2. Encode every entity
  const items = traverseResults(entities, (entity) => ctx.codec.encode(entity));
  if (!items.success) return items;

  // 3. Write chunks
  const unprocessed = await writeChunks(
    ctx,
    items.data.map((item): BatchWriteEntry => ({ type: "put", item })),
  );
  if (!unprocessed.success) return unprocessed;
  if (unprocessed.data.length === 0) return ok([]);

  // 4. Decode unprocessed entities
  const rest = traverseResults(unprocessed.data, (entry) =>
    entry.type === "put" ? ctx.codec.decode(entry.item) : ctx.codec.decode(entry.key),
  );
  return rest.success ? err(createBatchPartialIOError(rest.data)) : rest;
};

/**
 * Deletes items by key in batches.
 *
 * @param ctx - The operation context
 * @param keys - The keys of the items to delete
 * @returns An empty list when every key was processed; a `batchPartialIO`
 * error carrying the keys the backend did not process otherwise
 */
export const executeBatchRemove = async <T, K>(
  ctx: OperationContext<T, K>,
  keys: readonly K[],
): Promise<Result<readonly K[], StorageError<K>>> => {
  if (keys.length === 0) return ok([]);

  // 1. Encode every key
  const encoded = traverseResults(keys, (key) => ctx.codec.encodeKey(key));
  if (!encoded.success) return encoded;

  // 2. Write chunks
  const unprocessed = await writeChunks(
    ctx,
    encoded.data.map((key): BatchWriteEntry => ({ type: "delete", key })),
  );
  if (!unprocessed.success) return unprocessed;
  if (unprocessed.data.length === 0) return ok([]);

  // 3. Decode unprocessed keys
  const rest = traverseResults(unprocessed.data, (entry) =>
    ctx.codec.decodeKey(entry.type === "delete" ? entry.key : entry.item),
  );
  return rest.success ? err(createBatchPartialIOError(rest.data)) : rest;
};
