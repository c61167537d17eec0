/**
 * Match operation: a range query over one partition.
 *
 * The key of a partial entity selects the partition; a non-empty sort key
 * becomes a prefix over the sort key. Pages are resumed through cursors
 * that wrap the raw key strings of the last evaluated item.
 */

import type { AttributeMap, AttributeValue } from "../marshalling/types.js";
import type { Cursor, MatchOption, MatchPage, StorageError } from "../types/operations.js";
import type { OperationContext } from "./context.js";
import { type Result, ok, err, traverseResults } from "../types/common.js";
import { stringOf } from "../marshalling/types.js";
import { SORT_KEY_SENTINEL } from "../codec/codec.js";
import { namePlaceholder, valuePlaceholder } from "../utils/placeholders.js";
import { logCall, projectionOf, serviceFailure } from "./context.js";

/**
 * Folds match options; a later option of the same type wins.
 */
const readOptions = (
  options: readonly MatchOption[],
): { readonly limit: number | undefined; readonly cursor: Cursor | undefined } => {
  let limit: number | undefined;
  let cursor: Cursor | undefined;
  for (const option of options) {
    switch (option.type) {
      case "limit":
        limit = option.limit;
        break;
      case "cursor":
        cursor = option.cursor;
        break;
    }
  }
  return { limit, cursor };
};

/**
 * Executes a Query for every item sharing the key's partition and, when
 * the key has a sort key, whose sort key starts with it.
 *
 * @param ctx - The operation context
 * @param key - A partial entity carrying at least the hash key field
 * @param options - `limit(n)` and `cursor(c)` options
 * @returns The decoded page, with a cursor when the backend reports more
 * items. A single undecodable item fails the whole page with `invalidEntity`.
 *
 * @example
 * ```ts
 * let page = await executeMatch(ctx, { org: "acme" }, [limit(10)]);
 * while (page.success && page.data.cursor) {
 *   page = await executeMatch(ctx, { org: "acme" }, [limit(10), cursor(page.data.cursor)]);
 * }
 * ```
 */
export const executeMatch = async <T, K>(
  ctx: OperationContext<T, K>,
  key: K,
  options: readonly MatchOption[] = [],
): Promise<Result<MatchPage<T>, StorageError<never>>> => {
  const { hashKey, sortKey } = ctx.codec;

  // 1. Build key
  const encoded = ctx.codec.encodeKey(key);
  if (!encoded.success) return encoded;

  // 2. Build key condition
  const projection = projectionOf(ctx.codec.attributeNames);
  const names: Record<string, string> = { ...projection.names };
  const values: Record<string, AttributeValue> = {};

  const hashName = namePlaceholder(hashKey);
  const hashValue = valuePlaceholder(hashKey);
  names[hashName] = hashKey;
  const hash = encoded.data[hashKey];
  if (hash !== undefined) values[hashValue] = hash;
  let keyCondition = `${hashName} = ${hashValue}`;

  const sort = encoded.data[sortKey];
  if (sort !== undefined && stringOf(sort) !== SORT_KEY_SENTINEL) {
    const sortName = namePlaceholder(sortKey);
    const sortValue = valuePlaceholder(sortKey);
    names[sortName] = sortKey;
    values[sortValue] = sort;
    keyCondition = `${keyCondition} and begins_with(${sortName}, ${sortValue})`;
  }

  // 3. Apply limit and cursor
  const { limit, cursor } = readOptions(options);
  const exclusiveStartKey: AttributeMap | undefined =
    cursor === undefined || cursor.hashKey === ""
      ? undefined
      : {
          [hashKey]: { S: cursor.hashKey },
          [sortKey]: { S: cursor.sortKey === "" ? SORT_KEY_SENTINEL : cursor.sortKey },
        };

  // 4. Call adapter
  let result;
  try {
    logCall(ctx, "query", { limit });
    result = await ctx.adapter.query({
      tableName: ctx.target.tableName,
      indexName: ctx.target.indexName,
      keyConditionExpression: keyCondition,
      expressionAttributeNames: names,
      expressionAttributeValues: values,
      projectionExpression: projection.expression,
      limit,
      exclusiveStartKey,
    });
  } catch (cause) {
    return err(serviceFailure(ctx, "query", cause));
  }

  // 5. Decode the page
  const items = traverseResults(result.items, (item) => ctx.codec.decode(item));
  if (!items.success) return items;

  return ok(
    Object.freeze(
      result.lastEvaluatedKey === undefined
        ? { items: items.data }
        : { items: items.data, cursor: ctx.codec.keyPair(result.lastEvaluatedKey) },
    ),
  );
};
