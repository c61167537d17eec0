/**
 * Factory functions for creating immutable table definitions.
 */

import type {
  IndexConfig,
  StorageTarget,
  TableConfig,
  TableDefinition,
} from "../types/table.js";
import { DEFAULT_HASH_KEY, DEFAULT_SORT_KEY } from "../types/table.js";

/**
 * Defines a DynamoDB table: its name, the storage names of its key
 * attributes and its secondary indexes.
 *
 * @param config - The table configuration
 * @returns A frozen {@link TableDefinition} object
 *
 * @example
 * ```ts
 * const table = defineTable({
 *   tableName: "people",
 *   indexes: {
 *     byYear: { indexName: "people-year", sortKey: "year" },
 *   },
 * });
 * table.hashKey; // "prefix"
 * ```
 */
export const defineTable = <
  Indexes extends Record<string, IndexConfig> = Record<string, never>,
>(
  config: TableConfig<Indexes>,
): TableDefinition<Indexes> =>
  Object.freeze({
    tableName: config.tableName,
    hashKey: config.hashKey ?? DEFAULT_HASH_KEY,
    sortKey: config.sortKey ?? DEFAULT_SORT_KEY,
    indexes: Object.freeze({ ...config.indexes }),
  });

/**
 * Resolves the table, or one of its indexes, into the storage target a
 * client talks to.
 *
 * @throws Error when `index` names an index the table does not declare
 */
export const resolveTarget = (
  table: TableDefinition,
  index?: string,
): StorageTarget => {
  if (index === undefined) {
    return Object.freeze({
      tableName: table.tableName,
      hashKey: table.hashKey,
      sortKey: table.sortKey,
    });
  }

  const idx = table.indexes[index];
  if (idx === undefined) {
    throw new Error(`Table "${table.tableName}" has no index "${index}"`);
  }

  return Object.freeze({
    tableName: table.tableName,
    indexName: idx.indexName,
    hashKey: idx.hashKey ?? table.hashKey,
    sortKey: idx.sortKey ?? table.sortKey,
  });
};
