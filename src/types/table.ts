/**
 * Table and secondary index definition types.
 */

/** Default storage name of the hash (partition) key attribute. */
export const DEFAULT_HASH_KEY = "prefix";

/** Default storage name of the sort key attribute. */
export const DEFAULT_SORT_KEY = "suffix";

/**
 * A secondary index. Key names left out inherit the table's, so a local
 * secondary index usually names only its `sortKey`.
 */
export interface IndexConfig {
  readonly indexName: string;
  readonly hashKey?: string | undefined;
  readonly sortKey?: string | undefined;
}

/** Configuration input for `defineTable()`. */
export interface TableConfig<
  Indexes extends Record<string, IndexConfig> = Record<string, IndexConfig>,
> {
  readonly tableName: string;
  /** Storage name of the hash key attribute. Default: `"prefix"`. */
  readonly hashKey?: string | undefined;
  /** Storage name of the sort key attribute. Default: `"suffix"`. */
  readonly sortKey?: string | undefined;
  readonly indexes?: Indexes | undefined;
}

/** The frozen, immutable table definition produced by `defineTable()`. */
export interface TableDefinition<
  Indexes extends Record<string, IndexConfig> = Record<string, IndexConfig>,
> {
  readonly tableName: string;
  readonly hashKey: string;
  readonly sortKey: string;
  readonly indexes: Readonly<Partial<Indexes>>;
}

/**
 * Where a storage client reads and writes: the table, the index if any,
 * and the attribute pair acting as hash and sort key there.
 */
export interface StorageTarget {
  readonly tableName: string;
  readonly indexName?: string | undefined;
  readonly hashKey: string;
  readonly sortKey: string;
}
