/**
 * Connection descriptors: a table, an optional index and the key attribute
 * names packed into one URL, as found in service configuration.
 *
 * ```
 * ddb:///people
 * ddb:///people/people-year?prefix=org&suffix=year
 * ```
 */

import type { IndexConfig, TableDefinition } from "../types/table.js";
import { type Result, ok, err, flatMapResult } from "../types/common.js";
import { DEFAULT_HASH_KEY, DEFAULT_SORT_KEY } from "../types/table.js";
import { defineTable } from "./define-table.js";

/** A parsed connection descriptor. */
export interface ConnectionConfig {
  readonly tableName: string;
  readonly indexName?: string | undefined;
  /** Hash key name of the table, or of the index when there is one. */
  readonly hashKey: string;
  /** Sort key name of the table, or of the index when there is one. */
  readonly sortKey: string;
}

/**
 * Parses a `ddb:///table[/index]?prefix=..&suffix=..` descriptor.
 *
 * @returns The connection config, or an error naming what is wrong
 *
 * @example
 * ```ts
 * parseConnectionUrl("ddb:///people/people-year?suffix=year");
 * // ok({ tableName: "people", indexName: "people-year", hashKey: "prefix", sortKey: "year" })
 * ```
 */
export const parseConnectionUrl = (url: string): Result<ConnectionConfig, Error> => {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (cause) {
    return err(new Error(`Invalid connection url "${url}"`, { cause }));
  }

  if (parsed.protocol !== "ddb:") {
    return err(new Error(`Unsupported connection scheme "${parsed.protocol}" in "${url}"`));
  }

  let segments: string[];
  try {
    segments = parsed.pathname
      .split("/")
      .slice(1)
      .map((segment) => decodeURIComponent(segment));
  } catch (cause) {
    return err(new Error(`Connection url "${url}" has a malformed path escape`, { cause }));
  }

  const [tableName = "", indexName = "", ...rest] = segments;
  if (tableName === "") {
    return err(new Error(`Connection url "${url}" names no table`));
  }
  if (rest.length > 0) {
    return err(new Error(`Connection url "${url}" has too many path segments`));
  }

  return ok(
    Object.freeze({
      tableName,
      ...(indexName !== "" ? { indexName } : {}),
      hashKey: parsed.searchParams.get("prefix") || DEFAULT_HASH_KEY,
      sortKey: parsed.searchParams.get("suffix") || DEFAULT_SORT_KEY,
    }),
  );
};

/**
 * Builds a table definition from a connection descriptor. A named index is
 * registered under its own name, so `client.entity(def, { index })` can
 * address it.
 */
export const defineTableFromUrl = (
  url: string,
): Result<TableDefinition<Record<string, IndexConfig>>, Error> =>
  flatMapResult(parseConnectionUrl(url), (config) =>
    ok(
      config.indexName === undefined
        ? defineTable<Record<string, IndexConfig>>({
            tableName: config.tableName,
            hashKey: config.hashKey,
            sortKey: config.sortKey,
          })
        : defineTable<Record<string, IndexConfig>>({
            tableName: config.tableName,
            indexes: {
              [config.indexName]: {
                indexName: config.indexName,
                hashKey: config.hashKey,
                sortKey: config.sortKey,
              },
            },
          }),
    ),
  );
