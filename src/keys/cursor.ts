/**
 * Opaque cursor tokens, for handing a match cursor across a process
 * boundary (an HTTP query string, a job payload).
 */

import type { Cursor, StorageError } from "../types/operations.js";
import { type Result, ok, err } from "../types/common.js";
import { createStorageError } from "../types/operations.js";

/**
 * Encodes a cursor as a base64url token of the JSON pair
 * `[hashKey, sortKey]`.
 *
 * @example
 * ```ts
 * encodeCursor({ hashKey: "acme", sortKey: "alice" }); // "WyJhY21lIiwiYWxpY2UiXQ"
 * ```
 */
export const encodeCursor = (cursor: Cursor): string =>
  Buffer.from(JSON.stringify([cursor.hashKey, cursor.sortKey]), "utf8").toString("base64url");

/**
 * Decodes a token produced by {@link encodeCursor}.
 *
 * @returns The cursor, or an `invalidKey` error for a malformed token
 */
export const decodeCursor = (token: string): Result<Cursor, StorageError<never>> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(token, "base64url").toString("utf8"));
  } catch (cause) {
    return err(createStorageError("invalidKey", "Malformed cursor token", cause));
  }

  if (!Array.isArray(parsed) || parsed.length !== 2) {
    return err(createStorageError("invalidKey", "Malformed cursor token"));
  }

  const [hashKey, sortKey]: readonly unknown[] = parsed;
  if (typeof hashKey !== "string" || typeof sortKey !== "string") {
    return err(createStorageError("invalidKey", "Malformed cursor token"));
  }

  return ok(Object.freeze({ hashKey, sortKey }));
};
