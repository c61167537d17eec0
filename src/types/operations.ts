/**
 * Operation input/output types and the error taxonomy of the storage client.
 */

import type { ValidationIssue } from "../validation/errors.js";

/** The raw key pair of a stored item, as strings under the hash/sort names. */
export interface KeyPair {
  readonly hashKey: string;
  readonly sortKey: string;
}

/** Failure kinds that carry nothing beyond a message and an optional cause. */
export type PlainErrorType = "invalidKey" | "invalidEntity" | "serviceIO";

/**
 * Error type for storage operations.
 *
 * `U` is the element type of `unprocessed` on a partial batch failure:
 * entities for `batchPut`, keys for `batchGet` and `batchRemove`. `A` is
 * the element type of `items`, the results a partial `batchGet` did read.
 */
export type StorageError<U = unknown, A = never> =
  | {
      readonly type: PlainErrorType;
      readonly message: string;
      readonly cause?: unknown;
    }
  | {
      readonly type: "validation";
      readonly message: string;
      readonly issues: readonly ValidationIssue[];
    }
  | {
      readonly type: "notFound";
      readonly message: string;
      readonly key: KeyPair;
    }
  | {
      readonly type: "preConditionFailed";
      readonly message: string;
      /** The failed condition asserted equality or absence: someone else wrote first. */
      readonly conflict: boolean;
      /** The failed condition asserted inequality or presence: the expected state vanished. */
      readonly gone: boolean;
      readonly cause?: unknown;
    }
  | {
      readonly type: "batchPartialIO";
      readonly message: string;
      readonly unprocessed: readonly U[];
      /** Results of the processed part of the batch. Empty for writes. */
      readonly items: readonly A[];
    };

/** Creates a StorageError without extra payload. */
export const createStorageError = (
  type: PlainErrorType,
  message: string,
  cause?: unknown,
): StorageError<never> => Object.freeze({ type, message, cause });

/** Creates a `notFound` error carrying the requested key. */
export const createNotFoundError = (key: KeyPair): StorageError<never> =>
  Object.freeze({
    type: "notFound" as const,
    message: `Item not found: ${key.hashKey} ${key.sortKey}`,
    key: Object.freeze({ ...key }),
  });

/** Creates a `preConditionFailed` error. */
export const createPreConditionFailedError = (
  flags: { readonly conflict: boolean; readonly gone: boolean },
  cause?: unknown,
): StorageError<never> =>
  Object.freeze({
    type: "preConditionFailed" as const,
    message:
      cause instanceof Error ? cause.message : "The conditional request failed",
    conflict: flags.conflict,
    gone: flags.gone,
    cause,
  });

/**
 * Creates a `batchPartialIO` error over the items the backend left
 * unprocessed, next to the results of the part it did process.
 */
export const createBatchPartialIOError = <U, A = never>(
  unprocessed: readonly U[],
  items: readonly A[] = [],
): StorageError<U, A> =>
  Object.freeze({
    type: "batchPartialIO" as const,
    message: `Batch partially applied: ${unprocessed.length} item(s) unprocessed`,
    unprocessed: Object.freeze([...unprocessed]),
    items: Object.freeze([...items]),
  });

/** Continuation state of a paginated match. */
export type Cursor = KeyPair;

/** Options accepted by `match`: a tagged union, one variant per concern. */
export type MatchOption =
  | { readonly type: "limit"; readonly limit: number }
  | { readonly type: "cursor"; readonly cursor: Cursor };

/** Bounds the number of items the backend evaluates for one page. */
export const limit = (n: number): MatchOption =>
  Object.freeze({ type: "limit" as const, limit: n });

/** Resumes a match after the item the cursor points at. */
export const cursor = (c: Cursor): MatchOption =>
  Object.freeze({ type: "cursor" as const, cursor: c });

/** One page of match results. */
export interface MatchPage<T> {
  readonly items: readonly T[];
  /** Present only when the backend reports more results. */
  readonly cursor?: Cursor | undefined;
}
