/**
 * What every operation runs against, and how backend failures become
 * storage errors.
 */

import type { SDKAdapter } from "../adapters/adapter.js";
import type { Codec } from "../codec/codec.js";
import type { StorageTarget } from "../types/table.js";
import type { StorageError } from "../types/operations.js";
import type { Logger } from "../utils/logger.js";
import {
  createPreConditionFailedError,
  createStorageError,
} from "../types/operations.js";
import { namePlaceholder } from "../utils/placeholders.js";

/** Where an operation runs and where it reports. */
export interface OperationScope {
  readonly target: StorageTarget;
  readonly logger: Logger;
}

/** The adapter, target, codec and logger of one entity client. */
export interface OperationContext<T, K> extends OperationScope {
  readonly adapter: SDKAdapter;
  readonly codec: Codec<T, K>;
}

/** Whether a backend exception reports a failed condition expression. */
export const isConditionalCheckFailed = (cause: unknown): boolean =>
  typeof cause === "object" &&
  cause !== null &&
  "name" in cause &&
  cause.name === "ConditionalCheckFailedException";

const where = (target: StorageTarget): Record<string, unknown> =>
  target.indexName === undefined
    ? { table: target.tableName }
    : { table: target.tableName, index: target.indexName };

/** Logs a backend call about to be made. */
export const logCall = (
  ctx: OperationScope,
  operation: string,
  details?: Readonly<Record<string, unknown>>,
): void => {
  ctx.logger.debug(`ddb.${operation}`, { ...where(ctx.target), ...details });
};

/** Wraps a backend exception into a `serviceIO` error and logs it. */
export const serviceFailure = (
  ctx: OperationScope,
  operation: string,
  cause: unknown,
): StorageError<never> => {
  const message = cause instanceof Error ? cause.message : `${operation} failed`;
  ctx.logger.error(`ddb.${operation}.failed`, { ...where(ctx.target), message });
  return createStorageError("serviceIO", message, cause);
};

/**
 * Maps the exception of a conditional write. A rejected condition becomes
 * `preConditionFailed` with the flags of the compiled conditions; anything
 * else is a `serviceIO` error.
 */
export const writeFailure = (
  ctx: OperationScope,
  operation: string,
  cause: unknown,
  flags: { readonly conflict: boolean; readonly gone: boolean },
): StorageError<never> => {
  if (!isConditionalCheckFailed(cause)) return serviceFailure(ctx, operation, cause);

  ctx.logger.warn(`ddb.${operation}.rejected`, {
    ...where(ctx.target),
    conflict: flags.conflict,
    gone: flags.gone,
  });
  return createPreConditionFailedError(flags, cause);
};

/**
 * Projection over the attributes a codec knows, so reads never fetch
 * attributes the entity does not declare.
 *
 * @example
 * ```ts
 * projectionOf(["prefix", "suffix", "name"]);
 * // {
 * //   expression: "#__prefix__, #__suffix__, #__name__",
 * //   names: { "#__prefix__": "prefix", "#__suffix__": "suffix", "#__name__": "name" },
 * // }
 * ```
 */
export const projectionOf = (
  attributeNames: readonly string[],
): { readonly expression: string; readonly names: Readonly<Record<string, string>> } => {
  const names: Record<string, string> = {};
  for (const attr of attributeNames) names[namePlaceholder(attr)] = attr;
  return Object.freeze({ expression: Object.keys(names).join(", "), names });
};
