/**
 * Client factory: creates a type-safe storage client from an SDK adapter.
 *
 * The client provides entity-scoped operations with full type inference
 * from Standard Schema definitions.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import type {
  EntityDefinition,
  EntityKey,
  EntityPatch,
  InferEntityType,
} from "../types/entity.js";
import type { SDKAdapter } from "../adapters/adapter.js";
import type { MatchOption, MatchPage, StorageError } from "../types/operations.js";
import type { Condition } from "../types/condition-expression.js";
import type { UpdateRequest } from "../types/update-expression.js";
import type { Result } from "../types/common.js";
import type { Logger } from "../utils/logger.js";
import type { OperationContext } from "../operations/context.js";
import { silentLogger } from "../utils/logger.js";
import { createCodec } from "../codec/codec.js";
import { resolveTarget } from "./define-table.js";
import { validate } from "../validation/validate.js";
import { executeGet, type GetOptions } from "../operations/get.js";
import { executePut } from "../operations/put.js";
import { executeRemove } from "../operations/remove.js";
import { executeUpdate, updater } from "../operations/update.js";
import { executeMatch } from "../operations/match.js";
import { executeBatchGet, type BatchGetOptions } from "../operations/batch-get.js";
import { executeBatchPut, executeBatchRemove } from "../operations/batch-write.js";

/** Configuration for creating a client. */
export interface ClientConfig {
  readonly adapter: SDKAdapter;
  /** Check entities against their schema before writing. Default: `true`. */
  readonly validation?: boolean | undefined;
  /** Reject undeclared fields and attributes. Default: `false`. */
  readonly strict?: boolean | undefined;
  /** Default: {@link silentLogger}. */
  readonly logger?: Logger | undefined;
}

/** Names of the indexes declared by an entity's table. */
export type IndexName<E extends EntityDefinition> = keyof E["table"]["indexes"] & string;

/** Options for {@link StorageClient.entity}. */
export interface EntityClientOptions<E extends EntityDefinition> {
  /** Read through this secondary index instead of the table. */
  readonly index?: IndexName<E> | undefined;
}

/**
 * A type-safe client scoped to a single entity.
 * All operations are typed based on the entity's Standard Schema.
 */
export interface EntityClient<E extends EntityDefinition> {
  /** Gets an item by key; `notFound` when there is none. */
  readonly get: (
    key: EntityKey<E>,
    options?: GetOptions,
  ) => Promise<Result<InferEntityType<E>, StorageError<never>>>;

  /** Writes an item, validated against the entity schema. */
  readonly put: (
    entity: InferEntityType<E>,
    ...conditions: Condition[]
  ) => Promise<Result<InferEntityType<E>, StorageError<never>>>;

  /** Deletes an item and returns it as it was, or the key when nothing was stored. */
  readonly remove: (
    key: EntityKey<E>,
    ...conditions: Condition[]
  ) => Promise<Result<InferEntityType<E> | EntityKey<E>, StorageError<never>>>;

  /** Writes every field of the entity into the existing item and returns the result. */
  readonly update: (
    entity: InferEntityType<E>,
    ...conditions: Condition[]
  ) => Promise<Result<InferEntityType<E>, StorageError<never>>>;

  /** Applies an update request built with `updater()` and returns the result. */
  readonly updateWith: (
    request: UpdateRequest<EntityPatch<E>>,
    ...conditions: Condition[]
  ) => Promise<Result<InferEntityType<E>, StorageError<never>>>;

  /** Queries one page of the items sharing the key's partition and sort key prefix. */
  readonly match: (
    key: EntityKey<E>,
    ...options: MatchOption[]
  ) => Promise<Result<MatchPage<InferEntityType<E>>, StorageError<never>>>;

  /**
   * Gets items by key. Unprocessed keys come back in a `batchPartialIO`
   * error, together with the items that were read.
   */
  readonly batchGet: (
    keys: readonly EntityKey<E>[],
    options?: BatchGetOptions,
  ) => Promise<
    Result<readonly InferEntityType<E>[], StorageError<EntityKey<E>, InferEntityType<E>>>
  >;

  /** Writes items; unprocessed entities come back in a `batchPartialIO` error. */
  readonly batchPut: (
    entities: readonly InferEntityType<E>[],
  ) => Promise<Result<readonly InferEntityType<E>[], StorageError<InferEntityType<E>>>>;

  /** Deletes items by key; unprocessed keys come back in a `batchPartialIO` error. */
  readonly batchRemove: (
    keys: readonly EntityKey<E>[],
  ) => Promise<Result<readonly EntityKey<E>[], StorageError<EntityKey<E>>>>;
}

/** The storage client: a factory of entity-scoped clients over one adapter. */
export interface StorageClient {
  /** Creates a type-safe client scoped to a specific entity. */
  readonly entity: <E extends EntityDefinition>(
    entityDef: E,
    options?: EntityClientOptions<E>,
  ) => EntityClient<E>;
}

/**
 * Creates a type-safe storage client.
 *
 * @param config - Client configuration with SDK adapter, validation and logging settings
 * @returns A StorageClient producing entity-scoped clients
 *
 * @example
 * ```ts
 * import * as ddb from "@aws-sdk/client-dynamodb";
 * import { createClient, createConsoleLogger, createSDKv3Adapter } from "ddb-keyval";
 *
 * const client = createClient({
 *   adapter: createSDKv3Adapter(new ddb.DynamoDBClient({}), ddb),
 *   logger: createConsoleLogger({ level: "warn" }),
 * });
 * const people = client.entity(personEntity);
 *
 * await people.put({ org: "acme", id: "alice", name: "Alice" });
 * const result = await people.get({ org: "acme", id: "alice" });
 * ```
 *
 * @throws Error from `entity()` when the index is not declared by the table,
 * or when a field is stored under a key attribute name
 */
export const createClient = (config: ClientConfig): StorageClient => {
  const { adapter, validation = true, strict = false, logger = silentLogger } = config;

  const createEntityClient = <E extends EntityDefinition>(
    entityDef: E,
    options?: EntityClientOptions<E>,
  ): EntityClient<E> => {
    type T = InferEntityType<E>;
    type K = EntityKey<E>;

    const target = resolveTarget(entityDef.table, options?.index);
    const codecConfig = { hashKey: target.hashKey, sortKey: target.sortKey, strict };
    const ctx: OperationContext<T, K> = Object.freeze({
      adapter,
      target,
      logger,
      codec: createCodec<T, K>(entityDef, codecConfig),
    });
    const patchCodec = createCodec<EntityPatch<E>, K>(entityDef, codecConfig);
    const schema: StandardSchemaV1 | undefined = validation ? entityDef.schema : undefined;

    return Object.freeze({
      get: (key: K, getOptions?: GetOptions) => executeGet(ctx, key, getOptions),

      put: (entity: T, ...conditions: Condition[]) =>
        executePut(ctx, entity, conditions, { schema }),

      remove: (key: K, ...conditions: Condition[]) => executeRemove(ctx, key, conditions),

      update: async (entity: T, ...conditions: Condition[]) => {
        if (schema) {
          const validationResult = await validate(schema, entity);
          if (!validationResult.success) return validationResult;
        }
        return executeUpdate(ctx, ctx.codec, updater(entity), conditions);
      },

      updateWith: (request: UpdateRequest<EntityPatch<E>>, ...conditions: Condition[]) =>
        executeUpdate(ctx, patchCodec, request, conditions),

      match: (key: K, ...matchOptions: MatchOption[]) => executeMatch(ctx, key, matchOptions),

      batchGet: (keys: readonly K[], batchOptions?: BatchGetOptions) =>
        executeBatchGet(ctx, keys, batchOptions),

      batchPut: (entities: readonly T[]) => executeBatchPut(ctx, entities, { schema }),

      batchRemove: (keys: readonly K[]) => executeBatchRemove(ctx, keys),
    });
  };

  return Object.freeze({
    entity: createEntityClient,
  });
};
