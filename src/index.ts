/**
 * ddb-keyval: typed key/value storage of entities on DynamoDB.
 *
 * Entities are validated with any Standard Schema V1 compatible schema
 * (Zod, Valibot, ArkType, etc.), stored under a hash/sort key pair, and
 * guarded and mutated through typed condition and update builders.
 *
 * @example
 * ```ts
 * import { z } from "zod";
 * import {
 *   conditionFor, createClient, defineEntity, defineTable, limit, updateFor, updater,
 * } from "ddb-keyval";
 *
 * const table = defineTable({ tableName: "people" });
 *
 * const personEntity = defineEntity({
 *   name: "Person",
 *   schema: z.object({ org: z.string(), id: z.string(), name: z.string(), visits: z.number() }),
 *   table,
 *   hashKey: "org",
 *   sortKey: "id",
 *   fields: { name: "name", visits: "visits,omitempty" },
 * });
 *
 * const people = createClient({ adapter }).entity(personEntity);
 * await people.put({ org: "acme", id: "alice", name: "Alice", visits: 0 },
 *   conditionFor(personEntity, "id").notExists());
 * await people.updateWith(updater({ org: "acme", id: "alice" }, updateFor(personEntity, "visits").inc(1)));
 * const page = await people.match({ org: "acme" }, limit(20));
 * ```
 */

// Core factory functions
export { defineTable, resolveTarget } from "./core/define-table.js";
export { defineEntity } from "./core/define-entity.js";
export { createClient } from "./core/create-client.js";
export { parseConnectionUrl, defineTableFromUrl } from "./core/connection-url.js";

// Core types
export type { TableConfig, TableDefinition, IndexConfig, StorageTarget } from "./types/table.js";
export { DEFAULT_HASH_KEY, DEFAULT_SORT_KEY } from "./types/table.js";
export type {
  EntityConfig,
  EntityDefinition,
  EntityFieldName,
  EntityKey,
  EntityKeyName,
  EntityPatch,
  FieldDefinition,
  FieldOptions,
  FieldTag,
  InferEntityType,
} from "./types/entity.js";
export type {
  ClientConfig,
  EntityClient,
  EntityClientOptions,
  IndexName,
  StorageClient,
} from "./core/create-client.js";
export type { ConnectionConfig } from "./core/connection-url.js";

// Operation types
export type {
  Cursor,
  KeyPair,
  MatchOption,
  MatchPage,
  PlainErrorType,
  StorageError,
} from "./types/operations.js";
export { limit, cursor } from "./types/operations.js";
export type { GetOptions } from "./operations/get.js";
export type { BatchGetOptions } from "./operations/batch-get.js";

// Condition builder
export type { Condition, ConditionField, CompiledCondition } from "./types/condition-expression.js";
export { conditionFor, allOf, oneOf, compileConditions } from "./operations/condition.js";

// Update builder
export type {
  CompiledUpdate,
  SetMembers,
  UpdateField,
  UpdateOperation,
  UpdateRequest,
} from "./types/update-expression.js";
export { updateFor, updater, compileUpdate } from "./operations/update.js";

// Codec
export { createCodec, SORT_KEY_SENTINEL } from "./codec/codec.js";
export type { Codec, CodecConfig } from "./codec/codec.js";

// Identity and cursors
export {
  type Identity,
  identity,
  parseIdentity,
  identityPrefix,
  identityPath,
  identitySegments,
  identityRank,
  isEmptyIdentity,
  childOf,
  parentOf,
  equalIdentity,
  compareIdentity,
} from "./keys/identity.js";
export { encodeCursor, decodeCursor } from "./keys/cursor.js";

// Result type and helpers
export { type Result, ok, err, mapResult, flatMapResult } from "./types/common.js";

// Validation
export { validate } from "./validation/validate.js";
export type { ValidationError, ValidationIssue } from "./validation/errors.js";

// Logging
export { createConsoleLogger, silentLogger } from "./utils/logger.js";
export type { Logger, LogLevel, ConsoleLoggerOptions } from "./utils/logger.js";

// Marshalling (for users who need raw AttributeValue handling)
export { marshallItem, marshallValue } from "./marshalling/marshall.js";
export { unmarshallItem, unmarshallValue } from "./marshalling/unmarshall.js";
export type { AttributeValue, AttributeMap } from "./marshalling/types.js";

// SDK adapters
export type { SDKAdapter } from "./adapters/adapter.js";
export { createSDKv3Adapter } from "./adapters/sdk-v3.js";
