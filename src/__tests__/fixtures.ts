/**
 * Shared test fixtures used across all test files.
 */

import { vi } from "vitest";
import { z } from "zod";
import { defineTable, resolveTarget } from "../core/define-table.js";
import { defineEntity } from "../core/define-entity.js";
import { createCodec } from "../codec/codec.js";
import { silentLogger } from "../utils/logger.js";
import type { SDKAdapter } from "../adapters/adapter.js";
import type { EntityDefinition, EntityKey, InferEntityType } from "../types/entity.js";
import type { OperationContext } from "../operations/context.js";
import type { Logger } from "../utils/logger.js";

// ---------------------------------------------------------------------------
// Zod schemas
// ---------------------------------------------------------------------------

export const personSchema = z.object({
  org: z.string().min(1),
  id: z.string(),
  name: z.string(),
  visits: z.number().int().nonnegative().optional(),
  tags: z.array(z.string()).optional(),
  history: z.array(z.string()).optional(),
  scores: z.array(z.number()).optional(),
  email: z.string().email().optional(),
});

export type Person = z.output<typeof personSchema>;

export const settingSchema = z.object({
  key: z.string(),
  value: z.string(),
});

export type Setting = z.output<typeof settingSchema>;

// ---------------------------------------------------------------------------
// Table + entity definitions
// ---------------------------------------------------------------------------

export const peopleTable = defineTable({
  tableName: "people",
  indexes: {
    byYear: { indexName: "people-year", sortKey: "year" },
  },
});

export const personEntity = defineEntity({
  name: "Person",
  schema: personSchema,
  table: peopleTable,
  hashKey: "org",
  sortKey: "id",
  fields: {
    name: "anothername",
    visits: "visits,omitempty",
    tags: "tags,omitempty,stringset",
    history: "history,omitempty",
    scores: { name: "scores", omitEmpty: true, kind: "numberSet" },
    email: "email,omitempty",
  },
});

export const settingsTable = defineTable({ tableName: "settings" });

/** An entity without a sort key. */
export const settingEntity = defineEntity({
  name: "Setting",
  schema: settingSchema,
  table: settingsTable,
  hashKey: "key",
  fields: { value: "value" },
});

export const labelSchema = z.object({
  pk: z.string(),
  dashed: z.string().optional(),
  under: z.string().optional(),
});

/** An entity whose storage names differ only in punctuation. */
export const labelEntity = defineEntity({
  name: "Label",
  schema: labelSchema,
  table: defineTable({ tableName: "labels" }),
  hashKey: "pk",
  fields: { dashed: "first-name", under: "first_name" },
});

// ---------------------------------------------------------------------------
// Mock adapter factory
// ---------------------------------------------------------------------------

export const createMockAdapter = (): SDKAdapter => ({
  putItem: vi.fn().mockResolvedValue({}),
  getItem: vi.fn().mockResolvedValue({ item: undefined }),
  deleteItem: vi.fn().mockResolvedValue({}),
  updateItem: vi.fn().mockResolvedValue({ attributes: undefined }),
  query: vi.fn().mockResolvedValue({ items: [], count: 0, lastEvaluatedKey: undefined }),
  batchWriteItem: vi.fn().mockResolvedValue({ unprocessedItems: [] }),
  batchGetItem: vi.fn().mockResolvedValue({ responses: {}, unprocessedKeys: [] }),
});

export const createSpyLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

export interface ContextOptions {
  readonly index?: string;
  readonly logger?: Logger;
  readonly strict?: boolean;
}

/** The operation context an entity client would build. */
export const createContext = <E extends EntityDefinition>(
  entity: E,
  adapter: SDKAdapter,
  options: ContextOptions = {},
): OperationContext<InferEntityType<E>, EntityKey<E>> => {
  const target = resolveTarget(entity.table, options.index);
  return {
    adapter,
    target,
    logger: options.logger ?? silentLogger,
    codec: createCodec<InferEntityType<E>, EntityKey<E>>(entity, {
      hashKey: target.hashKey,
      sortKey: target.sortKey,
      strict: options.strict,
    }),
  };
};

/** An error shaped like the backend's rejection of a condition expression. */
export const conditionalCheckFailure = (): Error =>
  Object.assign(new Error("The conditional request failed"), {
    name: "ConditionalCheckFailedException",
  });

// ---------------------------------------------------------------------------
// Sample data
// ---------------------------------------------------------------------------

export const alice: Person = {
  org: "acme",
  id: "alice",
  name: "Alice",
  visits: 3,
  tags: ["admin", "dev"],
};

export const bob: Person = {
  org: "acme",
  id: "bob",
  name: "Bob",
};

/** `alice` as stored under the default key names. */
export const aliceItem = {
  prefix: { S: "acme" },
  suffix: { S: "alice" },
  anothername: { S: "Alice" },
  visits: { N: "3" },
  tags: { SS: ["admin", "dev"] },
} as const;

export const bobItem = {
  prefix: { S: "acme" },
  suffix: { S: "bob" },
  anothername: { S: "Bob" },
} as const;
