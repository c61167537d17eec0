/**
 * Factory function for creating immutable entity definitions.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { TableDefinition } from "../types/table.js";
import type {
  EntityConfig,
  EntityDefinition,
  FieldDefinition,
  FieldTag,
  NonKeyFieldOf,
  SchemaOutput,
  StringFieldOf,
} from "../types/entity.js";
import { parseFieldTag } from "../codec/field-tag.js";

/**
 * Defines an entity by binding a Standard Schema to a table, naming its
 * key fields and declaring the storage name of every persisted field.
 *
 * The key fields are stored under the table's (or index's) key attribute
 * names and need no declaration. Every other field is persisted only when
 * listed in `fields`.
 *
 * @param config - The entity configuration
 * @returns A frozen {@link EntityDefinition} object
 * @throws Error on a malformed field tag, or when two fields share a storage name
 *
 * @example
 * ```ts
 * const personEntity = defineEntity({
 *   name: "Person",
 *   schema: z.object({
 *     org: z.string(),
 *     id: z.string(),
 *     name: z.string(),
 *     tags: z.array(z.string()).optional(),
 *   }),
 *   table,
 *   hashKey: "org",
 *   sortKey: "id",
 *   fields: {
 *     name: "anothername",
 *     tags: "tags,omitempty,stringset",
 *   },
 * });
 * ```
 */
export const defineEntity = <
  S extends StandardSchemaV1,
  T extends TableDefinition,
  HK extends StringFieldOf<SchemaOutput<S>>,
  SK extends StringFieldOf<SchemaOutput<S>> = never,
  F extends NonKeyFieldOf<SchemaOutput<S>, HK, SK> = never,
>(
  config: EntityConfig<S, T, HK, SK, F>,
): EntityDefinition<S, T, HK, SK, F> => {
  const sortKey: string | undefined = config.sortKey;
  if (sortKey !== undefined && sortKey === config.hashKey) {
    throw new Error(`Entity "${config.name}" uses "${config.hashKey}" as both hash and sort key`);
  }

  const fields: Record<string, FieldDefinition> = {};
  const owners = new Map<string, string>();
  for (const [field, tag] of Object.entries<FieldTag>(config.fields)) {
    const definition = parseFieldTag(field, tag);
    const owner = owners.get(definition.name);
    if (owner !== undefined) {
      throw new Error(
        `Entity "${config.name}" stores both "${owner}" and "${field}" as "${definition.name}"`,
      );
    }
    owners.set(definition.name, field);
    fields[field] = definition;
  }

  return Object.freeze({
    name: config.name,
    schema: config.schema,
    table: config.table,
    hashKey: config.hashKey,
    sortKey: config.sortKey,
    fields: Object.freeze(fields),
  });
};
