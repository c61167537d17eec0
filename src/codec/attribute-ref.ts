/**
 * Resolution of field names to attribute references, shared by the
 * condition and update builders.
 */

import type { EntityDefinition } from "../types/entity.js";
import type { AttributeRef } from "../types/condition-expression.js";

/**
 * Resolves a field of an entity to the attribute it is stored in.
 *
 * @throws Error when the field is neither a key field nor declared in
 * `fields`. Accessors are built when a schema is set up, so this fails
 * there and not at request time.
 */
export const attributeRefFor = (entity: EntityDefinition, field: string): AttributeRef => {
  if (field === entity.hashKey) return Object.freeze({ kind: "hashKey" as const, field });
  if (field === entity.sortKey) return Object.freeze({ kind: "sortKey" as const, field });

  const definition = entity.fields[field];
  if (definition === undefined) {
    throw new Error(`Field "${field}" of entity "${entity.name}" has no storage name`);
  }
  return Object.freeze({ kind: "field" as const, field, definition });
};

/** The storage name of a reference under the given key attribute names. */
export const storageNameOf = (
  ref: AttributeRef,
  keys: { readonly hashKey: string; readonly sortKey: string },
): string => {
  switch (ref.kind) {
    case "hashKey":
      return keys.hashKey;
    case "sortKey":
      return keys.sortKey;
    case "field":
      return ref.definition.name;
  }
};
