/**
 * Update operation: partial mutations through typed update operations,
 * plus the blind update that writes every field of an entity.
 */

import type { EntityDefinition, EntityFieldName } from "../types/entity.js";
import type { StorageError } from "../types/operations.js";
import type { Condition } from "../types/condition-expression.js";
import type {
  CompiledUpdate,
  SetMembers,
  UpdateField,
  UpdateOperation,
  UpdateRequest,
} from "../types/update-expression.js";
import type { AttributeMap, AttributeValue } from "../marshalling/types.js";
import type { Codec } from "../codec/codec.js";
import type { OperationContext } from "./context.js";
import { type Result, ok, err } from "../types/common.js";
import { createStorageError } from "../types/operations.js";
import { validationFailure } from "../validation/errors.js";
import { attributeRefFor, storageNameOf } from "../codec/attribute-ref.js";
import { namePlaceholder, valuePlaceholder } from "../utils/placeholders.js";
import { nonEmpty } from "../utils/records.js";
import { type ExpressionCodec, type FieldValue, compileConditions } from "./condition.js";
import { logCall, serviceFailure, writeFailure } from "./context.js";

/**
 * Creates the update accessor of a declared non-key field. Key fields
 * only ever address the item and cannot be updated.
 *
 * @param entity - The entity definition
 * @param field - The field name
 * @returns A frozen {@link UpdateField}
 * @throws Error when the field is a key field or has no storage name
 *
 * @example
 * ```ts
 * const name = updateFor(personEntity, "name");
 * const tags = updateFor(personEntity, "tags");
 *
 * await people.updateWith(
 *   updater({ org: "acme", id: "alice" }, name.set("Alice"), tags.minus(["guest"])),
 * );
 * ```
 */
export const updateFor = <E extends EntityDefinition, K extends EntityFieldName<E>>(
  entity: E,
  field: K,
): UpdateField<FieldValue<E, K>> => {
  const ref = attributeRefFor(entity, String(field));
  if (ref.kind !== "field") {
    throw new Error(`Key field "${ref.field}" of entity "${entity.name}" cannot be updated`);
  }

  const op = (action: Exclude<UpdateOperation["action"], "remove">, value: unknown): UpdateOperation =>
    Object.freeze({ action, ref, value });

  return Object.freeze({
    set: (value: FieldValue<E, K>) => op("set", value),
    setNotExists: (value: FieldValue<E, K>) => op("setNotExists", value),
    inc: (by: number) => op("inc", by),
    dec: (by: number) => op("dec", by),
    add: (value: FieldValue<E, K>) => op("add", value),
    append: (values: FieldValue<E, K>) => op("append", values),
    prepend: (values: FieldValue<E, K>) => op("prepend", values),
    remove: () => Object.freeze({ action: "remove" as const, ref }),
    union: (members: SetMembers<FieldValue<E, K>>) => op("union", members),
    minus: (members: SetMembers<FieldValue<E, K>>) => op("minus", members),
  });
};

/**
 * Bundles a partial entity with explicit update operations. The entity
 * must carry the key; its other fields are written unless an operation
 * covers them.
 */
export const updater = <T>(entity: T, ...operations: UpdateOperation[]): UpdateRequest<T> =>
  Object.freeze({ entity, operations: Object.freeze([...operations]) });

/** The codec capabilities {@link compileUpdate} needs. */
export type UpdateCodec<T> = ExpressionCodec & Pick<Codec<T, unknown>, "encode" | "keyOnly">;

const asMembers = (value: unknown): unknown =>
  Array.isArray(value) || value instanceof Set ? value : [value];

/**
 * Compiles an update request into an update expression.
 *
 * Clauses are emitted in the order `SET`, `ADD`, `REMOVE`, `DELETE`;
 * operations inside one clause are joined with `,`. Encoded fields of the
 * entity that no operation covers go to an implicit `SET`, after the
 * explicit ones. Key attributes and `null` values are never written.
 *
 * @returns The key of the item, the expression and its maps; an
 * `invalidKey` or `invalidEntity` error when the entity cannot be
 * encoded; a `validation` error when nothing would change.
 *
 * @example
 * ```ts
 * compileUpdate(codec, updater({ org: "acme", id: "alice" }, name.set("Alice"), age.remove()));
 * // expression: "SET #__name__ = :__name__ REMOVE #__age__"
 * ```
 */
export const compileUpdate = <T>(
  codec: UpdateCodec<T>,
  request: UpdateRequest<T>,
): Result<CompiledUpdate, StorageError<never>> => {
  // 1. Encode the partial entity
  const encoded = codec.encode(request.entity);
  if (!encoded.success) return encoded;

  const names: Record<string, string> = {};
  const values: Record<string, AttributeValue> = {};
  const touched = new Set<string>();
  const set: string[] = [];
  const add: string[] = [];
  const remove: string[] = [];
  const del: string[] = [];

  // 2. Explicit operations
  for (const operation of request.operations) {
    const attr = storageNameOf(operation.ref, codec);
    const name = namePlaceholder(attr);
    names[name] = attr;
    touched.add(attr);

    if (operation.action === "remove") {
      remove.push(name);
      continue;
    }

    const definition = operation.ref.kind === "field" ? operation.ref.definition : undefined;
    const setAlgebra = operation.action === "union" || operation.action === "minus";
    if (setAlgebra && definition?.kind === undefined) {
      return err(
        createStorageError("invalidEntity", `Field "${operation.ref.field}" is not stored as a set`),
      );
    }

    const numeric = operation.action === "inc" || operation.action === "dec";
    const v = codec.encodeField(
      numeric ? undefined : definition,
      setAlgebra ? asMembers(operation.value) : operation.value,
    );
    if (!v.success) return v;
    const value = valuePlaceholder(attr);
    values[value] = v.data;

    switch (operation.action) {
      case "set":
        set.push(`${name} = ${value}`);
        break;
      case "setNotExists":
        set.push(`${name} = if_not_exists(${name},${value})`);
        break;
      case "inc":
        set.push(`${name} = ${name} + ${value}`);
        break;
      case "dec":
        set.push(`${name} = ${name} - ${value}`);
        break;
      case "append":
        set.push(`${name} = list_append(${name},${value})`);
        break;
      case "prepend":
        set.push(`${name} = list_append(${value},${name})`);
        break;
      case "add":
      case "union":
        add.push(`${name} ${value}`);
        break;
      case "minus":
        del.push(`${name} ${value}`);
        break;
    }
  }

  // 3. Implicit SET of the remaining fields
  for (const [attr, av] of Object.entries(encoded.data)) {
    if (attr === codec.hashKey || attr === codec.sortKey || touched.has(attr)) continue;
    if ("NULL" in av) continue;

    const name = namePlaceholder(attr);
    const value = valuePlaceholder(attr);
    names[name] = attr;
    values[value] = av;
    set.push(`${name} = ${value}`);
  }

  // 4. Assemble clauses
  const clauses: Array<readonly [string, readonly string[]]> = [
    ["SET", set],
    ["ADD", add],
    ["REMOVE", remove],
    ["DELETE", del],
  ];
  const expression = clauses
    .filter(([, items]) => items.length > 0)
    .map(([clause, items]) => `${clause} ${items.join(",")}`)
    .join(" ");

  if (expression === "") {
    return err(validationFailure("Update request changes no attribute"));
  }

  return ok(
    Object.freeze({
      key: codec.keyOnly(encoded.data),
      expression,
      names,
      values,
    }),
  );
};

/**
 * Executes an UpdateItem for an update request and returns the item as
 * stored afterwards.
 *
 * @param ctx - The operation context
 * @param encoder - The codec view that encodes the request's entity, which
 * may be a partial entity
 * @param request - The entity and its operations
 * @param conditions - Guards the stored item must satisfy
 * @returns The decoded item, or a StorageError
 */
export const executeUpdate = async <T, K, P>(
  ctx: OperationContext<T, K>,
  encoder: UpdateCodec<P>,
  request: UpdateRequest<P>,
  conditions: readonly Condition[] = [],
): Promise<Result<T, StorageError<never>>> => {
  // 1. Compile the update expression
  const update = compileUpdate(encoder, request);
  if (!update.success) return update;

  // 2. Compile conditions in their own placeholder scope
  const condition = compileConditions(ctx.codec, conditions, { scope: "c" });
  if (!condition.success) return condition;

  // 3. Merge expression attribute maps
  const names = { ...update.data.names, ...condition.data.names };
  const values = { ...update.data.values, ...condition.data.values };

  // 4. Call adapter
  let attributes: AttributeMap | undefined;
  try {
    logCall(ctx, "updateItem");
    const result = await ctx.adapter.updateItem({
      tableName: ctx.target.tableName,
      key: update.data.key,
      updateExpression: update.data.expression,
      conditionExpression: condition.data.expression,
      expressionAttributeNames: nonEmpty(names),
      expressionAttributeValues: nonEmpty(values),
      returnValues: "ALL_NEW",
    });
    attributes = result.attributes;
  } catch (cause) {
    return err(writeFailure(ctx, "updateItem", cause, condition.data));
  }

  // 5. Decode the new image
  if (attributes === undefined) {
    return err(serviceFailure(ctx, "updateItem", new Error("UpdateItem returned no attributes")));
  }
  return ctx.codec.decode(attributes);
};
