/**
 * Condition expression builder: typed guards for put, remove and update.
 *
 * Accessors are bound to one field of one entity. Each predicate returns
 * a frozen {@link Condition} node; nodes compile into a DynamoDB condition
 * expression with `#__<attr>__` / `:__<attr>__` placeholders.
 */

import type {
  AttributeRef,
  ComparisonOperator,
  CompiledCondition,
  Condition,
  ConditionField,
} from "../types/condition-expression.js";
import type {
  EntityDefinition,
  EntityFieldName,
  EntityKeyName,
  InferEntityType,
} from "../types/entity.js";
import type { StorageError } from "../types/operations.js";
import type { AttributeValue } from "../marshalling/types.js";
import type { Codec } from "../codec/codec.js";
import { type Result, ok } from "../types/common.js";
import { SORT_KEY_SENTINEL } from "../codec/codec.js";
import { attributeRefFor, storageNameOf } from "../codec/attribute-ref.js";
import { namePlaceholder, valuePlaceholder } from "../utils/placeholders.js";

/** Value type of field `K` of entity `E`. */
export type FieldValue<E, K> = K extends keyof InferEntityType<E>
  ? NonNullable<InferEntityType<E>[K]>
  : never;

const compare = (operator: ComparisonOperator, ref: AttributeRef, value: unknown): Condition =>
  Object.freeze({ op: "compare" as const, operator, ref, value });

const notExists = (ref: AttributeRef): Condition =>
  Object.freeze({ op: "notExists" as const, ref });

/** Both conditions hold. */
export const allOf = (left: Condition, right: Condition): Condition =>
  Object.freeze({ op: "allOf" as const, left, right });

/** At least one condition holds. */
export const oneOf = (left: Condition, right: Condition): Condition =>
  Object.freeze({ op: "oneOf" as const, left, right });

/**
 * Creates the condition accessor of one entity field. Key fields are
 * accepted as well as declared fields.
 *
 * @param entity - The entity definition
 * @param field - The field name
 * @returns A frozen {@link ConditionField}
 * @throws Error when the field has no storage name
 *
 * @example
 * ```ts
 * const name = conditionFor(personEntity, "name");
 * const id = conditionFor(personEntity, "id");
 *
 * await people.put(alice, id.notExists());
 * await people.update(alice, name.eq("Alice"));
 * ```
 */
export const conditionFor = <
  E extends EntityDefinition,
  K extends EntityFieldName<E> | EntityKeyName<E>,
>(
  entity: E,
  field: K,
): ConditionField<FieldValue<E, K>> => {
  const ref = attributeRefFor(entity, String(field));

  return Object.freeze({
    eq: (value: FieldValue<E, K>) => compare("=", ref, value),
    ne: (value: FieldValue<E, K>) => compare("<>", ref, value),
    lt: (value: FieldValue<E, K>) => compare("<", ref, value),
    le: (value: FieldValue<E, K>) => compare("<=", ref, value),
    gt: (value: FieldValue<E, K>) => compare(">", ref, value),
    ge: (value: FieldValue<E, K>) => compare(">=", ref, value),
    between: (lo: FieldValue<E, K>, hi: FieldValue<E, K>) =>
      Object.freeze({ op: "between" as const, ref, lo, hi }),
    in: (...values: readonly [FieldValue<E, K>, ...FieldValue<E, K>[]]) =>
      Object.freeze({ op: "in" as const, ref, values: Object.freeze([...values]) }),
    exists: () => Object.freeze({ op: "exists" as const, ref }),
    notExists: () => notExists(ref),
    hasPrefix: (prefix: FieldValue<E, K>) =>
      Object.freeze({ op: "beginsWith" as const, ref, value: prefix }),
    contains: (value: unknown) => Object.freeze({ op: "contains" as const, ref, value }),
    is: (value: string) =>
      value === SORT_KEY_SENTINEL ? notExists(ref) : compare("=", ref, value),
    optimistic: (value: FieldValue<E, K>) => oneOf(notExists(ref), compare("=", ref, value)),
  });
};

/** The codec capabilities the compilers need. */
export type ExpressionCodec = Pick<Codec<unknown, unknown>, "hashKey" | "sortKey" | "encodeField">;

/** Options for {@link compileConditions}. */
export interface CompileConditionOptions {
  /**
   * Namespace for the placeholders, so the condition can share a request
   * with an update expression over the same attributes: with scope `"c"`,
   * `name` is bound as `#_c_name__` / `:_c_name__`. Alphanumeric only.
   */
  readonly scope?: string | undefined;
}

/**
 * Compiles conditions into a DynamoDB condition expression. Several
 * conditions are joined with `and`.
 *
 * Placeholders are derived from storage names, so an attribute used twice
 * binds one value placeholder: the later value wins.
 *
 * @param codec - The codec of the storage client, which fixes key names
 * @param conditions - The conditions, possibly none
 * @returns The expression with its name and value maps, or an
 * `invalidEntity` error when a value cannot be encoded
 *
 * @example
 * ```ts
 * compileConditions(codec, [conditionFor(personEntity, "name").eq("abc")]);
 * // expression: "(#__anothername__ = :__anothername__)"
 * // names:      { "#__anothername__": "anothername" }
 * // values:     { ":__anothername__": { S: "abc" } }
 * ```
 */
export const compileConditions = (
  codec: ExpressionCodec,
  conditions: readonly Condition[],
  options?: CompileConditionOptions,
): Result<CompiledCondition, StorageError<never>> => {
  const scope = options?.scope;
  const names: Record<string, string> = {};
  const values: Record<string, AttributeValue> = {};
  let conflict = false;
  let gone = false;

  const name = (
    ref: AttributeRef,
  ): { readonly token: string; readonly value: (variant?: string | number) => string } => {
    const attr = storageNameOf(ref, codec);
    const token = namePlaceholder(attr, scope);
    names[token] = attr;
    return { token, value: (variant) => valuePlaceholder(attr, variant, scope) };
  };

  const bind = (
    ref: AttributeRef,
    placeholder: string,
    value: unknown,
    element = false,
  ): Result<string, StorageError<never>> => {
    const definition = ref.kind === "field" && !element ? ref.definition : undefined;
    const encoded = codec.encodeField(definition, value);
    if (!encoded.success) return encoded;
    values[placeholder] = encoded.data;
    return ok(placeholder);
  };

  const compile = (c: Condition): Result<string, StorageError<never>> => {
    switch (c.op) {
      case "compare": {
        if (c.operator === "=") conflict = true;
        if (c.operator === "<>") gone = true;
        const { token, value } = name(c.ref);
        const v = bind(c.ref, value(), c.value);
        return v.success ? ok(`(${token} ${c.operator} ${v.data})`) : v;
      }

      case "exists": {
        gone = true;
        return ok(`(attribute_exists(${name(c.ref).token}))`);
      }

      case "notExists": {
        conflict = true;
        return ok(`(attribute_not_exists(${name(c.ref).token}))`);
      }

      case "between": {
        const { token, value } = name(c.ref);
        const lo = bind(c.ref, value("a"), c.lo);
        if (!lo.success) return lo;
        const hi = bind(c.ref, value("b"), c.hi);
        if (!hi.success) return hi;
        return ok(`(${token} BETWEEN ${lo.data} AND ${hi.data})`);
      }

      case "in": {
        const { token, value } = name(c.ref);
        const tokens: string[] = [];
        for (const [i, member] of c.values.entries()) {
          const v = bind(c.ref, value(i), member);
          if (!v.success) return v;
          tokens.push(v.data);
        }
        return ok(`(${token} IN (${tokens.join(",")}))`);
      }

      case "beginsWith": {
        const { token, value } = name(c.ref);
        const v = bind(c.ref, value(), c.value);
        return v.success ? ok(`(begins_with(${token},${v.data}))`) : v;
      }

      case "contains": {
        const { token, value } = name(c.ref);
        const v = bind(c.ref, value(), c.value, true);
        return v.success ? ok(`(contains(${token},${v.data}))`) : v;
      }

      case "allOf":
      case "oneOf": {
        const left = compile(c.left);
        if (!left.success) return left;
        const right = compile(c.right);
        if (!right.success) return right;
        return ok(`(${left.data} ${c.op === "allOf" ? "and" : "or"} ${right.data})`);
      }
    }
  };

  const parts: string[] = [];
  for (const condition of conditions) {
    const compiled = compile(condition);
    if (!compiled.success) return compiled;
    parts.push(compiled.data);
  }

  return ok(
    Object.freeze({
      expression: parts.length > 0 ? parts.join(" and ") : undefined,
      names,
      values,
      conflict,
      gone,
    }),
  );
};
