/**
 * Entity definition types: how an application type maps onto stored items.
 */

import type { StandardSchemaV1 } from "@standard-schema/spec";
import type { TableDefinition } from "./table.js";
import type { SetKind } from "../marshalling/types.js";

/** Options form of a field declaration. */
export interface FieldOptions {
  /** Storage attribute name. */
  readonly name: string;
  /** Leave the attribute out of the item when the value is empty. */
  readonly omitEmpty?: boolean | undefined;
  /** Store an array or Set as a DynamoDB set of this flavour. */
  readonly kind?: SetKind | undefined;
}

/**
 * A field declaration: either a tag string `name[,omitempty][,stringset|numberset|binaryset]`
 * or the equivalent {@link FieldOptions}.
 */
export type FieldTag = string | FieldOptions;

/** A resolved field declaration. */
export interface FieldDefinition {
  readonly name: string;
  readonly omitEmpty: boolean;
  readonly kind: SetKind | undefined;
}

/** Output type of a Standard Schema. */
export type SchemaOutput<S extends StandardSchemaV1> = StandardSchemaV1.InferOutput<S>;

/** Names of the fields of `T` holding strings: the candidates for key fields. */
export type StringFieldOf<T> = {
  [K in keyof T & string]-?: NonNullable<T[K]> extends string ? K : never;
}[keyof T & string];

/** Names of the non-key fields of `T`. */
export type NonKeyFieldOf<T, HK extends string, SK extends string> = Exclude<
  keyof T & string,
  HK | SK
>;

/** Configuration input for `defineEntity()`. */
export interface EntityConfig<
  S extends StandardSchemaV1,
  T extends TableDefinition,
  HK extends string,
  SK extends string,
  F extends string,
> {
  readonly name: string;
  readonly schema: S;
  readonly table: T;
  /** Field holding the hash key. It is stored under the table's hash key name. */
  readonly hashKey: HK;
  /** Field holding the sort key. It is stored under the table's sort key name. */
  readonly sortKey?: SK | undefined;
  /** Persisted non-key fields; fields not listed here are not stored. */
  readonly fields: { readonly [K in F]: FieldTag };
}

/**
 * The frozen, immutable entity definition produced by `defineEntity()`.
 */
export interface EntityDefinition<
  S extends StandardSchemaV1 = StandardSchemaV1,
  T extends TableDefinition = TableDefinition,
  HK extends string = string,
  SK extends string = string,
  F extends string = string,
> {
  readonly name: string;
  readonly schema: S;
  readonly table: T;
  readonly hashKey: HK;
  readonly sortKey: SK | undefined;
  /** Resolved non-key field declarations, keyed by field name. */
  readonly fields: { readonly [K in F]: FieldDefinition };
}

/**
 * Infers the TypeScript type of an entity from its schema.
 *
 * @example
 * ```ts
 * type Person = InferEntityType<typeof personEntity>;
 * ```
 */
export type InferEntityType<E> =
  E extends EntityDefinition<infer S, infer _T, infer _HK, infer _SK, infer _F>
    ? SchemaOutput<S>
    : never;

/**
 * The fields identifying an entity: the hash key field, and the sort key
 * field when there is one. An absent sort key means "no sort key".
 */
export type EntityKey<E> =
  E extends EntityDefinition<infer S, infer _T, infer HK, infer SK, infer _F>
    ? Pick<SchemaOutput<S>, HK & keyof SchemaOutput<S>> &
        Partial<Pick<SchemaOutput<S>, SK & keyof SchemaOutput<S>>>
    : never;

/** Names of the declared non-key fields of an entity. */
export type EntityFieldName<E> =
  E extends EntityDefinition<infer _S, infer _T, infer _HK, infer _SK, infer F>
    ? F
    : never;

/** Names of the key fields of an entity. */
export type EntityKeyName<E> =
  E extends EntityDefinition<infer _S, infer _T, infer HK, infer SK, infer _F>
    ? HK | SK
    : never;

/**
 * A partial entity accepted by `updater()`: the key plus any subset of
 * the other fields.
 */
export type EntityPatch<E> = EntityKey<E> &
  Partial<Omit<InferEntityType<E>, EntityKeyName<E>>>;
