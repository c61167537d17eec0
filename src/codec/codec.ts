/**
 * Entity codec: maps entities to attribute maps and back.
 *
 * A codec is built once per entity and storage target and holds no
 * state beyond its configuration, so one instance serves concurrent calls.
 */

import { type Result, ok, err } from "../types/common.js";
import type { EntityDefinition, FieldDefinition } from "../types/entity.js";
import type { KeyPair, StorageError } from "../types/operations.js";
import { createStorageError } from "../types/operations.js";
import type { AttributeMap, AttributeValue } from "../marshalling/types.js";
import { stringOf } from "../marshalling/types.js";
import { isEmptyValue, marshallSet, marshallValue } from "../marshalling/marshall.js";
import { unmarshallSetAsArray, unmarshallValue } from "../marshalling/unmarshall.js";
import { toRecord } from "../utils/records.js";

/** Sort key value stored for entities without a sort key. */
export const SORT_KEY_SENTINEL = "_";

/** Construction-time settings of a codec. */
export interface CodecConfig {
  /** Storage name of the hash key attribute. */
  readonly hashKey: string;
  /** Storage name of the sort key attribute. */
  readonly sortKey: string;
  /** Reject entity fields and item attributes the entity does not declare. */
  readonly strict?: boolean | undefined;
}

/** A codec bound to one entity type `T` with key type `K`. */
export interface Codec<T, K> {
  readonly hashKey: string;
  readonly sortKey: string;
  /** Storage names of the key attributes followed by every declared field. */
  readonly attributeNames: readonly string[];
  readonly encodeKey: (key: K) => Result<AttributeMap, StorageError<never>>;
  readonly encode: (entity: T) => Result<AttributeMap, StorageError<never>>;
  readonly decode: (item: AttributeMap) => Result<T, StorageError<never>>;
  readonly decodeKey: (item: AttributeMap) => Result<K, StorageError<never>>;
  readonly keyOnly: (item: AttributeMap) => AttributeMap;
  /** The raw key strings of an item; a missing attribute reads as "". */
  readonly keyPair: (item: AttributeMap) => KeyPair;
  /** Encodes one value of a declared field, honouring its set kind. */
  readonly encodeField: (
    definition: FieldDefinition | undefined,
    value: unknown,
  ) => Result<AttributeValue, StorageError<never>>;
}

const invalidEntity = (message: string, cause?: unknown): StorageError<never> =>
  createStorageError("invalidEntity", message, cause);

/**
 * Encodes a field value. Arrays and Sets of a set-kind field become a
 * DynamoDB set of that kind; everything else follows {@link marshallValue}.
 */
const encodeValue = (
  definition: FieldDefinition | undefined,
  value: unknown,
): Result<AttributeValue, Error> => {
  const kind = definition?.kind;
  if (kind !== undefined) {
    if (Array.isArray(value)) return marshallSet(value, kind);
    if (value instanceof Set) return marshallSet([...value], kind);
  }
  return marshallValue(value);
};

const isEmptyCollection = (value: unknown): boolean =>
  (Array.isArray(value) && value.length === 0) ||
  (value instanceof Set && value.size === 0);

/**
 * Creates a codec for an entity.
 *
 * @param entity - The entity definition
 * @param config - Key attribute names and strictness
 * @returns A frozen {@link Codec}
 * @throws Error when a declared field is stored under a key attribute name
 *
 * @example
 * ```ts
 * const codec = createCodec<Person, PersonKey>(personEntity, {
 *   hashKey: "prefix",
 *   sortKey: "suffix",
 * });
 * codec.encodeKey({ org: "acme" });
 * // ok({ prefix: { S: "acme" }, suffix: { S: "_" } })
 * ```
 */
export const createCodec = <T, K>(
  entity: EntityDefinition,
  config: CodecConfig,
): Codec<T, K> => {
  const { hashKey, sortKey, strict = false } = config;
  const declared = Object.entries(entity.fields);

  for (const [field, definition] of declared) {
    if (definition.name === hashKey || definition.name === sortKey) {
      throw new Error(
        `Field "${field}" of entity "${entity.name}" is stored as "${definition.name}", which is a key attribute`,
      );
    }
  }

  const keyFields = new Set<string>(
    entity.sortKey === undefined ? [entity.hashKey] : [entity.hashKey, entity.sortKey],
  );
  const attributeNames = [hashKey, sortKey, ...declared.map(([, d]) => d.name)];
  const knownAttributes = new Set(attributeNames);

  const encodeKey = (key: unknown): Result<AttributeMap, StorageError<never>> => {
    const record = toRecord(key);

    const hash = record[entity.hashKey];
    if (typeof hash !== "string" || hash === "") {
      return err(
        createStorageError("invalidKey", `Entity "${entity.name}" has an empty hash key "${entity.hashKey}"`),
      );
    }

    const sort = entity.sortKey === undefined ? undefined : record[entity.sortKey];
    if (sort !== undefined && typeof sort !== "string") {
      return err(
        createStorageError("invalidKey", `Sort key "${entity.sortKey}" of entity "${entity.name}" is not a string`),
      );
    }

    return ok({
      [hashKey]: { S: hash },
      [sortKey]: { S: sort === undefined || sort === "" ? SORT_KEY_SENTINEL : sort },
    });
  };

  const encode = (value: T): Result<AttributeMap, StorageError<never>> => {
    const keys = encodeKey(value);
    if (!keys.success) return keys;

    const record = toRecord(value);

    if (strict) {
      for (const [field, v] of Object.entries(record)) {
        if (v !== undefined && !keyFields.has(field) && entity.fields[field] === undefined) {
          return err(invalidEntity(`Field "${field}" is not declared by entity "${entity.name}"`));
        }
      }
    }

    const item: Record<string, AttributeValue> = {};
    for (const [field, definition] of declared) {
      const v = record[field];
      if (v === undefined) continue;
      if (definition.omitEmpty && isEmptyValue(v)) continue;
      // DynamoDB has no empty sets
      if (definition.kind !== undefined && isEmptyCollection(v)) continue;

      const encoded = encodeValue(definition, v);
      if (!encoded.success) {
        return err(
          invalidEntity(`Cannot encode field "${field}": ${encoded.error.message}`, encoded.error),
        );
      }
      item[definition.name] = encoded.data;
    }

    return ok({ ...item, ...keys.data });
  };

  const readKeys = (
    item: AttributeMap,
  ): Result<{ readonly hash: string; readonly sort: string }, StorageError<never>> => {
    const hashAttr = item[hashKey];
    const sortAttr = item[sortKey];
    if (hashAttr === undefined || sortAttr === undefined) {
      return err(
        invalidEntity(`Invalid schema: item must carry both "${hashKey}" and "${sortKey}" attributes`),
      );
    }

    const hash = stringOf(hashAttr);
    const sort = stringOf(sortAttr);
    if (hash === undefined || sort === undefined) {
      return err(invalidEntity(`Invalid schema: key attributes "${hashKey}" and "${sortKey}" must be strings`));
    }

    return ok({ hash, sort: sort === SORT_KEY_SENTINEL ? "" : sort });
  };

  const decodeKeyRecord = (
    item: AttributeMap,
  ): Result<Record<string, unknown>, StorageError<never>> => {
    const keys = readKeys(item);
    if (!keys.success) return keys;

    const out: Record<string, unknown> = { [entity.hashKey]: keys.data.hash };
    if (entity.sortKey !== undefined) out[entity.sortKey] = keys.data.sort;
    return ok(out);
  };

  const decode = (item: AttributeMap): Result<T, StorageError<never>> => {
    const keys = decodeKeyRecord(item);
    if (!keys.success) return keys;

    if (strict) {
      for (const name of Object.keys(item)) {
        if (!knownAttributes.has(name)) {
          return err(invalidEntity(`Attribute "${name}" is not declared by entity "${entity.name}"`));
        }
      }
    }

    const out = keys.data;
    for (const [field, definition] of declared) {
      const av = item[definition.name];
      if (av === undefined) continue;

      const decoded =
        definition.kind !== undefined ? unmarshallSetAsArray(av) : unmarshallValue(av);
      if (!decoded.success) {
        return err(
          invalidEntity(`Cannot decode field "${field}": ${decoded.error.message}`, decoded.error),
        );
      }
      out[field] = decoded.data;
    }

    // The schema describes T; decoded attributes are trusted to match it.
    return ok(out as T);
  };

  const decodeKey = (item: AttributeMap): Result<K, StorageError<never>> => {
    const keys = decodeKeyRecord(item);
    return keys.success ? ok(keys.data as K) : keys;
  };

  const keyOnly = (item: AttributeMap): AttributeMap => {
    const out: Record<string, AttributeValue> = {};
    const hash = item[hashKey];
    const sort = item[sortKey];
    if (hash !== undefined) out[hashKey] = hash;
    if (sort !== undefined) out[sortKey] = sort;
    return out;
  };

  const keyPair = (item: AttributeMap): KeyPair =>
    Object.freeze({
      hashKey: stringOf(item[hashKey]) ?? "",
      sortKey: stringOf(item[sortKey]) ?? "",
    });

  const encodeField = (
    definition: FieldDefinition | undefined,
    value: unknown,
  ): Result<AttributeValue, StorageError<never>> => {
    const encoded = encodeValue(definition, value);
    return encoded.success
      ? encoded
      : err(invalidEntity(`Cannot encode value: ${encoded.error.message}`, encoded.error));
  };

  return Object.freeze({
    hashKey,
    sortKey,
    attributeNames: Object.freeze(attributeNames),
    encodeKey,
    encode,
    decode,
    decodeKey,
    keyOnly,
    keyPair,
    encodeField,
  });
};
