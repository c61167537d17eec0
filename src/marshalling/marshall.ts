/**
 * Marshalls JavaScript values into DynamoDB AttributeValue format.
 */

import { type Result, ok, err } from "../types/common.js";
import type { AttributeValue, AttributeMap, SetKind } from "./types.js";

/**
 * Marshalls a single JavaScript value into a DynamoDB AttributeValue.
 *
 * Conversion rules:
 * - `null` / `undefined` -> `{ NULL: true }`
 * - `string` -> `{ S: "..." }`
 * - `number` / `bigint` -> `{ N: "..." }`
 * - `boolean` -> `{ BOOL: true/false }`
 * - `Uint8Array` -> `{ B: ... }`
 * - `Set<string>` -> `{ SS: [...] }`
 * - `Set<number>` -> `{ NS: [...] }`
 * - `Set<Uint8Array>` -> `{ BS: [...] }`
 * - `Array` -> `{ L: [...] }`
 * - `Date` -> `{ S: "<ISO 8601>" }`
 * - Plain object -> `{ M: { ... } }`
 *
 * @param value - The JavaScript value to marshall
 * @returns A Result containing the DynamoDB AttributeValue
 */
export const marshallValue = (
  value: unknown,
): Result<AttributeValue, Error> => {
  if (value === null || value === undefined) {
    return ok({ NULL: true });
  }

  if (typeof value === "string") {
    return ok({ S: value });
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      return err(new Error(`Cannot marshall non-finite number: ${value}`));
    }
    return ok({ N: String(value) });
  }

  if (typeof value === "bigint") {
    return ok({ N: String(value) });
  }

  if (typeof value === "boolean") {
    return ok({ BOOL: value });
  }

  if (value instanceof Uint8Array) {
    return ok({ B: value });
  }

  if (value instanceof Date) {
    return ok({ S: value.toISOString() });
  }

  if (value instanceof Set) {
    return marshallSet([...value]);
  }

  if (Array.isArray(value)) {
    return marshallList(value);
  }

  if (typeof value === "object") {
    return marshallMap(Object.entries(value));
  }

  return err(new Error(`Cannot marshall value of type ${typeof value}`));
};

/**
 * Marshalls set members, inferring the set flavour from the first member
 * unless `kind` pins it. Repeated members are stored once.
 */
export const marshallSet = (
  values: readonly unknown[],
  kind?: SetKind,
): Result<AttributeValue, Error> => {
  if (values.length === 0) {
    return err(new Error("Cannot marshall empty set; DynamoDB does not support empty sets"));
  }

  const first = values[0];
  const flavour: SetKind | undefined =
    kind ??
    (typeof first === "string"
      ? "stringSet"
      : typeof first === "number" || typeof first === "bigint"
        ? "numberSet"
        : first instanceof Uint8Array
          ? "binarySet"
          : undefined);

  switch (flavour) {
    case "stringSet": {
      const out: string[] = [];
      for (const v of values) {
        if (typeof v !== "string") return err(new Error("String set members must be strings"));
        out.push(v);
      }
      return ok({ SS: [...new Set(out)] });
    }
    case "numberSet": {
      const out: string[] = [];
      for (const v of values) {
        if (typeof v === "bigint" || (typeof v === "number" && Number.isFinite(v))) {
          out.push(String(v));
        } else {
          return err(new Error("Number set members must be finite numbers"));
        }
      }
      return ok({ NS: [...new Set(out)] });
    }
    case "binarySet": {
      const out = new Map<string, Uint8Array>();
      for (const v of values) {
        if (!(v instanceof Uint8Array)) return err(new Error("Binary set members must be Uint8Array"));
        out.set(v.join(","), v);
      }
      return ok({ BS: [...out.values()] });
    }
    default:
      return err(
        new Error(
          `Cannot marshall set with element type ${typeof first}; only string, number, and Uint8Array sets are supported`,
        ),
      );
  }
};

const marshallList = (
  list: readonly unknown[],
): Result<AttributeValue, Error> => {
  const items: AttributeValue[] = [];
  for (const item of list) {
    const result = marshallValue(item);
    if (!result.success) return result;
    items.push(result.data);
  }
  return ok({ L: items });
};

const marshallMap = (
  entries: readonly (readonly [string, unknown])[],
): Result<AttributeValue, Error> => {
  const map: Record<string, AttributeValue> = {};
  for (const [key, value] of entries) {
    if (value === undefined) continue;
    const result = marshallValue(value);
    if (!result.success) return result;
    map[key] = result.data;
  }
  return ok({ M: map });
};

/**
 * Marshalls a plain JavaScript object into a DynamoDB item (AttributeMap).
 *
 * @param item - A plain object representing the item
 * @returns A Result containing the DynamoDB AttributeMap
 */
export const marshallItem = (
  item: Readonly<Record<string, unknown>>,
): Result<AttributeMap, Error> => {
  const map: Record<string, AttributeValue> = {};
  for (const [key, value] of Object.entries(item)) {
    if (value === undefined) continue; // skip undefined attributes
    const result = marshallValue(value);
    if (!result.success) return result;
    map[key] = result.data;
  }
  return ok(map);
};

/**
 * Reports whether a value is the zero value of its kind, the values an
 * `omitempty` field leaves out of the stored item.
 */
export const isEmptyValue = (value: unknown): boolean => {
  if (value === null || value === undefined) return true;
  if (value === "" || value === 0 || value === false) return true;
  if (typeof value === "bigint") return value === 0n;
  if (Array.isArray(value)) return value.length === 0;
  if (value instanceof Set || value instanceof Map) return value.size === 0;
  if (value instanceof Uint8Array) return value.length === 0;
  if (value instanceof Date) return false;
  if (typeof value === "object") return Object.keys(value).length === 0;
  return false;
};
