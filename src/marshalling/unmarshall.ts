/**
 * Unmarshalls DynamoDB AttributeValue format back into JavaScript values.
 */

import { type Result, ok, err } from "../types/common.js";
import type { AttributeValue, AttributeMap } from "./types.js";

const toNumber = (raw: string): Result<number, Error> => {
  const num = Number(raw);
  return Number.isNaN(num)
    ? err(new Error(`Invalid number attribute: "${raw}"`))
    : ok(num);
};

const toNumbers = (raw: readonly string[]): Result<number[], Error> => {
  const out: number[] = [];
  for (const r of raw) {
    const n = toNumber(r);
    if (!n.success) return n;
    out.push(n.data);
  }
  return ok(out);
};

/**
 * Unmarshalls a single DynamoDB AttributeValue into a JavaScript value.
 *
 * Conversion rules:
 * - `{ S: "..." }` -> `string`
 * - `{ N: "..." }` -> `number`
 * - `{ B: ... }` -> `Uint8Array`
 * - `{ SS: [...] }` -> `Set<string>`
 * - `{ NS: [...] }` -> `Set<number>`
 * - `{ BS: [...] }` -> `Set<Uint8Array>`
 * - `{ L: [...] }` -> `unknown[]`
 * - `{ M: { ... } }` -> `Record<string, unknown>`
 * - `{ NULL: true }` -> `null`
 * - `{ BOOL: ... }` -> `boolean`
 *
 * @param av - The DynamoDB AttributeValue to unmarshall
 * @returns A Result containing the JavaScript value
 */
export const unmarshallValue = (
  av: AttributeValue,
): Result<unknown, Error> => {
  if ("S" in av) return ok(av.S);
  if ("N" in av) return toNumber(av.N);
  if ("B" in av) return ok(av.B);
  if ("SS" in av) return ok(new Set(av.SS));
  if ("NS" in av) {
    const nums = toNumbers(av.NS);
    return nums.success ? ok(new Set(nums.data)) : nums;
  }
  if ("BS" in av) return ok(new Set(av.BS));
  if ("L" in av) {
    const items: unknown[] = [];
    for (const item of av.L) {
      const result = unmarshallValue(item);
      if (!result.success) return result;
      items.push(result.data);
    }
    return ok(items);
  }
  if ("M" in av) return unmarshallItem(av.M);
  if ("NULL" in av) return ok(null);
  if ("BOOL" in av) return ok(av.BOOL);
  return err(new Error("Unrecognized AttributeValue type"));
};

/**
 * Unmarshalls a set attribute into an array, for fields declared with a set
 * kind. Any non-set value falls back to {@link unmarshallValue}.
 */
export const unmarshallSetAsArray = (
  av: AttributeValue,
): Result<unknown, Error> => {
  if ("SS" in av) return ok([...av.SS]);
  if ("NS" in av) return toNumbers(av.NS);
  if ("BS" in av) return ok([...av.BS]);
  return unmarshallValue(av);
};

/**
 * Unmarshalls a DynamoDB item (AttributeMap) into a plain JavaScript object.
 *
 * @param item - The DynamoDB AttributeMap
 * @returns A Result containing the plain object
 */
export const unmarshallItem = (
  item: AttributeMap,
): Result<Record<string, unknown>, Error> => {
  const obj: Record<string, unknown> = {};
  for (const [key, av] of Object.entries(item)) {
    const result = unmarshallValue(av);
    if (!result.success) return result;
    obj[key] = result.data;
  }
  return ok(obj);
};
