/**
 * Views any value as a read-only record of its own enumerable properties.
 * Non-objects read as an empty record.
 */
export const toRecord = (value: unknown): Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null
    ? Object.fromEntries(Object.entries(value))
    : {};

/** Returns `undefined` for an empty record, so callers can omit it from a request. */
export const nonEmpty = <V>(
  record: Readonly<Record<string, V>>,
): Readonly<Record<string, V>> | undefined =>
  Object.keys(record).length > 0 ? record : undefined;
