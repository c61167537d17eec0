/**
 * Field tag parsing: `name[,omitempty][,stringset|numberset|binaryset]`.
 */

import type { SetKind } from "../marshalling/types.js";
import type { FieldDefinition, FieldTag } from "../types/entity.js";

const SET_KINDS: Readonly<Record<string, SetKind>> = {
  stringset: "stringSet",
  numberset: "numberSet",
  binaryset: "binarySet",
};

/**
 * Resolves a field declaration into a {@link FieldDefinition}.
 *
 * @throws Error when the storage name is empty or a flag is unknown.
 * Field declarations are fixed at definition time, so a bad tag is a
 * programming error and surfaces when the entity is defined.
 *
 * @example
 * ```ts
 * parseFieldTag("tags,omitempty,stringset");
 * // { name: "tags", omitEmpty: true, kind: "stringSet" }
 * ```
 */
export const parseFieldTag = (field: string, tag: FieldTag): FieldDefinition => {
  if (typeof tag !== "string") {
    if (tag.name.trim() === "") {
      throw new Error(`Field "${field}" has an empty storage name`);
    }
    return Object.freeze({
      name: tag.name.trim(),
      omitEmpty: tag.omitEmpty ?? false,
      kind: tag.kind,
    });
  }

  const [rawName = "", ...flags] = tag.split(",");
  const name = rawName.trim();
  if (name === "") {
    throw new Error(`Field "${field}" has an empty storage name in tag "${tag}"`);
  }

  let omitEmpty = false;
  let kind: SetKind | undefined;
  for (const raw of flags) {
    const flag = raw.trim().toLowerCase();
    if (flag === "omitempty") {
      omitEmpty = true;
      continue;
    }
    const setKind = SET_KINDS[flag];
    if (setKind === undefined) {
      throw new Error(`Field "${field}" has an unknown tag option "${raw.trim()}"`);
    }
    kind = setKind;
  }

  return Object.freeze({ name, omitEmpty, kind });
};
