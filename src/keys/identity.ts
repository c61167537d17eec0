/**
 * Compact hierarchical identifiers: `prefix:segment/segment/...`.
 *
 * An Identity is a plain string; the helpers below keep it normalized.
 * Identities sort lexicographically, so items sharing a path prefix are
 * adjacent under a sort key and can be fetched with one prefix match.
 */

/** A normalized compact identifier. */
export type Identity = string;

const PREFIX_SEPARATOR = ":";
const PATH_SEPARATOR = "/";

const normalizeSegments = (segments: readonly string[]): string[] =>
  segments
    .flatMap((s) => s.split(PATH_SEPARATOR))
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

const render = (prefix: string, segments: readonly string[]): Identity => {
  const path = segments.join(PATH_SEPARATOR);
  return prefix.length > 0 ? `${prefix}${PREFIX_SEPARATOR}${path}` : path;
};

/**
 * Builds an identity from a namespace prefix and path segments.
 * Segments may themselves contain `/`; empty segments are dropped.
 *
 * @example
 * ```ts
 * identity("org", "acme", "people/alice"); // "org:acme/people/alice"
 * identity("", "alice");                   // "alice"
 * ```
 */
export const identity = (prefix: string, ...segments: readonly string[]): Identity =>
  render(prefix.trim(), normalizeSegments(segments));

/**
 * Parses and normalizes a compact identifier string. The prefix ends at
 * the first `:`; a string without one has an empty prefix.
 */
export const parseIdentity = (raw: string): Identity => {
  const at = raw.indexOf(PREFIX_SEPARATOR);
  return at < 0
    ? identity("", raw)
    : identity(raw.slice(0, at), raw.slice(at + 1));
};

/** The namespace prefix, or "" when the identity has none. */
export const identityPrefix = (id: Identity): string => {
  const at = id.indexOf(PREFIX_SEPARATOR);
  return at < 0 ? "" : id.slice(0, at);
};

/** The path after the prefix. */
export const identityPath = (id: Identity): string => {
  const at = id.indexOf(PREFIX_SEPARATOR);
  return at < 0 ? id : id.slice(at + 1);
};

/** Path segments after the prefix. */
export const identitySegments = (id: Identity): readonly string[] =>
  normalizeSegments([identityPath(id)]);

/** Number of path segments. */
export const identityRank = (id: Identity): number => identitySegments(id).length;

/** True when the identity has neither prefix nor path. */
export const isEmptyIdentity = (id: Identity): boolean => id.length === 0;

/** Appends segments to the path. */
export const childOf = (id: Identity, ...segments: readonly string[]): Identity =>
  render(identityPrefix(id), [...identitySegments(id), ...normalizeSegments(segments)]);

/** Drops the last path segment; the prefix is kept. */
export const parentOf = (id: Identity): Identity =>
  render(identityPrefix(id), identitySegments(id).slice(0, -1));

export const equalIdentity = (a: Identity, b: Identity): boolean => a === b;

/** Lexicographic order on the normalized form, shaped for `Array.prototype.sort`. */
export const compareIdentity = (a: Identity, b: Identity): number =>
  a < b ? -1 : a > b ? 1 : 0;
