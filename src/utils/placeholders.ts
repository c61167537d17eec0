/**
 * Placeholder naming for DynamoDB expressions.
 *
 * Every attribute is referenced through a name placeholder `#__<attr>__`
 * and every literal through a value placeholder `:__<attr>__`, so an
 * attribute maps to the same tokens wherever it appears in one request.
 *
 * Distinct attributes always get distinct tokens: letters and digits are
 * kept, every other UTF-16 code unit becomes `_x` and four hex digits.
 * Scoped tokens start with `#_<scope>_`, which no unscoped token does.
 */

const escape = (attribute: string): string =>
  attribute.replace(
    /[^A-Za-z0-9]/g,
    (ch) => `_x${ch.charCodeAt(0).toString(16).padStart(4, "0")}`,
  );

const open = (scope: string | undefined): string =>
  scope === undefined ? "__" : `_${scope}_`;

/**
 * Name placeholder of an attribute.
 *
 * @example
 * ```ts
 * namePlaceholder("anothername");      // "#__anothername__"
 * namePlaceholder("first-name");       // "#__first_x002dname__"
 * namePlaceholder("anothername", "c"); // "#_c_anothername__"
 * ```
 */
export const namePlaceholder = (attribute: string, scope?: string): string =>
  `#${open(scope)}${escape(attribute)}__`;

/**
 * Value placeholder of an attribute. `variant` tells apart several
 * values bound to one attribute, such as the bounds of a range.
 *
 * @example
 * ```ts
 * valuePlaceholder("year");      // ":__year__"
 * valuePlaceholder("year", "a"); // ":__year_a__"
 * ```
 */
export const valuePlaceholder = (
  attribute: string,
  variant?: string | number,
  scope?: string,
): string =>
  variant === undefined
    ? `:${open(scope)}${escape(attribute)}__`
    : `:${open(scope)}${escape(attribute)}_${variant}__`;
