/**
 * Condition expression types: typed guards for conditional writes.
 */

import type { AttributeMap } from "../marshalling/types.js";
import type { FieldDefinition } from "./entity.js";

/**
 * The attribute a condition or update refers to. Key fields are resolved
 * to the storage names of the client's target when the expression is
 * compiled, since one entity can be served through several indexes.
 */
export type AttributeRef =
  | { readonly kind: "field"; readonly field: string; readonly definition: FieldDefinition }
  | { readonly kind: "hashKey"; readonly field: string }
  | { readonly kind: "sortKey"; readonly field: string };

/** Comparison operators of the condition grammar. */
export type ComparisonOperator = "=" | "<>" | "<" | "<=" | ">" | ">=";

/** An immutable condition node. */
export type Condition =
  | {
      readonly op: "compare";
      readonly operator: ComparisonOperator;
      readonly ref: AttributeRef;
      readonly value: unknown;
    }
  | { readonly op: "exists"; readonly ref: AttributeRef }
  | { readonly op: "notExists"; readonly ref: AttributeRef }
  | {
      readonly op: "between";
      readonly ref: AttributeRef;
      readonly lo: unknown;
      readonly hi: unknown;
    }
  | { readonly op: "in"; readonly ref: AttributeRef; readonly values: readonly unknown[] }
  | { readonly op: "beginsWith"; readonly ref: AttributeRef; readonly value: unknown }
  | { readonly op: "contains"; readonly ref: AttributeRef; readonly value: unknown }
  | { readonly op: "allOf"; readonly left: Condition; readonly right: Condition }
  | { readonly op: "oneOf"; readonly left: Condition; readonly right: Condition };

/** Member type of a list or set field; the field's own type otherwise. */
export type ElementOf<A> =
  A extends ReadonlyArray<infer E> ? E : A extends ReadonlySet<infer E> ? E : A;

/**
 * Predicates over one field with value type `A`.
 *
 * @example
 * ```ts
 * const name = conditionFor(personEntity, "name");
 * await people.put(alice, name.optimistic("Alice"));
 * ```
 */
export interface ConditionField<A> {
  readonly eq: (value: A) => Condition;
  readonly ne: (value: A) => Condition;
  readonly lt: (value: A) => Condition;
  readonly le: (value: A) => Condition;
  readonly gt: (value: A) => Condition;
  readonly ge: (value: A) => Condition;
  /** Inclusive range. */
  readonly between: (lo: A, hi: A) => Condition;
  readonly in: (...values: readonly [A, ...A[]]) => Condition;
  readonly exists: () => Condition;
  readonly notExists: () => Condition;
  readonly hasPrefix: (prefix: A) => Condition;
  readonly contains: (value: ElementOf<A>) => Condition;
  /** `"_"` means the attribute is unset; any other value means equality. */
  readonly is: (value: string) => Condition;
  /** The attribute is absent, or equal to `value`. */
  readonly optimistic: (value: A) => Condition;
}

/** The output of compiling a list of conditions. */
export interface CompiledCondition {
  /** Undefined when there were no conditions. */
  readonly expression: string | undefined;
  readonly names: Readonly<Record<string, string>>;
  readonly values: AttributeMap;
  /** Some clause asserted equality or absence. */
  readonly conflict: boolean;
  /** Some clause asserted inequality or presence. */
  readonly gone: boolean;
}
