/**
 * Update expression types: typed partial mutations.
 */

import type { AttributeMap } from "../marshalling/types.js";
import type { AttributeRef, ElementOf } from "./condition-expression.js";

/** Members accepted by the set algebra of a field with value type `A`. */
export type SetMembers<A> =
  | ElementOf<A>
  | readonly ElementOf<A>[]
  | ReadonlySet<ElementOf<A>>;

/** A single update operation on one attribute. */
export type UpdateOperation =
  | {
      readonly action:
        | "set"
        | "setNotExists"
        | "inc"
        | "dec"
        | "add"
        | "append"
        | "prepend"
        | "union"
        | "minus";
      readonly ref: AttributeRef;
      readonly value: unknown;
    }
  | { readonly action: "remove"; readonly ref: AttributeRef };

/**
 * Update operations over one field with value type `A`.
 *
 * @example
 * ```ts
 * const visits = updateFor(personEntity, "visits");
 * const tags = updateFor(personEntity, "tags");
 *
 * await people.updateWith(
 *   updater({ org: "acme", id: "alice" }, visits.inc(1), tags.union(["admin"])),
 * );
 * ```
 */
export interface UpdateField<A> {
  /** `SET #a = :a` */
  readonly set: (value: A) => UpdateOperation;
  /** `SET #a = if_not_exists(#a,:a)` */
  readonly setNotExists: (value: A) => UpdateOperation;
  /** `SET #a = #a + :a` */
  readonly inc: (by: number) => UpdateOperation;
  /** `SET #a = #a - :a` */
  readonly dec: (by: number) => UpdateOperation;
  /** `ADD #a :a`: adds to a number, or adds members to a set. */
  readonly add: (value: A) => UpdateOperation;
  /** `SET #a = list_append(#a,:a)` */
  readonly append: (values: A) => UpdateOperation;
  /** `SET #a = list_append(:a,#a)` */
  readonly prepend: (values: A) => UpdateOperation;
  /** `REMOVE #a` */
  readonly remove: () => UpdateOperation;
  /** `ADD #a :a` over set members. A single member is taken as a one-member set. */
  readonly union: (members: SetMembers<A>) => UpdateOperation;
  /** `DELETE #a :a` over set members. */
  readonly minus: (members: SetMembers<A>) => UpdateOperation;
}

/**
 * A partial entity plus explicit operations, as built by `updater()`.
 * Fields of the entity that no operation touches are written with an
 * implicit `SET`.
 */
export interface UpdateRequest<T> {
  readonly entity: T;
  readonly operations: readonly UpdateOperation[];
}

/** The output of compiling an {@link UpdateRequest}. */
export interface CompiledUpdate {
  readonly key: AttributeMap;
  readonly expression: string;
  readonly names: Readonly<Record<string, string>>;
  readonly values: AttributeMap;
}
