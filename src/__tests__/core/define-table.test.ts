import { describe, it, expect } from "vitest";
import { defineTable, resolveTarget } from "../../core/define-table.js";
import { peopleTable } from "../fixtures.js";

describe("defineTable()", () => {
  it("returns a frozen object", () => {
    const table = defineTable({ tableName: "people" });
    expect(Object.isFrozen(table)).toBe(true);
    expect(Object.isFrozen(table.indexes)).toBe(true);
  });

  it("defaults the key names to prefix and suffix", () => {
    const table = defineTable({ tableName: "people" });
    expect(table.hashKey).toBe("prefix");
    expect(table.sortKey).toBe("suffix");
    expect(table.indexes).toEqual({});
  });

  it("keeps explicit key names", () => {
    const table = defineTable({ tableName: "people", hashKey: "pk", sortKey: "sk" });
    expect(table.hashKey).toBe("pk");
    expect(table.sortKey).toBe("sk");
  });

  it("stores indexes by name", () => {
    expect(peopleTable.indexes.byYear).toEqual({ indexName: "people-year", sortKey: "year" });
  });
});

describe("resolveTarget()", () => {
  it("targets the table without an index", () => {
    expect(resolveTarget(peopleTable)).toEqual({
      tableName: "people",
      hashKey: "prefix",
      sortKey: "suffix",
    });
  });

  it("inherits key names the index leaves out", () => {
    expect(resolveTarget(peopleTable, "byYear")).toEqual({
      tableName: "people",
      indexName: "people-year",
      hashKey: "prefix",
      sortKey: "year",
    });
  });

  it("takes both key names from a global index", () => {
    const table = defineTable({
      tableName: "people",
      indexes: { byEmail: { indexName: "people-email", hashKey: "mail", sortKey: "mailed" } },
    });
    const target = resolveTarget(table, "byEmail");
    expect(target.hashKey).toBe("mail");
    expect(target.sortKey).toBe("mailed");
  });

  it("throws for an undeclared index", () => {
    expect(() => resolveTarget(peopleTable, "byName")).toThrow(
      'Table "people" has no index "byName"',
    );
  });
});
