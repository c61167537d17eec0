import { describe, it, expect, vi, beforeEach } from "vitest";
import { executeMatch } from "../../operations/match.js";
import { cursor, limit, type Cursor } from "../../types/operations.js";
import type { SDKAdapter } from "../../adapters/adapter.js";
import type { AttributeMap } from "../../marshalling/types.js";
import { createMemoryAdapter } from "../memory-adapter.js";
import {
  type Person,
  aliceItem,
  bobItem,
  createContext,
  createMockAdapter,
  createSpyLogger,
  personEntity,
} from "../fixtures.js";

const projectionNames = {
  "#__prefix__": "prefix",
  "#__suffix__": "suffix",
  "#__anothername__": "anothername",
  "#__visits__": "visits",
  "#__tags__": "tags",
  "#__history__": "history",
  "#__scores__": "scores",
  "#__email__": "email",
};

const stored = (org: string, id: string): AttributeMap => ({
  prefix: { S: org },
  suffix: { S: id },
  anothername: { S: id.toUpperCase() },
});

describe("executeMatch()", () => {
  let adapter: SDKAdapter;

  beforeEach(() => {
    adapter = createMockAdapter();
  });

  it("queries the partition of the key", async () => {
    await executeMatch(createContext(personEntity, adapter), { org: "acme" });
    expect(vi.mocked(adapter.query).mock.calls[0]?.[0]).toEqual({
      tableName: "people",
      indexName: undefined,
      keyConditionExpression: "#__prefix__ = :__prefix__",
      expressionAttributeNames: projectionNames,
      expressionAttributeValues: { ":__prefix__": { S: "acme" } },
      projectionExpression:
        "#__prefix__, #__suffix__, #__anothername__, #__visits__, #__tags__, #__history__, #__scores__, #__email__",
      limit: undefined,
      exclusiveStartKey: undefined,
    });
  });

  it("matches a sort key prefix", async () => {
    await executeMatch(createContext(personEntity, adapter), { org: "acme", id: "al" });
    const call = vi.mocked(adapter.query).mock.calls[0]?.[0];
    expect(call?.keyConditionExpression).toBe(
      "#__prefix__ = :__prefix__ and begins_with(#__suffix__, :__suffix__)",
    );
    expect(call?.expressionAttributeValues).toEqual({
      ":__prefix__": { S: "acme" },
      ":__suffix__": { S: "al" },
    });
  });

  it("uses the key names and name of an index", async () => {
    await executeMatch(createContext(personEntity, adapter, { index: "byYear" }), {
      org: "acme",
      id: "2024",
    });
    const call = vi.mocked(adapter.query).mock.calls[0]?.[0];
    expect(call?.indexName).toBe("people-year");
    expect(call?.keyConditionExpression).toBe(
      "#__prefix__ = :__prefix__ and begins_with(#__year__, :__year__)",
    );
    expect(call?.expressionAttributeNames?.["#__year__"]).toBe("year");
  });

  it("lets the last limit and cursor win", async () => {
    await executeMatch(createContext(personEntity, adapter), { org: "acme" }, [
      limit(5),
      cursor({ hashKey: "acme", sortKey: "zed" }),
      limit(2),
      cursor({ hashKey: "acme", sortKey: "bob" }),
    ]);
    const call = vi.mocked(adapter.query).mock.calls[0]?.[0];
    expect(call?.limit).toBe(2);
    expect(call?.exclusiveStartKey).toEqual({ prefix: { S: "acme" }, suffix: { S: "bob" } });
  });

  it("resumes an empty sort key at _ and ignores a cursor without hash key", async () => {
    const ctx = createContext(personEntity, adapter);
    await executeMatch(ctx, { org: "acme" }, [cursor({ hashKey: "acme", sortKey: "" })]);
    await executeMatch(ctx, { org: "acme" }, [cursor({ hashKey: "", sortKey: "bob" })]);

    const calls = vi.mocked(adapter.query).mock.calls;
    expect(calls[0]?.[0]?.exclusiveStartKey).toEqual({ prefix: { S: "acme" }, suffix: { S: "_" } });
    expect(calls[1]?.[0]?.exclusiveStartKey).toBeUndefined();
  });

  it("decodes items and returns a cursor when more remain", async () => {
    vi.mocked(adapter.query).mockResolvedValueOnce({
      items: [aliceItem, bobItem],
      count: 2,
      lastEvaluatedKey: { prefix: { S: "acme" }, suffix: { S: "bob" } },
    });
    const result = await executeMatch(createContext(personEntity, adapter), { org: "acme" });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.items.map((p) => p.id)).toEqual(["alice", "bob"]);
      expect(result.data.cursor).toEqual({ hashKey: "acme", sortKey: "bob" });
    }
  });

  it("returns no cursor on the last page", async () => {
    const result = await executeMatch(createContext(personEntity, adapter), { org: "acme" });
    expect(result).toEqual({ success: true, data: { items: [] } });
  });

  it("fails the page on an undecodable item", async () => {
    vi.mocked(adapter.query).mockResolvedValueOnce({
      items: [aliceItem, { prefix: { S: "acme" } }],
      count: 2,
    });
    const result = await executeMatch(createContext(personEntity, adapter), { org: "acme" });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.type).toBe("invalidEntity");
  });

  it("rejects a key without hash key", async () => {
    const result = await executeMatch(createContext(personEntity, adapter), { org: "" });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.type).toBe("invalidKey");
    expect(adapter.query).not.toHaveBeenCalled();
  });

  it("logs the call and wraps failures", async () => {
    const logger = createSpyLogger();
    vi.mocked(adapter.query).mockRejectedValueOnce(new Error("throttled"));
    const result = await executeMatch(
      createContext(personEntity, adapter, { index: "byYear", logger }),
      { org: "acme" },
      [limit(3)],
    );
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.type).toBe("serviceIO");
    expect(logger.debug).toHaveBeenCalledWith("ddb.query", {
      table: "people",
      index: "people-year",
      limit: 3,
    });
  });

  it("walks every page of a partition until no cursor is returned", async () => {
    const memory = createMemoryAdapter();
    memory.seed("people", [
      stored("acme", "e"),
      stored("acme", "a"),
      stored("zeta", "b"),
      stored("acme", "c"),
      stored("acme", "b"),
      stored("acme", "d"),
    ]);
    const ctx = createContext(personEntity, memory);

    const names: string[] = [];
    const cursors: Cursor[] = [];
    let next: Cursor | undefined;
    for (let page = 0; page < 10; page++) {
      const result = await executeMatch(ctx, { org: "acme" }, next ? [limit(2), cursor(next)] : [limit(2)]);
      if (!result.success) throw new Error(result.error.message);
      names.push(...result.data.items.map((p: Person) => p.name));
      next = result.data.cursor;
      if (next === undefined) break;
      cursors.push(next);
    }

    expect(names).toEqual(["A", "B", "C", "D", "E"]);
    expect(cursors).toEqual([
      { hashKey: "acme", sortKey: "b" },
      { hashKey: "acme", sortKey: "d" },
    ]);
  });

  it("matches only sort keys with the given prefix", async () => {
    const memory = createMemoryAdapter();
    memory.seed("people", [stored("acme", "team/a"), stored("acme", "team/b"), stored("acme", "other")]);

    const result = await executeMatch(createContext(personEntity, memory), {
      org: "acme",
      id: "team/",
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.items.map((p) => p.id)).toEqual(["team/a", "team/b"]);
      expect(result.data.cursor).toBeUndefined();
    }
  });
});
