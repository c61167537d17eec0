import { describe, it, expect, vi, beforeEach } from "vitest";
import { createClient } from "../../core/create-client.js";
import { updateFor, updater } from "../../operations/update.js";
import { conditionFor } from "../../operations/condition.js";
import { cursor, limit } from "../../types/operations.js";
import type { EntityDefinition } from "../../types/entity.js";
import { type MemoryAdapter, createMemoryAdapter } from "../memory-adapter.js";
import {
  alice,
  aliceItem,
  bob,
  bobItem,
  createMockAdapter,
  createSpyLogger,
  personEntity,
  settingEntity,
} from "../fixtures.js";

const aliceKey = { org: "acme", id: "alice" };
const bobKey = { org: "acme", id: "bob" };

describe("createClient()", () => {
  let memory: MemoryAdapter;

  beforeEach(() => {
    memory = createMemoryAdapter();
  });

  it("puts and gets an entity", async () => {
    const people = createClient({ adapter: memory }).entity(personEntity);

    expect(await people.put(alice)).toEqual({ success: true, data: alice });
    expect(memory.items("people")).toEqual([aliceItem]);
    expect(await people.get(aliceKey)).toEqual({ success: true, data: alice });
  });

  it("reports a missing item as notFound", async () => {
    const people = createClient({ adapter: memory }).entity(personEntity);
    const result = await people.get(bobKey);
    expect(result.success).toBe(false);
    if (!result.success && result.error.type === "notFound") {
      expect(result.error.key).toEqual({ hashKey: "acme", sortKey: "bob" });
    }
  });

  it("stores an entity without sort key under the placeholder sort key", async () => {
    const settings = createClient({ adapter: memory }).entity(settingEntity);
    await settings.put({ key: "theme", value: "dark" });

    expect(memory.items("settings")).toEqual([
      { prefix: { S: "theme" }, suffix: { S: "_" }, value: { S: "dark" } },
    ]);
    expect(await settings.get({ key: "theme" })).toEqual({
      success: true,
      data: { key: "theme", value: "dark" },
    });
  });

  it("validates entities unless validation is off", async () => {
    const invalid = { ...alice, email: "not-an-email" };

    const checked = await createClient({ adapter: memory }).entity(personEntity).put(invalid);
    expect(checked.success).toBe(false);
    if (!checked.success) expect(checked.error.type).toBe("validation");
    expect(memory.items("people")).toEqual([]);

    const unchecked = await createClient({ adapter: memory, validation: false })
      .entity(personEntity)
      .put(invalid);
    expect(unchecked).toEqual({ success: true, data: invalid });
  });

  it("rejects a put whose condition fails", async () => {
    memory.seed("people", [aliceItem]);
    const people = createClient({ adapter: memory }).entity(personEntity);

    const result = await people.put({ ...alice, name: "Mallory" }, conditionFor(personEntity, "id").notExists());
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toMatchObject({ type: "preConditionFailed", conflict: true, gone: false });
    }
    expect(memory.items("people")).toEqual([aliceItem]);
  });

  it("updates a whole entity after validating it", async () => {
    memory.seed("people", [aliceItem]);
    const people = createClient({ adapter: memory }).entity(personEntity);

    const rejected = await people.update({ ...alice, email: "nope" });
    expect(rejected.success).toBe(false);
    if (!rejected.success) expect(rejected.error.type).toBe("validation");

    const result = await people.update({ org: "acme", id: "alice", name: "Alicia" });
    expect(result).toEqual({ success: true, data: { ...alice, name: "Alicia" } });
  });

  it("applies typed update operations", async () => {
    memory.seed("people", [aliceItem]);
    const people = createClient({ adapter: memory }).entity(personEntity);
    const visits = updateFor(personEntity, "visits");

    const result = await people.updateWith(
      updater(aliceKey, visits.inc(1)),
      conditionFor(personEntity, "visits").eq(3),
    );
    expect(result).toEqual({ success: true, data: { ...alice, visits: 4 } });
  });

  it("removes an item and returns it", async () => {
    memory.seed("people", [aliceItem, bobItem]);
    const people = createClient({ adapter: memory }).entity(personEntity);

    expect(await people.remove(aliceKey)).toEqual({ success: true, data: alice });
    expect(memory.items("people")).toEqual([bobItem]);
  });

  it("pages through a partition", async () => {
    memory.seed("people", [aliceItem, bobItem]);
    const people = createClient({ adapter: memory }).entity(personEntity);

    const first = await people.match({ org: "acme" }, limit(1));
    expect(first).toEqual({
      success: true,
      data: { items: [alice], cursor: { hashKey: "acme", sortKey: "alice" } },
    });

    const second = await people.match({ org: "acme" }, limit(1), cursor({ hashKey: "acme", sortKey: "alice" }));
    expect(second).toEqual({
      success: true,
      data: { items: [bob], cursor: { hashKey: "acme", sortKey: "bob" } },
    });

    const last = await people.match({ org: "acme" }, limit(1), cursor({ hashKey: "acme", sortKey: "bob" }));
    expect(last).toEqual({ success: true, data: { items: [] } });
  });

  it("writes, reads and removes in batches", async () => {
    const people = createClient({ adapter: memory }).entity(personEntity);

    expect(await people.batchPut([alice, bob])).toEqual({ success: true, data: [] });
    expect(memory.items("people")).toEqual([aliceItem, bobItem]);

    expect(await people.batchGet([aliceKey, bobKey])).toEqual({ success: true, data: [alice, bob] });

    expect(await people.batchRemove([aliceKey, bobKey])).toEqual({ success: true, data: [] });
    expect(memory.items("people")).toEqual([]);
  });

  it("rejects undeclared fields in strict mode", async () => {
    const withNickname = { ...alice, nickname: "Al" };

    const strict = await createClient({ adapter: memory, strict: true })
      .entity(personEntity)
      .put(withNickname);
    expect(strict.success).toBe(false);
    if (!strict.success) {
      expect(strict.error.type).toBe("invalidEntity");
      expect(strict.error.message).toBe('Field "nickname" is not declared by entity "Person"');
    }

    const lenient = await createClient({ adapter: memory }).entity(personEntity).put(withNickname);
    expect(lenient.success).toBe(true);
    expect(memory.items("people")).toEqual([aliceItem]);
  });

  it("reports calls to the configured logger", async () => {
    const logger = createSpyLogger();
    const people = createClient({ adapter: memory, logger }).entity(personEntity);

    await people.get(aliceKey);
    expect(logger.debug).toHaveBeenCalledWith("ddb.getItem", { table: "people" });
  });

  describe("index clients", () => {
    it("queries the index by its name and key attributes", async () => {
      const adapter = createMockAdapter();
      const byYear = createClient({ adapter }).entity(personEntity, { index: "byYear" });

      await byYear.match({ org: "acme", id: "2024" });
      const call = vi.mocked(adapter.query).mock.calls[0]?.[0];
      expect(call?.tableName).toBe("people");
      expect(call?.indexName).toBe("people-year");
      expect(call?.keyConditionExpression).toBe(
        "#__prefix__ = :__prefix__ and begins_with(#__year__, :__year__)",
      );
    });

    it("throws for an index the table does not declare", () => {
      const loose: EntityDefinition = personEntity;
      const client = createClient({ adapter: createMockAdapter() });
      expect(() => client.entity(loose, { index: "byName" })).toThrow(
        'Table "people" has no index "byName"',
      );
    });
  });
});
