import { describe, it, expect } from "vitest";
import {
  unmarshallItem,
  unmarshallSetAsArray,
  unmarshallValue,
} from "../../marshalling/unmarshall.js";

describe("unmarshallValue()", () => {
  it("unmarshalls scalars", () => {
    expect(unmarshallValue({ S: "hello" })).toEqual({ success: true, data: "hello" });
    expect(unmarshallValue({ N: "-2.5" })).toEqual({ success: true, data: -2.5 });
    expect(unmarshallValue({ BOOL: true })).toEqual({ success: true, data: true });
    expect(unmarshallValue({ NULL: true })).toEqual({ success: true, data: null });
  });

  it("rejects a malformed number", () => {
    const result = unmarshallValue({ N: "twelve" });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.message).toBe('Invalid number attribute: "twelve"');
  });

  it("unmarshalls sets to Set instances", () => {
    expect(unmarshallValue({ SS: ["a", "b"] })).toEqual({ success: true, data: new Set(["a", "b"]) });
    expect(unmarshallValue({ NS: ["1", "2"] })).toEqual({ success: true, data: new Set([1, 2]) });
  });

  it("unmarshalls nested lists and maps", () => {
    const result = unmarshallValue({
      M: { tags: { L: [{ S: "a" }, { N: "1" }] }, owner: { M: { id: { S: "x" } } } },
    });
    expect(result).toEqual({ success: true, data: { tags: ["a", 1], owner: { id: "x" } } });
  });

  it("propagates a failure from inside a list", () => {
    expect(unmarshallValue({ L: [{ N: "1" }, { N: "oops" }] }).success).toBe(false);
  });
});

describe("unmarshallSetAsArray()", () => {
  it("returns set members as an array", () => {
    expect(unmarshallSetAsArray({ SS: ["x", "y"] })).toEqual({ success: true, data: ["x", "y"] });
    expect(unmarshallSetAsArray({ NS: ["3", "4"] })).toEqual({ success: true, data: [3, 4] });
  });

  it("falls back to unmarshallValue for other types", () => {
    expect(unmarshallSetAsArray({ L: [{ S: "x" }] })).toEqual({ success: true, data: ["x"] });
  });
});

describe("unmarshallItem()", () => {
  it("unmarshalls an AttributeMap to a plain object", () => {
    const result = unmarshallItem({ name: { S: "Alice" }, age: { N: "30" } });
    expect(result).toEqual({ success: true, data: { name: "Alice", age: 30 } });
  });

  it("returns an empty object for an empty map", () => {
    expect(unmarshallItem({})).toEqual({ success: true, data: {} });
  });
});
