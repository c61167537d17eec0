import { describe, it, expect } from "vitest";
import {
  childOf,
  compareIdentity,
  equalIdentity,
  identity,
  identityPath,
  identityPrefix,
  identityRank,
  identitySegments,
  isEmptyIdentity,
  parentOf,
  parseIdentity,
} from "../../keys/identity.js";

describe("identity()", () => {
  it("joins a prefix and segments", () => {
    expect(identity("org", "acme", "people/alice")).toBe("org:acme/people/alice");
  });

  it("drops empty segments and surrounding blanks", () => {
    expect(identity(" org ", "", " acme ", "//alice/")).toBe("org:acme/alice");
  });

  it("omits the separator without a prefix", () => {
    expect(identity("", "alice")).toBe("alice");
  });

  it("is empty with neither prefix nor path", () => {
    expect(identity("")).toBe("");
    expect(isEmptyIdentity(identity(""))).toBe(true);
    expect(isEmptyIdentity("org:")).toBe(false);
  });
});

describe("parseIdentity()", () => {
  it("normalizes a raw string", () => {
    expect(parseIdentity("org:/acme//alice/")).toBe("org:acme/alice");
  });

  it("splits on the first colon only", () => {
    const id = parseIdentity("urn:isbn:0451450523");
    expect(identityPrefix(id)).toBe("urn");
    expect(identityPath(id)).toBe("isbn:0451450523");
  });

  it("reads a string without colon as a bare path", () => {
    expect(parseIdentity("a/b")).toBe("a/b");
    expect(identityPrefix("a/b")).toBe("");
  });
});

describe("segments and rank", () => {
  it("lists path segments", () => {
    expect(identitySegments("org:acme/people/alice")).toEqual(["acme", "people", "alice"]);
    expect(identityRank("org:acme/people/alice")).toBe(3);
    expect(identityRank("org:")).toBe(0);
  });
});

describe("childOf() and parentOf()", () => {
  it("extends and truncates the path, keeping the prefix", () => {
    const child = childOf("org:acme", "people", "alice");
    expect(child).toBe("org:acme/people/alice");
    expect(parentOf(child)).toBe("org:acme/people");
    expect(parentOf("org:acme")).toBe("org:");
  });
});

describe("ordering", () => {
  it("sorts lexicographically on the normalized form", () => {
    const ids = ["org:b", "org:a/z", "org:a"].sort(compareIdentity);
    expect(ids).toEqual(["org:a", "org:a/z", "org:b"]);
    expect(compareIdentity("org:a", "org:a")).toBe(0);
  });

  it("compares for equality", () => {
    expect(equalIdentity(parseIdentity("org:/a"), identity("org", "a"))).toBe(true);
    expect(equalIdentity("org:a", "org:b")).toBe(false);
  });
});
