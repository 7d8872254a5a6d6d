import { describe, expect, it } from "vitest";
import {
  readField,
  readRecord,
  readString,
  readStringArray,
} from "./readField.js";

class EdgeModel {
  constructor(
    readonly uuid_: string,
    readonly fact: string,
  ) {}

  get summary(): string {
    return `${this.fact}!`;
  }
}

describe(readField.name, () => {
  it("reads a key from a Map", () => {
    const item = new Map<string, unknown>([["uuid", "n1"]]);

    expect(readField(item, "uuid", null)).toBe("n1");
  });

  it("reads a property from a plain object", () => {
    expect(readField({ name: "Alice" }, "name", "")).toBe("Alice");
  });

  it("reads a getter from a class instance", () => {
    const edge = new EdgeModel("e1", "likes");

    expect(readField(edge, "summary", "")).toBe("likes!");
  });

  it("prefers key lookup over attribute access", () => {
    const item = new Map<string, unknown>([["size", "from-key"]]);

    // Map also has a `size` property; the entry wins
    expect(readField(item, "size", null)).toBe("from-key");
  });

  it("falls back to attributes when the key is absent", () => {
    const item = new Map<string, unknown>();

    expect(readField(item, "size", null)).toBe(0);
  });

  it("returns the fallback for a missing field", () => {
    expect(readField({ name: "Alice" }, "uuid", "unknown")).toBe("unknown");
  });

  it("returns the fallback for null, undefined and primitives", () => {
    expect(readField(null, "uuid", "d")).toBe("d");
    expect(readField(undefined, "uuid", "d")).toBe("d");
    expect(readField(42, "uuid", "d")).toBe("d");
    expect(readField("text", "length", "d")).toBe("d");
  });

  it("returns the fallback when a getter throws", () => {
    const item = {
      get uuid(): string {
        throw new Error("boom");
      },
    };

    expect(readField(item, "uuid", "d")).toBe("d");
  });

  it("walks dotted names through mixed shapes", () => {
    const item = { metadata: new Map([["owner", { name: "ops" }]]) };

    expect(readField(item, "metadata.owner.name", "")).toBe("ops");
    expect(readField(item, "metadata.missing.name", "none")).toBe("none");
  });

  it("keeps present falsy values", () => {
    expect(readField({ count: 0 }, "count", 5)).toBe(0);
    expect(readField({ flag: false }, "flag", true)).toBe(false);
  });
});

describe(readString.name, () => {
  it("returns the first candidate holding a non-empty string", () => {
    expect(readString({ uuid: "", id: "e7" }, ["uuid", "uuid_", "id"], "")).toBe("e7");
  });

  it("reads attribute-style records", () => {
    expect(readString(new EdgeModel("e1", "x"), ["uuid", "uuid_"], "")).toBe("e1");
  });

  it("stringifies numeric identifiers", () => {
    expect(readString({ id: 12 }, ["id"], "")).toBe("12");
  });

  it("returns the fallback when no candidate matches", () => {
    expect(readString({ uuid: null }, ["uuid"], "unknown")).toBe("unknown");
  });
});

describe(readStringArray.name, () => {
  it("keeps only string entries", () => {
    expect(readStringArray({ labels: ["Entity", 3, "Person"] }, "labels")).toEqual([
      "Entity",
      "Person",
    ]);
  });

  it("returns an empty array for a non-array value", () => {
    expect(readStringArray({ labels: "Entity" }, "labels")).toEqual([]);
  });
});

describe(readRecord.name, () => {
  it("copies a plain object", () => {
    const attributes = { role: "admin" };
    const result = readRecord({ attributes }, "attributes");

    expect(result).toEqual({ role: "admin" });
    expect(result).not.toBe(attributes);
  });

  it("converts a Map into a record", () => {
    const item = { attributes: new Map([["role", "admin"]]) };

    expect(readRecord(item, "attributes")).toEqual({ role: "admin" });
  });

  it("returns an empty record for arrays and missing values", () => {
    expect(readRecord({ attributes: [1, 2] }, "attributes")).toEqual({});
    expect(readRecord({}, "attributes")).toEqual({});
  });
});
