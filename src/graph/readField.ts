/**
 * Uniform field access over remote records.
 *
 * Responses from the remote graph API vary in shape across versions: some
 * arrive as plain JSON objects, some as keyed collections, some as class
 * instances exposing getters. Everything in this module reads through
 * `readField` and falls back instead of throwing.
 */

interface KeyedLookup {
  has(key: string): boolean;
  get(key: string): unknown;
}

const isKeyedLookup = (item: object): item is KeyedLookup =>
  "has" in item &&
  "get" in item &&
  typeof item.has === "function" &&
  typeof item.get === "function";

const readOne = (item: unknown, name: string, fallback: unknown): unknown => {
  if (item === null || (typeof item !== "object" && typeof item !== "function")) {
    return fallback;
  }
  try {
    if (isKeyedLookup(item) && item.has(name)) {
      return item.get(name);
    }
    if (name in item) {
      return Reflect.get(item, name);
    }
  } catch {
    // Throwing getters and proxies count as absent
    return fallback;
  }
  return fallback;
};

/**
 * Read a field from a mapping or an attribute-bearing object.
 *
 * Key lookup wins over attribute access. Dotted names walk nested values;
 * a missing or nullish segment yields `fallback`.
 *
 * @example
 * readField(new Map([["uuid", "n1"]]), "uuid", null) // "n1"
 * readField({ metadata: { name: "a" } }, "metadata.name", "") // "a"
 * readField(undefined, "uuid", "unknown") // "unknown"
 */
export const readField = (
  item: unknown,
  name: string,
  fallback: unknown,
): unknown => {
  if (!name.includes(".")) {
    return readOne(item, name, fallback);
  }
  let current: unknown = item;
  for (const part of name.split(".")) {
    current = readOne(current, part, undefined);
    if (current === undefined || current === null) {
      return fallback;
    }
  }
  return current;
};

/**
 * Read the first of several candidate names that holds a non-empty string.
 */
export const readString = (
  item: unknown,
  names: readonly string[],
  fallback: string,
): string => {
  for (const name of names) {
    const value = readField(item, name, undefined);
    if (typeof value === "string" && value.length > 0) {
      return value;
    }
    if (typeof value === "number" || typeof value === "bigint") {
      return String(value);
    }
  }
  return fallback;
};

export const readStringArray = (item: unknown, name: string): string[] => {
  const value = readField(item, name, undefined);
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((entry): entry is string => typeof entry === "string");
};

/**
 * Read a nested object as a plain record. Keyed collections are copied
 * entry by entry; anything else yields an empty record.
 */
export const readRecord = (
  item: unknown,
  name: string,
): Record<string, unknown> => {
  const value = readField(item, name, undefined);
  if (value instanceof Map) {
    const record: Record<string, unknown> = {};
    for (const [key, entry] of value) {
      record[String(key)] = entry;
    }
    return record;
  }
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
};
