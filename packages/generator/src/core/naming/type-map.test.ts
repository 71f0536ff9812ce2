/**
 * Column Type Map — Test Suite
 */

import { describe, it, expect } from "vitest";
import { TYPE_MAP, isUnsupportedType, mapType } from "./type-map.js";

describe("mapType", () => {
  it.each([
    ["text", "string"],
    ["citext", "string"],
    ["timestamptz", "utc_datetime"],
    ["uuid", "Ecto.UUID"],
    ["jsonb", "EctoJSON"],
    ["bool", "boolean"],
    ["int4", "integer"],
  ])("maps %s to %s", (raw, expected) => {
    expect(mapType(raw)).toBe(expected);
  });

  it("passes unknown types through unchanged", () => {
    expect(mapType("varchar")).toBe("varchar");
    expect(mapType("numeric")).toBe("numeric");
  });

  it("does not resolve inherited object keys", () => {
    expect(mapType("toString")).toBe("toString");
    expect(mapType("constructor")).toBe("constructor");
  });

  it("is frozen", () => {
    expect(Object.isFrozen(TYPE_MAP)).toBe(true);
  });
});

describe("isUnsupportedType", () => {
  it("flags vector types", () => {
    expect(isUnsupportedType("vector")).toBe(true);
    expect(isUnsupportedType("halfvector")).toBe(true);
  });

  it("accepts everything else", () => {
    expect(isUnsupportedType("string")).toBe(false);
    expect(isUnsupportedType("vectors")).toBe(false);
  });
});
