/**
 * Declarations — Test Suite
 *
 * Validates the run-time contract for declarations that arrive from an
 * untyped source. The schema must accept every well-formed variant and
 * reject options that do not belong to the variant.
 */

import { describe, it, expect } from "vitest";
import {
  DECLARATION_KINDS,
  defineDeclarations,
  isAssociation,
  relationshipDeclarationSchema,
} from "./declaration.js";

// ---------------------------------------------------------------------------
// Accepted shapes
// ---------------------------------------------------------------------------

describe("relationshipDeclarationSchema", () => {
  describe("accepts well-formed declarations", () => {
    it("a field with enum values", () => {
      const result = relationshipDeclarationSchema.safeParse({
        kind: "field",
        name: "status",
        type: "string",
        options: { values: ["draft", "published"] },
      });
      expect(result.success).toBe(true);
    });

    it("a belongsTo with fk and ref", () => {
      const result = relationshipDeclarationSchema.safeParse({
        kind: "belongsTo",
        name: "author",
        target: "Blog.User",
        options: { fk: "author_id", ref: "uuid" },
      });
      expect(result.success).toBe(true);
    });

    it("a hasMany and a hasOne without options", () => {
      expect(
        relationshipDeclarationSchema.safeParse({
          kind: "hasMany",
          name: "comments",
          target: "Blog.Comment",
          options: {},
        }).success
      ).toBe(true);
      expect(
        relationshipDeclarationSchema.safeParse({
          kind: "hasOne",
          name: "profile",
          target: "Blog.Profile",
          options: {},
        }).success
      ).toBe(true);
    });

    it("a manyToMany with join keys", () => {
      const result = relationshipDeclarationSchema.safeParse({
        kind: "manyToMany",
        name: "tags",
        target: "Blog.Tag",
        options: {
          joinThrough: "post_tags",
          joinKeys: [
            ["post_id", "posts"],
            ["tag_id", "tags"],
          ],
        },
      });
      expect(result.success).toBe(true);
    });
  });

  // -------------------------------------------------------------------------
  // Rejected shapes
  // -------------------------------------------------------------------------

  describe("rejects malformed declarations", () => {
    it("an unknown kind", () => {
      const result = relationshipDeclarationSchema.safeParse({
        kind: "embedsMany",
        name: "lines",
        target: "Blog.Line",
        options: {},
      });
      expect(result.success).toBe(false);
    });

    it("joinKeys with a single entry", () => {
      const result = relationshipDeclarationSchema.safeParse({
        kind: "manyToMany",
        name: "tags",
        target: "Blog.Tag",
        options: { joinThrough: "post_tags", joinKeys: [["post_id", "posts"]] },
      });
      expect(result.success).toBe(false);
    });

    it("joinThrough on a belongsTo", () => {
      const result = relationshipDeclarationSchema.safeParse({
        kind: "belongsTo",
        name: "author",
        target: "Blog.User",
        options: { joinThrough: "authors" },
      });
      expect(result.success).toBe(false);
    });

    it("a target on a field", () => {
      const result = relationshipDeclarationSchema.safeParse({
        kind: "field",
        name: "title",
        type: "string",
        target: "Blog.Title",
        options: {},
      });
      expect(result.success).toBe(false);
    });

    it("an empty name", () => {
      const result = relationshipDeclarationSchema.safeParse({
        kind: "hasMany",
        name: "",
        target: "Blog.Comment",
        options: {},
      });
      expect(result.success).toBe(false);
    });
  });
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

describe("isAssociation", () => {
  it("is false only for fields", () => {
    const [field, ...associations] = defineDeclarations([
      { kind: "field", name: "title", type: "string", options: {} },
      { kind: "belongsTo", name: "author", target: "Blog.User", options: {} },
      {
        kind: "hasMany",
        name: "comments",
        target: "Blog.Comment",
        options: {},
      },
      { kind: "hasOne", name: "profile", target: "Blog.Profile", options: {} },
      { kind: "manyToMany", name: "tags", target: "Blog.Tag", options: {} },
    ]);

    expect(isAssociation(field)).toBe(false);
    for (const association of associations) {
      expect(isAssociation(association)).toBe(true);
    }
  });
});

describe("DECLARATION_KINDS", () => {
  it("lists the five kinds", () => {
    expect(DECLARATION_KINDS).toEqual([
      "field",
      "belongsTo",
      "hasMany",
      "hasOne",
      "manyToMany",
    ]);
  });
});
