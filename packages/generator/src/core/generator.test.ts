/**
 * Schema Generator — Test Suite
 *
 * End to end: introspection model in, rendered modules out.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import type { IntrospectedSchema, Logger } from "@ormgen/contracts";
import { generateSchema } from "./generator.js";
import type { GeneratorConfig } from "./config/index.js";
import { SchemaValidationError } from "./errors/index.js";

function createTestLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

const config: GeneratorConfig = { modulePrefix: "Blog", logLevel: "info" };

const schema: IntrospectedSchema = {
  tables: [
    {
      name: "users",
      columns: [
        { name: "id", type: "uuid" },
        { name: "email", type: "citext" },
      ],
      foreignKeys: [],
    },
    {
      name: "posts",
      columns: [
        { name: "id", type: "uuid" },
        { name: "title", type: "text" },
        { name: "embedding", type: "vector" },
        { name: "author_id", type: "uuid" },
        { name: "editor_id", type: "uuid" },
      ],
      foreignKeys: [
        {
          column: "author_id",
          referencedTable: "users",
          referencedColumn: "id",
        },
        {
          column: "editor_id",
          referencedTable: "users",
          referencedColumn: "id",
        },
      ],
    },
  ],
};

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("generateSchema", () => {
  it("renders one module per entity", () => {
    const modules = generateSchema(schema, {
      config,
      logger: createTestLogger(),
    });

    expect(modules.map((m) => [m.table, m.moduleName])).toEqual([
      ["users", "Blog.User"],
      ["posts", "Blog.Post"],
    ]);
    expect(modules[0].source).toBe(
      [
        "defmodule Blog.User do",
        "  use Ecto.Schema",
        "",
        '  schema "users" do',
        "    field :email, :string",
        "    has_many :editor_posts, Blog.Post, foreign_key: :editor_id",
        "    has_many :author_posts, Blog.Post, foreign_key: :author_id",
        "  end",
        "end",
        "",
      ].join("\n")
    );
    expect(modules[1].source).toBe(
      [
        "defmodule Blog.Post do",
        "  use Ecto.Schema",
        "",
        '  schema "posts" do',
        "    belongs_to :author, Blog.User",
        "    belongs_to :editor, Blog.User",
        "    field :title, :string",
        "  end",
        "end",
        "",
      ].join("\n")
    );
  });

  it("reports omitted fields and a summary through the logger", () => {
    const logger = createTestLogger();

    generateSchema(schema, { config, logger });

    expect(logger.warn).toHaveBeenCalledWith(
      'Field "embedding" has unsupported type "vector" and was left out. Add it by hand with a custom type.',
      { field: "embedding", type: "vector" }
    );
    expect(logger.debug).toHaveBeenCalledTimes(2);
    expect(logger.info).toHaveBeenCalledWith("Generated 2 modules", {
      syntax: "ecto",
    });
  });

  it("prefers an explicit module prefix over the configured one", () => {
    const modules = generateSchema(schema, {
      config,
      modulePrefix: "Shop",
      logger: createTestLogger(),
    });

    expect(modules.map((m) => m.moduleName)).toEqual([
      "Shop.User",
      "Shop.Post",
    ]);
  });

  it("reads the configuration from the environment when none is given", () => {
    vi.stubEnv("ORMGEN_MODULE_PREFIX", "Acme");

    const modules = generateSchema(schema, { logger: createTestLogger() });

    expect(modules[0].moduleName).toBe("Acme.User");
  });

  it("produces nothing for an invalid model", () => {
    expect(() =>
      generateSchema(
        { tables: [{ name: "users", columns: [] }] },
        { config, logger: createTestLogger() }
      )
    ).toThrow(SchemaValidationError);
  });

  it("handles an empty schema", () => {
    const logger = createTestLogger();
    expect(generateSchema({ tables: [] }, { config, logger })).toEqual([]);
    expect(logger.info).toHaveBeenCalledWith("Generated 0 modules", {
      syntax: "ecto",
    });
  });
});
