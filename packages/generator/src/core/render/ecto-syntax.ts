/**
 * Ecto Syntax
 *
 * The default DeclarationSyntax: Ecto schema modules.
 *
 *   field :status, :string, values: [:draft, :published]
 *   belongs_to :author, Blog.User, foreign_key: :author_id
 *   many_to_many :tags, Blog.Tag, join_through: "post_tags",
 *     join_keys: [post_id: :id, tag_id: :id]
 */

import { defineSyntax } from "@ormgen/contracts";

/** Atoms that can be written bare; anything else is quoted (:"in progress") */
const BARE_ATOM = /^[A-Za-z_][A-Za-z0-9_]*[?!]?$/;

function atom(value: string): string {
  return BARE_ATOM.test(value) ? `:${value}` : `:${JSON.stringify(value)}`;
}

export const ectoSyntax = Object.freeze(
  defineSyntax({
    name: "ecto",

    keywords: {
      field: "field",
      belongsTo: "belongs_to",
      hasMany: "has_many",
      hasOne: "has_one",
      manyToMany: "many_to_many",
    },

    // many_to_many never takes foreign_key
    optionOrder: {
      field: ["values"],
      belongsTo: ["fk", "ref"],
      hasMany: ["fk", "ref"],
      hasOne: ["fk", "ref"],
      manyToMany: ["joinThrough", "joinKeys"],
    },

    formatOption: {
      values: (values) => `values: [${values.map(atom).join(", ")}]`,
      fk: (column) => `foreign_key: ${atom(column)}`,
      ref: (column) => `references: ${atom(column)}`,
      joinThrough: (table) => `join_through: ${JSON.stringify(table)}`,
      joinKeys: ([[current], [associated]]) =>
        `join_keys: [${current}: :id, ${associated}: :id]`,
    },

    formatName: atom,

    // Module types (Ecto.UUID, EctoJSON) are written as-is, primitives as atoms
    formatType: (type) => (/^[A-Z]/.test(type) ? type : atom(type)),

    renderModule: ({ moduleName, tableName, lines }) =>
      [
        `defmodule ${moduleName} do`,
        "  use Ecto.Schema",
        "",
        `  schema ${JSON.stringify(tableName)} do`,
        ...lines.map((line) => `    ${line}`),
        "  end",
        "end",
        "",
      ].join("\n"),
  })
);
