/**
 * Declaration Syntax
 *
 * The keyword vocabulary and punctuation of the target ORM. The renderer
 * knows the shape of a declaration line; everything specific to one ORM
 * comes from a DeclarationSyntax.
 *
 * A line is always:
 *   <keyword> <formatName(name)>, <target | formatType(type)>[, <option>]*
 */

import type {
  DeclarationKind,
  FieldOptions,
  KeyedAssociationOptions,
  ManyToManyOptions,
} from "./declaration.js";

/** Option names per kind, in the order they may be rendered */
export interface OptionKeysByKind {
  field: keyof FieldOptions;
  belongsTo: keyof KeyedAssociationOptions;
  hasMany: keyof KeyedAssociationOptions;
  hasOne: keyof KeyedAssociationOptions;
  manyToMany: keyof ManyToManyOptions;
}

/** Every option name any kind can carry */
export type OptionKey = OptionKeysByKind[DeclarationKind];

/** Value type of each option */
export interface OptionValues {
  values: NonNullable<FieldOptions["values"]>;
  fk: string;
  ref: string;
  joinThrough: string;
  joinKeys: NonNullable<ManyToManyOptions["joinKeys"]>;
}

/** What the module template receives */
export interface ModuleTemplateInput {
  /** Fully qualified module name (e.g. "Blog.Post") */
  moduleName: string;
  /** Table the module maps */
  tableName: string;
  /** Rendered declaration lines, unindented, empty lines already dropped */
  lines: string[];
}

export interface DeclarationSyntax {
  /** Syntax name, for logging */
  readonly name: string;

  /** Keyword that opens each declaration line */
  keywords: Record<DeclarationKind, string>;

  /**
   * Options rendered per kind, in order. An option left out of a kind's
   * list is never rendered for that kind.
   */
  optionOrder: { [K in DeclarationKind]: ReadonlyArray<OptionKeysByKind[K]> };

  /** Formats one option as it is appended after the target */
  formatOption: { [K in OptionKey]: (value: OptionValues[K]) => string };

  /** Formats the declaration name (e.g. "title" → ":title") */
  formatName(name: string): string;

  /** Formats a mapped field type (e.g. "string" → ":string") */
  formatType(type: string): string;

  /** Wraps rendered lines into a complete source module */
  renderModule(input: ModuleTemplateInput): string;
}

/**
 * Helper to define a syntax with type checking.
 */
export function defineSyntax(syntax: DeclarationSyntax): DeclarationSyntax {
  return syntax;
}
