/**
 * Relationship Declarations
 *
 * The record every generator stage passes along: one field or association
 * of a generated schema module. Declarations are built from the
 * introspection model, renamed by the deduplicator and consumed once by
 * the renderer.
 *
 * Each variant carries only the options that mean something for it, so a
 * join table on a belongsTo or a foreign key on a field does not compile.
 */

import { z } from "zod";

/** All declaration kinds, in the order the renderer groups them */
export const DECLARATION_KINDS = [
  "field",
  "belongsTo",
  "hasMany",
  "hasOne",
  "manyToMany",
] as const;

export type DeclarationKind = (typeof DECLARATION_KINDS)[number];

/**
 * One side of a join table: the join-table column and the table it points at.
 * e.g. ["post_id", "posts"]
 */
export type JoinKey = readonly [column: string, referencedTable: string];

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface FieldOptions {
  /** Enum values, rendered as a value list */
  values?: readonly string[];
}

export interface KeyedAssociationOptions {
  /** Foreign key column, present only when it differs from the default */
  fk?: string;
  /** Referenced column, present only when it is not "id" */
  ref?: string;
}

export interface ManyToManyOptions {
  /**
   * Owning-side column in the join table. Used to disambiguate names;
   * never rendered for many-to-many.
   */
  fk?: string;
  /** Join table name */
  joinThrough?: string;
  /** Both join-table columns. joinKeys[0] is the owning side. */
  joinKeys?: readonly [JoinKey, JoinKey];
}

// ---------------------------------------------------------------------------
// Variants
// ---------------------------------------------------------------------------

export interface FieldDeclaration {
  kind: "field";
  name: string;
  /** Target-language type name (already mapped from the column type) */
  type: string;
  options: FieldOptions;
}

export interface BelongsToDeclaration {
  kind: "belongsTo";
  name: string;
  /** Module name of the related entity */
  target: string;
  options: KeyedAssociationOptions;
}

export interface HasManyDeclaration {
  kind: "hasMany";
  name: string;
  target: string;
  options: KeyedAssociationOptions;
}

export interface HasOneDeclaration {
  kind: "hasOne";
  name: string;
  target: string;
  options: KeyedAssociationOptions;
}

export interface ManyToManyDeclaration {
  kind: "manyToMany";
  name: string;
  target: string;
  options: ManyToManyOptions;
}

export type AssociationDeclaration =
  | BelongsToDeclaration
  | HasManyDeclaration
  | HasOneDeclaration
  | ManyToManyDeclaration;

export type RelationshipDeclaration = FieldDeclaration | AssociationDeclaration;

/**
 * Helper to declare a list with type checking, mostly for fixtures.
 *
 * @example
 * const declarations = defineDeclarations([
 *   { kind: "field", name: "title", type: "string", options: {} },
 *   { kind: "hasMany", name: "comments", target: "Blog.Comment", options: {} },
 * ]);
 */
export function defineDeclarations(
  declarations: RelationshipDeclaration[]
): RelationshipDeclaration[] {
  return declarations;
}

/** Narrows a declaration to one of the association variants */
export function isAssociation(
  declaration: RelationshipDeclaration
): declaration is AssociationDeclaration {
  return declaration.kind !== "field";
}

// ---------------------------------------------------------------------------
// Zod schemas (run-time contract for declarations from untyped sources)
// ---------------------------------------------------------------------------

const identifier = z.string().min(1);

const joinKeySchema = z.tuple([identifier, identifier]);

const keyedOptionsSchema = z
  .object({
    fk: identifier.optional(),
    ref: identifier.optional(),
  })
  .strict();

export const relationshipDeclarationSchema = z.discriminatedUnion("kind", [
  z
    .object({
      kind: z.literal("field"),
      name: identifier,
      type: identifier,
      options: z.object({ values: z.array(z.string()).optional() }).strict(),
    })
    .strict(),
  z
    .object({
      kind: z.literal("belongsTo"),
      name: identifier,
      target: identifier,
      options: keyedOptionsSchema,
    })
    .strict(),
  z
    .object({
      kind: z.literal("hasMany"),
      name: identifier,
      target: identifier,
      options: keyedOptionsSchema,
    })
    .strict(),
  z
    .object({
      kind: z.literal("hasOne"),
      name: identifier,
      target: identifier,
      options: keyedOptionsSchema,
    })
    .strict(),
  z
    .object({
      kind: z.literal("manyToMany"),
      name: identifier,
      target: identifier,
      options: z
        .object({
          fk: identifier.optional(),
          joinThrough: identifier.optional(),
          joinKeys: z.tuple([joinKeySchema, joinKeySchema]).optional(),
        })
        .strict(),
    })
    .strict(),
]);
