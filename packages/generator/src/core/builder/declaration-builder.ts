/**
 * Declaration Builder
 *
 * Converts the introspection model into declaration lists, one per entity.
 * This is the bridge between the database's view of the schema (columns,
 * foreign keys) and the ORM's view (fields, associations).
 *
 * For each table that is not a join table:
 *   - every non-key column becomes a field
 *   - every foreign key becomes a belongsTo
 *   - every foreign key of another table pointing here becomes a hasMany
 *     (hasOne when the key column is unique)
 *   - every join table touching this table becomes a manyToMany
 *
 * Foreign keys and join keys are only recorded in the options when they
 * differ from the ORM's default, which is what the deduplicator uses to
 * tell same-named associations apart.
 *
 * The join passes run over the whole list, not only the many-to-many
 * declarations: a hasMany and a manyToMany to the same table would
 * otherwise both be named after it.
 */

import {
  introspectedSchemaSchema,
  type AssociationDeclaration,
  type FieldDeclaration,
  type IntrospectedSchema,
  type KeyedAssociationOptions,
  type ManyToManyDeclaration,
  type ManyToManyOptions,
  type RelationshipDeclaration,
  type TableModel,
} from "@ormgen/contracts";
import { mapType } from "../naming/type-map.js";
import {
  KEY_SUFFIX,
  stripKeySuffix,
  toModuleName,
  toPlural,
  toSingular,
} from "../naming/inflector.js";
import {
  deduplicateAssociations,
  deduplicateJoins,
} from "../dedupe/deduplicate.js";
import { SchemaValidationError } from "../errors/index.js";

/** Declarations for one generated module */
export interface EntityDeclarations {
  /** Table the module maps */
  table: string;
  /** Fully qualified module name (e.g. "Blog.Post") */
  moduleName: string;
  /**
   * Deduplicated declarations: fields and keyed associations first, then
   * many-to-many
   */
  declarations: RelationshipDeclaration[];
}

export interface BuildOptions {
  /** Namespace for module names. Empty means unqualified ("Post"). */
  modulePrefix?: string;
}

/** Columns a join table may carry besides its two keys */
const JOIN_TABLE_BOOKKEEPING_COLUMNS = new Set([
  "id",
  "inserted_at",
  "updated_at",
]);

const DEFAULT_REFERENCED_COLUMN = "id";

/**
 * A join table has exactly two foreign keys and nothing else worth
 * modelling. It gets no module of its own.
 */
export function isJoinTable(table: TableModel): boolean {
  if (table.foreignKeys.length !== 2) return false;

  const keyColumns = new Set(table.foreignKeys.map((fk) => fk.column));
  return table.columns.every(
    (column) =>
      keyColumns.has(column.name) ||
      JOIN_TABLE_BOOKKEEPING_COLUMNS.has(column.name)
  );
}

/**
 * Validates an introspection model from an untyped source.
 * Throws a SchemaValidationError listing every issue.
 */
export function validateSchema(input: unknown): IntrospectedSchema {
  const result = introspectedSchemaSchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    }));
    throw new SchemaValidationError(
      `Invalid introspection model (${issues.length} issue${
        issues.length === 1 ? "" : "s"
      })`,
      issues
    );
  }

  return result.data;
}

/**
 * Builds the declarations of every entity in the schema, in table order.
 * Join tables are skipped.
 */
export function buildSchemaDeclarations(
  input: unknown,
  options: BuildOptions = {}
): EntityDeclarations[] {
  const schema = validateSchema(input);

  return schema.tables
    .filter((table) => !isJoinTable(table))
    .map((table) => buildEntityDeclarations(schema, table.name, options));
}

/**
 * Builds the declarations of one table. The schema is assumed valid
 * (see validateSchema).
 */
export function buildEntityDeclarations(
  schema: IntrospectedSchema,
  tableName: string,
  options: BuildOptions = {}
): EntityDeclarations {
  const table = schema.tables.find((t) => t.name === tableName);
  if (!table) {
    throw new SchemaValidationError(
      `Table "${tableName}" is not in the schema`,
      [
        {
          path: "tables",
          message: `missing table "${tableName}"`,
          code: "custom",
        },
      ]
    );
  }

  const moduleOf = (name: string) => qualify(options.modulePrefix, name);

  const keyed: RelationshipDeclaration[] = [
    ...buildFields(table),
    ...buildBelongsTo(table, moduleOf),
    ...buildInverseAssociations(schema, table, moduleOf),
  ];
  const joins = buildManyToMany(schema, table, moduleOf);

  return {
    table: table.name,
    moduleName: moduleOf(table.name),
    declarations: deduplicateJoins([
      ...deduplicateAssociations(keyed),
      ...joins,
    ]),
  };
}

// ---------------------------------------------------------------------------
// Per-kind builders
// ---------------------------------------------------------------------------

function buildFields(table: TableModel): FieldDeclaration[] {
  const keyColumns = new Set(table.foreignKeys.map((fk) => fk.column));

  return table.columns
    .filter((column) => !keyColumns.has(column.name))
    .map((column): FieldDeclaration => ({
      kind: "field",
      name: column.name,
      type: mapType(column.type),
      options: column.enumValues ? { values: column.enumValues } : {},
    }));
}

function buildBelongsTo(
  table: TableModel,
  moduleOf: (table: string) => string
): AssociationDeclaration[] {
  return table.foreignKeys.map((fk): AssociationDeclaration => {
    const name = toSingular(stripKeySuffix(fk.column));
    return {
      kind: "belongsTo",
      name,
      target: moduleOf(fk.referencedTable),
      options: keyedOptions(fk.column, name + KEY_SUFFIX, fk.referencedColumn),
    };
  });
}

/**
 * hasMany / hasOne for every foreign key elsewhere that points at this table
 */
function buildInverseAssociations(
  schema: IntrospectedSchema,
  table: TableModel,
  moduleOf: (table: string) => string
): AssociationDeclaration[] {
  const defaultKey = toSingular(table.name) + KEY_SUFFIX;
  const associations: AssociationDeclaration[] = [];

  for (const other of schema.tables) {
    if (isJoinTable(other)) continue;

    for (const fk of other.foreignKeys) {
      if (fk.referencedTable !== table.name) continue;

      const options = keyedOptions(fk.column, defaultKey, fk.referencedColumn);
      const unique = other.columns.some(
        (column) => column.name === fk.column && column.unique
      );
      const target = moduleOf(other.name);

      associations.push(
        unique
          ? { kind: "hasOne", name: toSingular(other.name), target, options }
          : { kind: "hasMany", name: toPlural(other.name), target, options }
      );
    }
  }

  return associations;
}

function buildManyToMany(
  schema: IntrospectedSchema,
  table: TableModel,
  moduleOf: (table: string) => string
): ManyToManyDeclaration[] {
  const declarations: ManyToManyDeclaration[] = [];

  for (const join of schema.tables) {
    if (!isJoinTable(join)) continue;

    join.foreignKeys.forEach((owning, index) => {
      if (owning.referencedTable !== table.name) return;

      const associated = join.foreignKeys[1 - index];
      const owningDefault = toSingular(table.name) + KEY_SUFFIX;
      const associatedDefault =
        toSingular(associated.referencedTable) + KEY_SUFFIX;
      const joinKeys: ManyToManyOptions["joinKeys"] =
        owning.column !== owningDefault ||
        associated.column !== associatedDefault
          ? [
              [owning.column, table.name],
              [associated.column, associated.referencedTable],
            ]
          : undefined;

      declarations.push({
        kind: "manyToMany",
        name: toPlural(associated.referencedTable),
        target: moduleOf(associated.referencedTable),
        options: {
          ...(owning.column !== owningDefault ? { fk: owning.column } : {}),
          joinThrough: join.name,
          ...(joinKeys ? { joinKeys } : {}),
        },
      });
    });
  }

  return declarations;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function keyedOptions(
  column: string,
  defaultColumn: string,
  referencedColumn: string
): KeyedAssociationOptions {
  return {
    ...(column !== defaultColumn ? { fk: column } : {}),
    ...(referencedColumn !== DEFAULT_REFERENCED_COLUMN
      ? { ref: referencedColumn }
      : {}),
  };
}

function qualify(prefix: string | undefined, tableName: string): string {
  const moduleName = toModuleName(tableName);
  return prefix ? `${prefix}.${moduleName}` : moduleName;
}
