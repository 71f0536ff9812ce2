/**
 * Introspection Model
 *
 * The database schema as the generator receives it: tables, their columns
 * and their foreign keys. Producing this model (querying pg_catalog,
 * information_schema, etc.) happens upstream; the generator only reads it.
 *
 * Example:
 *   {
 *     tables: [
 *       {
 *         name: "users",
 *         columns: [{ name: "id", type: "uuid" }],
 *         foreignKeys: [],
 *       },
 *       {
 *         name: "posts",
 *         columns: [
 *           { name: "id", type: "uuid" },
 *           { name: "author_id", type: "uuid" },
 *         ],
 *         foreignKeys: [
 *           {
 *             column: "author_id",
 *             referencedTable: "users",
 *             referencedColumn: "id",
 *           },
 *         ],
 *       },
 *     ],
 *   }
 */

import { z } from "zod";

export interface ColumnModel {
  /** Column name as it appears in the database (snake_case) */
  name: string;

  /** Raw database type name (e.g. "text", "int4", "timestamptz") */
  type: string;

  /** Whether a unique constraint covers exactly this column */
  unique?: boolean;

  /** For enum-typed columns: the allowed values */
  enumValues?: string[];
}

export interface ForeignKeyModel {
  /** Column on this table holding the reference */
  column: string;

  /** Table being referenced */
  referencedTable: string;

  /** Column being referenced, usually "id" */
  referencedColumn: string;
}

export interface TableModel {
  name: string;
  columns: ColumnModel[];
  foreignKeys: ForeignKeyModel[];
}

export interface IntrospectedSchema {
  tables: TableModel[];
}

// ---------------------------------------------------------------------------
// Zod schema
// ---------------------------------------------------------------------------

const columnSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1),
  unique: z.boolean().optional(),
  enumValues: z.array(z.string()).optional(),
});

const foreignKeySchema = z.object({
  column: z.string().min(1),
  referencedTable: z.string().min(1),
  referencedColumn: z.string().min(1),
});

const tableSchema = z
  .object({
    name: z.string().min(1),
    columns: z.array(columnSchema),
    foreignKeys: z.array(foreignKeySchema),
  })
  .superRefine((table, ctx) => {
    const columnNames = new Set(table.columns.map((c) => c.name));
    table.foreignKeys.forEach((fk, index) => {
      if (!columnNames.has(fk.column)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["foreignKeys", index, "column"],
          message:
            `Foreign key column "${fk.column}" ` +
            `is not a column of "${table.name}"`,
        });
      }
    });
  });

/**
 * Validates the whole model: table shapes, unique table names, and that
 * every foreign key points at a table that exists.
 */
export const introspectedSchemaSchema = z
  .object({
    tables: z.array(tableSchema),
  })
  .superRefine((schema, ctx) => {
    const seen = new Set<string>();
    schema.tables.forEach((table, index) => {
      if (seen.has(table.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["tables", index, "name"],
          message: `Duplicate table "${table.name}"`,
        });
      }
      seen.add(table.name);
    });

    schema.tables.forEach((table, tableIndex) => {
      table.foreignKeys.forEach((fk, fkIndex) => {
        if (!seen.has(fk.referencedTable)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [
              "tables",
              tableIndex,
              "foreignKeys",
              fkIndex,
              "referencedTable",
            ],
            message: `Referenced table "${fk.referencedTable}" does not exist`,
          });
        }
      });
    });
  });
