/**
 * Inflector
 *
 * Naming helpers shared by the builder and the deduplicator.
 * Pluralization itself is delegated to the `pluralize` package; these
 * functions only decide what gets pluralized.
 */

import pluralize from "pluralize";

/** Suffix that marks a foreign key column ("author_id") */
export const KEY_SUFFIX = "_id";

/** Separator between the words of a generated name */
export const NAME_SEPARATOR = "_";

/**
 * Plural of a snake_case name; only the last word is inflected.
 * "blog_post" → "blog_posts", "category" → "categories"
 */
export function toPlural(name: string): string {
  return pluralize.plural(name);
}

/**
 * Singular of a snake_case name; only the last word is inflected.
 * "blog_posts" → "blog_post", "people" → "person"
 */
export function toSingular(name: string): string {
  return pluralize.singular(name);
}

/**
 * Drops the foreign key suffix, if present.
 * "author_id" → "author", "created_by" → "created_by"
 */
export function stripKeySuffix(column: string): string {
  return column.endsWith(KEY_SUFFIX)
    ? column.slice(0, -KEY_SUFFIX.length)
    : column;
}

/**
 * Converts a table name to a module name.
 * "blog_posts" → "BlogPost", "people" → "Person"
 */
export function toModuleName(tableName: string): string {
  return toSingular(tableName)
    .split(NAME_SEPARATOR)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join("");
}

/**
 * Derives an association alias from a foreign key (or other prefix) and
 * the association's base name, then pluralizes it.
 *
 * The key suffix is stripped to get a prefix. When the prefix already ends
 * with the singular base name as a whole word, the prefix alone is the
 * stem; otherwise the base name is appended.
 *
 * formatAssociation("alt_comment_id", "comments") → "alt_comments"
 * formatAssociation("created_by", "users")        → "created_by_users"
 * formatAssociation("objects_by", "attachments")  → "objects_by_attachments"
 */
export function formatAssociation(
  prefixOrColumn: string,
  base: string
): string {
  const prefix = stripKeySuffix(prefixOrColumn);
  const singularBase = toSingular(base);

  const stem =
    prefix === singularBase || prefix.endsWith(NAME_SEPARATOR + singularBase)
      ? prefix
      : prefix + NAME_SEPARATOR + base;

  return toPlural(stem);
}
