/**
 * Column Type Map
 *
 * Maps raw database column types to the target ORM's type names.
 * Anything not listed passes through unchanged; the renderer's type
 * formatter decides how to print it.
 */

/** Raw column type → target type. Read-only for the life of the process. */
export const TYPE_MAP: Readonly<Record<string, string>> = Object.freeze({
  text: "string",
  citext: "string",
  timestamptz: "utc_datetime",
  uuid: "Ecto.UUID",
  jsonb: "EctoJSON",
  bool: "boolean",
  int4: "integer",
});

/**
 * Maps a raw column type to its target type name.
 * A miss is not an error: the raw type is returned as-is.
 *
 * mapType("uuid")    → "Ecto.UUID"
 * mapType("varchar") → "varchar"
 */
export function mapType(rawType: string): string {
  return Object.hasOwn(TYPE_MAP, rawType) ? TYPE_MAP[rawType] : rawType;
}

/**
 * Vector columns (pgvector and friends) have no built-in ORM type.
 * Fields of these types are omitted with a diagnostic instead of rendered.
 */
export function isUnsupportedType(type: string): boolean {
  return /vector$/.test(type);
}
