/**
 * Association Deduplicator
 *
 * An entity can relate to the same target more than once: two foreign keys
 * to users (created_by, archived_by), two join tables to objects
 * (attachments, object_activity_events). Left alone, both associations get
 * the same name and the generated module does not compile.
 *
 * The deduplicator renames colliding declarations using the metadata that
 * caused the collision:
 *
 *   deduplicateAssociations
 *     foreign key:  comments → alt_comments
 *   deduplicateJoins
 *     join table:   objects → objects_by_attachments
 *     join keys:    users_by_follows → users_by_follows_by_follower_id
 *
 * A declaration with nothing to disambiguate it keeps its name. With three
 * or more same-named declarations some of which lack metadata, the output
 * can still contain a collision. It is left in place; no numbering is added.
 *
 * Inputs are never mutated. Renamed declarations are new objects; kind,
 * target and options are carried over untouched.
 */

import type { RelationshipDeclaration } from "@ormgen/contracts";
import { formatAssociation } from "../naming/inflector.js";
import { DeclarationContractError } from "../errors/index.js";

/** Which join pass to run. 1: join table name. 2: owning join key. */
export type JoinAttempt = 1 | 2;

/**
 * Names that occur more than once in the list.
 */
export function findCollidingNames(
  declarations: readonly RelationshipDeclaration[]
): Set<string> {
  const counts = new Map<string, number>();
  for (const { name } of declarations) {
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }

  const colliding = new Set<string>();
  for (const [name, count] of counts) {
    if (count > 1) colliding.add(name);
  }
  return colliding;
}

/** Code-unit order, not locale-aware */
function compareNames(
  a: RelationshipDeclaration,
  b: RelationshipDeclaration
): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function rename<T extends RelationshipDeclaration>(
  declaration: T,
  name: string
): T {
  return { ...declaration, name };
}

/**
 * Renames colliding declarations after their foreign key.
 *
 * The list is sorted by name first, and the output keeps that order.
 * Same-named declarations come out in reverse input order. Among them,
 * those without an `fk` keep the unqualified name.
 *
 * [comments, foos, comments (fk: alt_comment_id)]
 *   → [alt_comments (fk: alt_comment_id), comments, foos]
 */
export function deduplicateAssociations(
  declarations: readonly RelationshipDeclaration[]
): RelationshipDeclaration[] {
  const sorted = [...declarations].reverse().sort(compareNames);
  const colliding = findCollidingNames(sorted);

  return sorted.map((declaration) => {
    if (!colliding.has(declaration.name)) return declaration;
    if (declaration.kind === "field") return declaration;

    const { fk } = declaration.options;
    if (fk === undefined) return declaration;

    return rename(declaration, formatAssociation(fk, declaration.name));
  });
}

/**
 * One pass of join-association deduplication. Order is preserved.
 *
 * attempt 1: colliding declarations with a join table are renamed to
 *            "<name>_by_<join table>" (pluralized).
 * attempt 2: collisions are recomputed on the input; a colliding
 *            many-to-many with join keys becomes
 *            "<name>_by_<owning join column>". hasMany is exempt.
 */
export function deduplicateJoinAssociations(
  declarations: readonly RelationshipDeclaration[],
  attempt: JoinAttempt
): RelationshipDeclaration[] {
  const colliding = findCollidingNames(declarations);

  return declarations.map((declaration) => {
    if (!colliding.has(declaration.name)) return declaration;

    if (attempt === 1) {
      if (declaration.kind !== "manyToMany") return declaration;
      const { joinThrough } = declaration.options;
      if (joinThrough === undefined) return declaration;
      return rename(
        declaration,
        formatAssociation(declaration.name + "_by", joinThrough)
      );
    }

    if (declaration.kind === "hasMany") return declaration;
    if (declaration.kind !== "manyToMany") return declaration;

    // Renamed even without joinThrough; joinKeys alone name the owning side
    const { joinKeys } = declaration.options;
    if (joinKeys === undefined) return declaration;

    return rename(
      declaration,
      `${declaration.name}_by_${owningJoinColumn(declaration.name, joinKeys)}`
    );
  });
}

/**
 * Both join passes: join table first, then join keys for whatever still
 * collides.
 */
export function deduplicateJoins(
  declarations: readonly RelationshipDeclaration[]
): RelationshipDeclaration[] {
  return deduplicateJoinAssociations(
    deduplicateJoinAssociations(declarations, 1),
    2
  );
}

/**
 * Column of the first join key.
 * Throws unless joinKeys is exactly two [column, table] pairs.
 */
function owningJoinColumn(
  declarationName: string,
  joinKeys: ReadonlyArray<readonly unknown[]>
): string {
  if (joinKeys.length !== 2) {
    throw new DeclarationContractError(
      `joinKeys of "${declarationName}" must have exactly two entries, ` +
        `got ${joinKeys.length}`,
      declarationName
    );
  }

  const [owning] = joinKeys;
  const column = owning[0];
  if (owning.length !== 2 || typeof column !== "string") {
    throw new DeclarationContractError(
      `joinKeys of "${declarationName}" must be [column, table] pairs`,
      declarationName
    );
  }
  return column;
}
