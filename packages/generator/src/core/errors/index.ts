/**
 * Generator Errors
 *
 * Both errors are fatal for the entity (or schema) being generated.
 * A malformed declaration or model points at a bug upstream; the generator
 * never tries to produce partial output around it.
 */

import {
  relationshipDeclarationSchema,
  type RelationshipDeclaration,
} from "@ormgen/contracts";

/** One problem found while validating the introspection model */
export interface SchemaIssue {
  path: string;
  message: string;
  code: string;
}

/**
 * The introspection model failed validation.
 * Lists every issue, not just the first.
 */
export class SchemaValidationError extends Error {
  public readonly issues: SchemaIssue[];

  constructor(message: string, issues: SchemaIssue[]) {
    super(message);
    this.name = "SchemaValidationError";
    this.issues = issues;
  }
}

/**
 * A declaration broke its contract: an unknown kind, or joinKeys that are
 * not exactly two [column, table] pairs.
 */
export class DeclarationContractError extends Error {
  /** Name of the offending declaration, when it has one */
  public readonly declarationName: string | undefined;

  constructor(message: string, declarationName?: string) {
    super(message);
    this.name = "DeclarationContractError";
    this.declarationName = declarationName;
  }
}

/**
 * Validates declarations that come from an untyped source (JSON, another
 * tool) and returns them typed. Throws on the first invalid record.
 */
export function assertDeclarations(
  input: unknown[]
): RelationshipDeclaration[] {
  return input.map((candidate, index) => {
    const result = relationshipDeclarationSchema.safeParse(candidate);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue.path.length ? ` at "${issue.path.join(".")}"` : "";
      throw new DeclarationContractError(
        `Declaration #${index} is malformed${where}: ${issue.message}`,
        nameOf(candidate)
      );
    }
    return result.data;
  });
}

function nameOf(candidate: unknown): string | undefined {
  if (
    typeof candidate === "object" &&
    candidate !== null &&
    "name" in candidate
  ) {
    return typeof candidate.name === "string" ? candidate.name : undefined;
  }
  return undefined;
}
