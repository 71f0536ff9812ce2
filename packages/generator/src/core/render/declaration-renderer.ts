/**
 * Declaration Renderer
 *
 * Turns one RelationshipDeclaration into one line of generated code:
 *
 *   <keyword> <name>, <target | type>[, <option>]*
 *
 * Two kinds of field render to an empty string:
 *   - "id": the ORM adds the primary key itself
 *   - unsupported (vector) types: omitted with a warning, so the rest of
 *     the schema still generates
 */

import {
  DECLARATION_KINDS,
  type DeclarationSyntax,
  type Logger,
  type OptionKey,
  type OptionValues,
  type RelationshipDeclaration,
} from "@ormgen/contracts";
import { ectoSyntax } from "./ecto-syntax.js";
import { isUnsupportedType } from "../naming/type-map.js";
import { createLogger } from "../logging/index.js";
import { DeclarationContractError } from "../errors/index.js";

export interface RenderOptions {
  /** Target ORM syntax. Defaults to Ecto. */
  syntax?: DeclarationSyntax;
  /** Receives diagnostics for omitted fields */
  logger?: Logger;
}

/** Field name the ORM generates on its own */
const IMPLICIT_PRIMARY_KEY = "id";

const KNOWN_KINDS: readonly string[] = DECLARATION_KINDS;

export function renderDeclaration(
  declaration: RelationshipDeclaration,
  options: RenderOptions = {}
): string {
  const syntax = options.syntax ?? ectoSyntax;

  if (!KNOWN_KINDS.includes(declaration.kind)) {
    throw new DeclarationContractError(
      `Unknown declaration kind "${String(declaration.kind)}"`,
      declaration.name
    );
  }

  if (declaration.kind === "field") {
    if (declaration.name === IMPLICIT_PRIMARY_KEY) return "";

    if (isUnsupportedType(declaration.type)) {
      const logger = options.logger ?? createLogger("declaration-renderer");
      logger.warn(
        `Field "${declaration.name}" has unsupported type ` +
          `"${declaration.type}" and was left out. ` +
          "Add it by hand with a custom type.",
        { field: declaration.name, type: declaration.type }
      );
      return "";
    }
  }

  const keyword = syntax.keywords[declaration.kind];
  const head = `${keyword} ${syntax.formatName(declaration.name)}`;
  const second =
    declaration.kind === "field"
      ? syntax.formatType(declaration.type)
      : declaration.target;

  const order: ReadonlyArray<OptionKey> = syntax.optionOrder[declaration.kind];
  const rendered = order
    .map((key) => formatOption(syntax, key, declaration.options))
    .filter((part): part is string => part !== undefined);

  return [head, second, ...rendered].join(", ");
}

/** Formats one option, or undefined when the declaration does not carry it */
function formatOption(
  syntax: DeclarationSyntax,
  key: OptionKey,
  options: Partial<OptionValues>
): string | undefined {
  const { formatOption: format } = syntax;

  switch (key) {
    case "values":
      return options.values === undefined
        ? undefined
        : format.values(options.values);
    case "fk":
      return options.fk === undefined ? undefined : format.fk(options.fk);
    case "ref":
      return options.ref === undefined ? undefined : format.ref(options.ref);
    case "joinThrough":
      return options.joinThrough === undefined
        ? undefined
        : format.joinThrough(options.joinThrough);
    case "joinKeys":
      return options.joinKeys === undefined
        ? undefined
        : format.joinKeys(options.joinKeys);
  }
}
