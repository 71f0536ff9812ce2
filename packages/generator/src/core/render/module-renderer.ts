/**
 * Module Renderer
 *
 * Renders an entity's declarations into a complete source module using
 * the syntax's module template. Empty lines (the id field, omitted
 * unsupported fields) are dropped before templating.
 */

import type { DeclarationSyntax, Logger } from "@ormgen/contracts";
import type { EntityDeclarations } from "../builder/declaration-builder.js";
import { renderDeclaration } from "./declaration-renderer.js";
import { ectoSyntax } from "./ecto-syntax.js";

export interface ModuleRenderOptions {
  syntax?: DeclarationSyntax;
  logger?: Logger;
}

export function renderEntityModule(
  entity: EntityDeclarations,
  options: ModuleRenderOptions = {}
): string {
  const syntax = options.syntax ?? ectoSyntax;

  const lines = entity.declarations
    .map((declaration) =>
      renderDeclaration(declaration, { syntax, logger: options.logger })
    )
    .filter((line) => line !== "");

  return syntax.renderModule({
    moduleName: entity.moduleName,
    tableName: entity.table,
    lines,
  });
}
