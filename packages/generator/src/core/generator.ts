/**
 * Schema Generator
 *
 * The whole pipeline for one schema:
 *
 *   1. Validate the introspection model
 *   2. Build each entity's declarations (deduplicated)
 *   3. Render each entity into a source module
 *
 * Options not passed explicitly come from loadConfig().
 */

import type { DeclarationSyntax, Logger } from "@ormgen/contracts";
import { loadConfig, type GeneratorConfig } from "./config/index.js";
import { createLogger } from "./logging/index.js";
import { buildSchemaDeclarations } from "./builder/declaration-builder.js";
import { renderEntityModule } from "./render/module-renderer.js";
import { ectoSyntax } from "./render/ecto-syntax.js";

export interface GenerateOptions {
  /** Namespace for generated modules. Defaults to config.modulePrefix. */
  modulePrefix?: string;
  /** Target ORM syntax. Defaults to Ecto. */
  syntax?: DeclarationSyntax;
  /** Defaults to a console logger at config.logLevel */
  logger?: Logger;
  /** Defaults to loadConfig() */
  config?: GeneratorConfig;
}

/** One generated source module */
export interface GeneratedModule {
  table: string;
  moduleName: string;
  source: string;
}

export function generateSchema(
  input: unknown,
  options: GenerateOptions = {}
): GeneratedModule[] {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger("generator", config.logLevel);
  const syntax = options.syntax ?? ectoSyntax;

  const entities = buildSchemaDeclarations(input, {
    modulePrefix: options.modulePrefix ?? config.modulePrefix,
  });

  const modules = entities.map((entity) => {
    logger.debug("Rendering module", {
      table: entity.table,
      module: entity.moduleName,
      declarations: entity.declarations.length,
    });
    return {
      table: entity.table,
      moduleName: entity.moduleName,
      source: renderEntityModule(entity, { syntax, logger }),
    };
  });

  const plural = modules.length === 1 ? "" : "s";
  logger.info(`Generated ${modules.length} module${plural}`, {
    syntax: syntax.name,
  });

  return modules;
}
