/**
 * @ormgen/generator
 *
 * The generator engine. Turns an introspection model into ORM schema
 * modules: naming, association deduplication, declaration rendering.
 */

// Config
export { loadConfig, type GeneratorConfig } from "./core/config/index.js";

// Logging
export { createLogger } from "./core/logging/index.js";

// Errors
export {
  SchemaValidationError,
  DeclarationContractError,
  assertDeclarations,
  type SchemaIssue,
} from "./core/errors/index.js";

// Naming
export {
  TYPE_MAP,
  mapType,
  isUnsupportedType,
} from "./core/naming/type-map.js";
export {
  KEY_SUFFIX,
  NAME_SEPARATOR,
  formatAssociation,
  stripKeySuffix,
  toModuleName,
  toPlural,
  toSingular,
} from "./core/naming/inflector.js";

// Deduplication
export {
  deduplicateAssociations,
  deduplicateJoinAssociations,
  deduplicateJoins,
  findCollidingNames,
  type JoinAttempt,
} from "./core/dedupe/deduplicate.js";

// Builder
export {
  buildEntityDeclarations,
  buildSchemaDeclarations,
  isJoinTable,
  validateSchema,
  type BuildOptions,
  type EntityDeclarations,
} from "./core/builder/declaration-builder.js";

// Rendering
export { ectoSyntax } from "./core/render/ecto-syntax.js";
export {
  renderDeclaration,
  type RenderOptions,
} from "./core/render/declaration-renderer.js";
export {
  renderEntityModule,
  type ModuleRenderOptions,
} from "./core/render/module-renderer.js";
export {
  generateSchema,
  type GenerateOptions,
  type GeneratedModule,
} from "./core/generator.js";
