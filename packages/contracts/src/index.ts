/**
 * @ormgen/contracts
 *
 * Public API — the shared boundary between the generator and its callers.
 * Types and run-time schemas only; no generation logic lives here.
 */

// Declarations
export type {
  DeclarationKind,
  JoinKey,
  FieldOptions,
  KeyedAssociationOptions,
  ManyToManyOptions,
  FieldDeclaration,
  BelongsToDeclaration,
  HasManyDeclaration,
  HasOneDeclaration,
  ManyToManyDeclaration,
  AssociationDeclaration,
  RelationshipDeclaration,
} from "./declaration.js";
export {
  DECLARATION_KINDS,
  defineDeclarations,
  isAssociation,
  relationshipDeclarationSchema,
} from "./declaration.js";

// Introspection model
export type {
  ColumnModel,
  ForeignKeyModel,
  TableModel,
  IntrospectedSchema,
} from "./introspection.js";
export { introspectedSchemaSchema } from "./introspection.js";

// Declaration syntax
export type {
  DeclarationSyntax,
  ModuleTemplateInput,
  OptionKey,
  OptionKeysByKind,
  OptionValues,
} from "./syntax.js";
export { defineSyntax } from "./syntax.js";

// Context
export type { Logger, LogLevel } from "./context.js";
