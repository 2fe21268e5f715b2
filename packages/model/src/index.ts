/**
 * @typegraph/model
 * Type graph of a compiled object-oriented codebase.
 */

// Descriptors
export type {
  TypeId,
  RawAccessKind,
  MemberReference,
  RawAccessDescriptor,
  FieldDescriptor,
  MethodDescriptor,
  ConstructorDescriptor,
  StaticInitializerDescriptor,
  TypeDescriptor,
  CodebaseDescriptor,
} from "./core/descriptors.js";

// Entities
export { GraphType } from "./core/GraphType.js";
export {
  GraphMember,
  GraphField,
  GraphCodeUnit,
  GraphMethod,
  GraphConstructor,
  GraphStaticInitializer,
} from "./core/members.js";
export {
  CONSTRUCTOR_NAME,
  STATIC_INITIALIZER_NAME,
  VOID_TYPE,
  MEMBER_KIND_LABELS,
  type MemberKind,
  formatSignature,
} from "./core/signatures.js";
export {
  type Access,
  type AccessKind,
  type AccessTarget,
  type Call,
  type ConstructorCall,
  type FieldAccess,
  type FieldAccessType,
  type MethodCall,
  type TargetKind,
} from "./core/accesses.js";
export {
  type Dependency,
  dependencyFromAccess,
  dependencyTargets,
  extractDependencies,
} from "./core/dependencies.js";
export { TypeGraph } from "./core/TypeGraph.js";

// Lookup and predicates
export {
  NotFoundError,
  MemberNotFoundError,
  TypeNotFoundError,
  ConstructionInvariantError,
} from "./core/errors.js";
export * from "./core/predicates.js";

// Construction
export type { ImportContext, UnresolvedReference, TypeAnalysisListener } from "./core/ports/index.js";
export { NO_OP_LISTENER } from "./core/ports/index.js";
export { buildType } from "./core/services/TypeBuilder.js";
export { assertAcyclicHierarchy, completeTypes } from "./core/services/Completion.js";
export { DescriptorImportContext } from "./infrastructure/DescriptorImportContext.js";
export {
  TypeGraphImporter,
  type ImportResult,
  type ImportStats,
  type TypeGraphImporterOptions,
} from "./TypeGraphImporter.js";

// Descriptor files
export {
  DescriptorLoadError,
  type DescriptorLoadFailure,
  importCodebaseFile,
  loadCodebaseDescriptor,
  parseCodebaseDescriptor,
} from "./infrastructure/DescriptorLoader.js";
export { CodebaseDescriptorSchema, TypeDescriptorSchema, simpleNameOf } from "./infrastructure/schemas.js";
