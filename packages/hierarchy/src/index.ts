// Data model and errors
export * from "./core/model.js";
export type { QueryError, QueryErrorCode } from "./core/errors.js";
export { IndexNotReadyError, QueryErrors, INDEX_NOT_READY_MESSAGE } from "./core/errors.js";

// Ports
export type {
  CallSite,
  CodeModel,
  DeclarationKind,
  ElementHandle,
  NameCategory,
  Parameter,
  Signature,
  SourceLocation,
  SupertypeRef,
} from "./core/ports/CodeModel.js";
export type { LanguageTraits, SuperMethodStrategy } from "./core/ports/LanguageTraits.js";
export type {
  CallHierarchyProvider,
  Capability,
  CapabilityMap,
  CapabilityProvider,
  ImplementationsProvider,
  LanguageFamily,
  ProviderSet,
  QueryLimits,
  QueryOptions,
  SuperMethodsProvider,
  SymbolQuery,
  SymbolSearchProvider,
  TypeHierarchyProvider,
} from "./core/ports/providers.js";
export { CAPABILITIES, CAPABILITY_LABELS, DEFAULT_LIMITS } from "./core/ports/providers.js";

// Engine
export { CapabilityRegistry } from "./core/registry/CapabilityRegistry.js";
export type { CapabilityRegistryOptions, ProviderDelegator } from "./core/registry/CapabilityRegistry.js";
export { QueryFacade, CALL_DEPTH, SYMBOL_LIMIT } from "./core/services/QueryFacade.js";
export type { CallOptions, QueryResult, SearchOptions } from "./core/services/QueryFacade.js";
export { levenshtein, matchesPattern, rankMatches } from "./core/algorithms/symbolSearch.js";
export { collectUsages, describeDefinition } from "./core/algorithms/navigation.js";
export type { UsageOptions } from "./core/algorithms/navigation.js";

// Providers and code models
export { LANGUAGE_TRAITS, createLanguageFamily, registerLanguageFamilies } from "./infrastructure/providers/LanguageFamilies.js";
export { delegateProviders } from "./infrastructure/providers/LanguageDelegates.js";
export { InMemoryCodeModel } from "./infrastructure/memory/InMemoryCodeModel.js";
export type {
  CallSpec,
  DeclarationSpec,
  InMemoryCodeModelOptions,
  SupertypeSpec,
} from "./infrastructure/memory/InMemoryCodeModel.js";
export { SnapshotSchema, loadSnapshot, parseSnapshot } from "./infrastructure/memory/snapshot.js";
export type { Snapshot } from "./infrastructure/memory/snapshot.js";
export { TypeScriptCodeModel } from "./infrastructure/typescript/TypeScriptCodeModel.js";

// Server wiring
export { loadConfig } from "./config.js";
export type { HierarchyConfig } from "./config.js";
export { buildServices, createServices, loadCodeModel } from "./services.js";
export { registerAllTools } from "./tools/index.js";
export type { Services } from "./tools/index.js";
