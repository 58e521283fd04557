import type { ElementHandle } from "./CodeModel.js";
import type {
  CallDirection,
  CallHierarchyResult,
  ImplementationsResult,
  LanguageTag,
  SearchScope,
  SuperMethodsResult,
  SymbolMatch,
  TypeHierarchyResult,
} from "../model.js";

/**
 * Upper bounds applied by every traversal. Independent of the per-request
 * depth and limit.
 */
export interface QueryLimits {
  /** Recursion ceiling for supertype and override walks */
  maxTypeDepth: number;
  /** Cap on the flat subtype list */
  maxSubtypes: number;
  /** Absolute recursion ceiling for call hierarchy */
  maxCallStackDepth: number;
  /** Cap on the children of one call hierarchy node */
  maxCallsPerLevel: number;
  /** Cap on the overridden methods added to a caller search */
  maxPolymorphicMethods: number;
  maxImplementations: number;
  maxUsages: number;
}

export const DEFAULT_LIMITS: QueryLimits = {
  maxTypeDepth: 100,
  maxSubtypes: 100,
  maxCallStackDepth: 50,
  maxCallsPerLevel: 20,
  maxPolymorphicMethods: 10,
  maxImplementations: 100,
  maxUsages: 500,
};

export interface QueryOptions {
  signal?: AbortSignal;
  limits: QueryLimits;
}

export interface SymbolQuery {
  pattern: string;
  scope: SearchScope;
  limit: number;
  /** Keep only declarations of this language */
  language?: LanguageTag;
}

/**
 * Common shape of every capability provider.
 */
export interface CapabilityProvider {
  /** Tag this provider is registered under */
  readonly language: LanguageTag;
  canHandle(element: ElementHandle): boolean;
  /** Whether the host carries this provider's language support */
  isAvailable(): boolean;
}

export interface TypeHierarchyProvider extends CapabilityProvider {
  /** null when the element is neither a type nor inside one */
  typeHierarchy(element: ElementHandle, options: QueryOptions): TypeHierarchyResult | null;
}

export interface CallHierarchyProvider extends CapabilityProvider {
  /** null when the element is neither a callable nor inside one */
  callHierarchy(
    element: ElementHandle,
    direction: CallDirection,
    depth: number,
    options: QueryOptions
  ): CallHierarchyResult | null;
}

export interface SuperMethodsProvider extends CapabilityProvider {
  /** null when the element is neither a method nor inside one */
  superMethods(element: ElementHandle, options: QueryOptions): SuperMethodsResult | null;
}

export interface SymbolSearchProvider extends CapabilityProvider {
  /** Matches in this provider's languages, ranked, at most `query.limit` */
  searchSymbols(query: SymbolQuery, options: QueryOptions): SymbolMatch[];
}

export interface ImplementationsProvider extends CapabilityProvider {
  /** null when the element is neither a type nor a method */
  findImplementations(element: ElementHandle, options: QueryOptions): ImplementationsResult | null;
}

export interface CapabilityMap {
  typeHierarchy: TypeHierarchyProvider;
  callHierarchy: CallHierarchyProvider;
  superMethods: SuperMethodsProvider;
  symbolSearch: SymbolSearchProvider;
  implementations: ImplementationsProvider;
}

export type Capability = keyof CapabilityMap;

export const CAPABILITIES: readonly Capability[] = [
  "typeHierarchy",
  "callHierarchy",
  "superMethods",
  "symbolSearch",
  "implementations",
];

export const CAPABILITY_LABELS: Record<Capability, string> = {
  typeHierarchy: "type hierarchy",
  callHierarchy: "call hierarchy",
  superMethods: "super methods",
  symbolSearch: "symbol search",
  implementations: "implementations",
};

/** Providers one family contributes, keyed by capability */
export type ProviderSet = { [C in Capability]?: CapabilityMap[C] };

/**
 * A language family: statically compiled, instantiated only when its probe
 * confirms the host supports it.
 */
export interface LanguageFamily {
  readonly id: string;
  /** Primary tag first; the rest are served through delegates */
  readonly languages: readonly LanguageTag[];
  /** May throw; a throwing probe counts as unavailable */
  probe(): boolean;
  createProviders(): ProviderSet;
}
