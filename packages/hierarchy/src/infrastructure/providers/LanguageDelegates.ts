/**
 * Thin wrappers that serve one provider under a second language tag, for
 * languages sharing one declaration model (Kotlin on the Java model,
 * TypeScript on the JavaScript one). Only `language` changes; every call
 * goes to the wrapped provider.
 */

import type { ElementHandle } from "../../core/ports/CodeModel.js";
import type {
  CallHierarchyProvider,
  CapabilityProvider,
  ImplementationsProvider,
  ProviderSet,
  QueryOptions,
  SuperMethodsProvider,
  SymbolQuery,
  SymbolSearchProvider,
  TypeHierarchyProvider,
} from "../../core/ports/providers.js";
import type {
  CallDirection,
  CallHierarchyResult,
  ImplementationsResult,
  LanguageTag,
  SuperMethodsResult,
  SymbolMatch,
  TypeHierarchyResult,
} from "../../core/model.js";

abstract class Delegate<P extends CapabilityProvider> implements CapabilityProvider {
  constructor(
    protected readonly inner: P,
    readonly language: LanguageTag
  ) {}

  canHandle(element: ElementHandle): boolean {
    return this.inner.canHandle(element);
  }

  isAvailable(): boolean {
    return this.inner.isAvailable();
  }
}

export class TypeHierarchyDelegate extends Delegate<TypeHierarchyProvider> implements TypeHierarchyProvider {
  typeHierarchy(element: ElementHandle, options: QueryOptions): TypeHierarchyResult | null {
    return this.inner.typeHierarchy(element, options);
  }
}

export class CallHierarchyDelegate extends Delegate<CallHierarchyProvider> implements CallHierarchyProvider {
  callHierarchy(
    element: ElementHandle,
    direction: CallDirection,
    depth: number,
    options: QueryOptions
  ): CallHierarchyResult | null {
    return this.inner.callHierarchy(element, direction, depth, options);
  }
}

export class SuperMethodsDelegate extends Delegate<SuperMethodsProvider> implements SuperMethodsProvider {
  superMethods(element: ElementHandle, options: QueryOptions): SuperMethodsResult | null {
    return this.inner.superMethods(element, options);
  }
}

export class SymbolSearchDelegate extends Delegate<SymbolSearchProvider> implements SymbolSearchProvider {
  searchSymbols(query: SymbolQuery, options: QueryOptions): SymbolMatch[] {
    return this.inner.searchSymbols(query, options);
  }
}

export class ImplementationsDelegate extends Delegate<ImplementationsProvider> implements ImplementationsProvider {
  findImplementations(element: ElementHandle, options: QueryOptions): ImplementationsResult | null {
    return this.inner.findImplementations(element, options);
  }
}

/**
 * Wrap every provider of a set for `language`.
 */
export function delegateProviders(providers: ProviderSet, language: LanguageTag): ProviderSet {
  return {
    typeHierarchy: providers.typeHierarchy && new TypeHierarchyDelegate(providers.typeHierarchy, language),
    callHierarchy: providers.callHierarchy && new CallHierarchyDelegate(providers.callHierarchy, language),
    superMethods: providers.superMethods && new SuperMethodsDelegate(providers.superMethods, language),
    symbolSearch: providers.symbolSearch && new SymbolSearchDelegate(providers.symbolSearch, language),
    implementations:
      providers.implementations && new ImplementationsDelegate(providers.implementations, language),
  };
}
