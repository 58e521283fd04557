/**
 * The five capability providers. Each resolves its starting element to the
 * right kind of declaration and runs the shared algorithm under its family's
 * traits.
 */

import type { ElementHandle } from "../../core/ports/CodeModel.js";
import type {
  CallHierarchyProvider,
  ImplementationsProvider,
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
  SuperMethodsResult,
  SymbolMatch,
  TypeHierarchyResult,
} from "../../core/model.js";
import { asCallable, asType } from "../../core/algorithms/context.js";
import { resolveTypeHierarchy } from "../../core/algorithms/typeHierarchy.js";
import { resolveCallHierarchy } from "../../core/algorithms/callHierarchy.js";
import { resolveSuperMethods } from "../../core/algorithms/superMethods.js";
import { searchSymbols } from "../../core/algorithms/symbolSearch.js";
import { resolveImplementations } from "../../core/algorithms/implementations.js";
import { BaseProvider } from "./BaseProvider.js";

export class TypeHierarchyProviderImpl extends BaseProvider implements TypeHierarchyProvider {
  typeHierarchy(element: ElementHandle, options: QueryOptions): TypeHierarchyResult | null {
    const type = asType(this.model, element);
    return type ? resolveTypeHierarchy(type, this.context(options)) : null;
  }
}

export class CallHierarchyProviderImpl extends BaseProvider implements CallHierarchyProvider {
  callHierarchy(
    element: ElementHandle,
    direction: CallDirection,
    depth: number,
    options: QueryOptions
  ): CallHierarchyResult | null {
    const callable = asCallable(this.model, element);
    return callable ? resolveCallHierarchy(callable, direction, depth, this.context(options)) : null;
  }
}

export class SuperMethodsProviderImpl extends BaseProvider implements SuperMethodsProvider {
  superMethods(element: ElementHandle, options: QueryOptions): SuperMethodsResult | null {
    const callable = asCallable(this.model, element);
    // Free functions have no declaring type and so nothing to override.
    if (!callable || !this.model.containingType(callable)) return null;
    return resolveSuperMethods(callable, this.context(options));
  }
}

export class SymbolSearchProviderImpl extends BaseProvider implements SymbolSearchProvider {
  searchSymbols(query: SymbolQuery, options: QueryOptions): SymbolMatch[] {
    return searchSymbols(query, this.context(options));
  }
}

export class ImplementationsProviderImpl extends BaseProvider implements ImplementationsProvider {
  findImplementations(element: ElementHandle, options: QueryOptions): ImplementationsResult | null {
    return resolveImplementations(element, this.context(options));
  }
}
