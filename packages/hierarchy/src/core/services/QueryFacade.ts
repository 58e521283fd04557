import { Err, Ok, andThen, isCancellation, type Result } from "@codenav/core";
import type { CodeModel, ElementHandle } from "../ports/CodeModel.js";
import {
  CAPABILITIES,
  CAPABILITY_LABELS,
  DEFAULT_LIMITS,
  type Capability,
  type CapabilityMap,
  type QueryLimits,
  type QueryOptions,
  type SymbolQuery,
} from "../ports/providers.js";
import type { CapabilityRegistry } from "../registry/CapabilityRegistry.js";
import { IndexNotReadyError, QueryErrors, type QueryError } from "../errors.js";
import { rankMatches } from "../algorithms/symbolSearch.js";
import { collectUsages, describeDefinition } from "../algorithms/navigation.js";
import type {
  CallDirection,
  CallHierarchyResult,
  DefinitionResult,
  ElementRef,
  ImplementationsResult,
  IndexStatus,
  LanguageTag,
  SearchScope,
  SuperMethodsResult,
  SymbolMatch,
  TypeHierarchyResult,
  UsagesResult,
} from "../model.js";

export type QueryResult<T> = Result<T, QueryError>;

export interface CallOptions {
  signal?: AbortSignal;
}

export interface SearchOptions extends CallOptions {
  scope?: SearchScope;
  limit?: number;
  /** Only search providers registered under this tag */
  language?: LanguageTag;
}

export const CALL_DEPTH = { min: 1, max: 5, default: 3 } as const;
export const SYMBOL_LIMIT = { min: 1, max: 100, default: 25 } as const;

/** Non-finite values (NaN, Infinity) take the fallback. */
function clamp(value: number, bounds: { min: number; max: number; default: number }): number {
  if (!Number.isFinite(value)) return bounds.default;
  return Math.min(bounds.max, Math.max(bounds.min, Math.trunc(value)));
}

/**
 * Single entry point for the transport layer. Resolves the starting element,
 * picks a provider for its language and runs the query.
 *
 * Stateless between calls: every query allocates its own visited sets.
 * Cancellation and a model that is still indexing surface as QueryError
 * values, never as exceptions.
 */
export class QueryFacade {
  private readonly limits: QueryLimits;

  constructor(
    private readonly model: CodeModel,
    private readonly registry: CapabilityRegistry,
    limits: Partial<QueryLimits> = {}
  ) {
    this.limits = { ...DEFAULT_LIMITS, ...limits };
  }

  typeHierarchy(ref: ElementRef, options: CallOptions = {}): QueryResult<TypeHierarchyResult> {
    return this.guard(() =>
      andThen(this.dispatch("typeHierarchy", ref), ({ element, provider }) => {
        const result = provider.typeHierarchy(element, this.queryOptions(options));
        return result ? Ok(result) : Err(QueryErrors.notATypeOrMethod("type"));
      })
    );
  }

  callHierarchy(
    ref: ElementRef,
    direction: CallDirection,
    depth: number = CALL_DEPTH.default,
    options: CallOptions = {}
  ): QueryResult<CallHierarchyResult> {
    const boundedDepth = clamp(depth, CALL_DEPTH);
    return this.guard(() =>
      andThen(this.dispatch("callHierarchy", ref), ({ element, provider }) => {
        const result = provider.callHierarchy(element, direction, boundedDepth, this.queryOptions(options));
        return result ? Ok(result) : Err(QueryErrors.notATypeOrMethod("method"));
      })
    );
  }

  superMethods(ref: ElementRef, options: CallOptions = {}): QueryResult<SuperMethodsResult> {
    return this.guard(() =>
      andThen(this.dispatch("superMethods", ref), ({ element, provider }) => {
        const result = provider.superMethods(element, this.queryOptions(options));
        return result ? Ok(result) : Err(QueryErrors.notATypeOrMethod("method"));
      })
    );
  }

  findImplementations(ref: ElementRef, options: CallOptions = {}): QueryResult<ImplementationsResult> {
    return this.guard(() =>
      andThen(this.dispatch("implementations", ref), ({ element, provider }) => {
        const result = provider.findImplementations(element, this.queryOptions(options));
        return result ? Ok(result) : Err(QueryErrors.notATypeOrMethod("type or method"));
      })
    );
  }

  /**
   * Search every available symbol provider, merge, drop duplicates by
   * file, line and name, then rank and cut to the limit.
   */
  searchSymbols(pattern: string, options: SearchOptions = {}): QueryResult<SymbolMatch[]> {
    const trimmed = pattern.trim();
    if (trimmed.length === 0) {
      return Err(QueryErrors.invalidArgument("Query cannot be empty"));
    }
    const limit = clamp(options.limit ?? SYMBOL_LIMIT.default, SYMBOL_LIMIT);
    const query: SymbolQuery = {
      pattern: trimmed,
      scope: options.scope ?? "project",
      limit,
      language: options.language,
    };

    return this.guard(() => {
      const providers = this.registry
        .availableProviders("symbolSearch")
        .filter((provider) => options.language === undefined || provider.language === options.language);
      if (options.language !== undefined && providers.length === 0) {
        return Err(
          QueryErrors.noProvider(
            CAPABILITY_LABELS.symbolSearch,
            options.language,
            this.registry.supportedLanguages("symbolSearch")
          )
        );
      }

      const seen = new Set<string>();
      const merged: SymbolMatch[] = [];
      for (const provider of providers) {
        for (const match of provider.searchSymbols(query, this.queryOptions(options))) {
          const key = `${match.file}:${match.line}:${match.name}`;
          if (seen.has(key)) continue;
          seen.add(key);
          merged.push(match);
        }
      }
      return Ok(rankMatches(merged, trimmed).slice(0, limit));
    });
  }

  /**
   * Every reference to a declaration. A position on a reference targets the
   * declaration it refers to.
   */
  findUsages(ref: ElementRef, options: CallOptions = {}): QueryResult<UsagesResult> {
    return this.guard(() =>
      andThen(this.resolveDefinition(ref), (element) =>
        Ok(collectUsages(this.model, element, { limit: this.limits.maxUsages, signal: options.signal }))
      )
    );
  }

  goToDefinition(ref: ElementRef): QueryResult<DefinitionResult> {
    return this.guard(() =>
      andThen(this.resolveDefinition(ref), (element) => Ok(describeDefinition(this.model, element)))
    );
  }

  indexStatus(): IndexStatus {
    const languages = CAPABILITIES.flatMap((capability) => this.registry.supportedLanguages(capability));
    return { ready: this.model.isReady(), languages: [...new Set(languages)] };
  }

  supportedLanguages(): Record<Capability, LanguageTag[]> {
    return this.registry.supportedLanguagesByCapability();
  }

  private resolve(ref: ElementRef): QueryResult<ElementHandle> {
    if ("qualifiedName" in ref) {
      const element = this.model.resolveByQualifiedName(ref.qualifiedName);
      return element ? Ok(element) : Err(QueryErrors.noElementNamed(ref.qualifiedName));
    }
    const element = this.model.resolveAt(ref.file, ref.line, ref.column);
    return element ? Ok(element) : Err(QueryErrors.noElementAtPosition(ref.file, ref.line, ref.column));
  }

  private resolveDefinition(ref: ElementRef): QueryResult<ElementHandle> {
    if ("qualifiedName" in ref) return this.resolve(ref);
    const element = this.model.definitionAt(ref.file, ref.line, ref.column);
    return element ? Ok(element) : Err(QueryErrors.noElementAtPosition(ref.file, ref.line, ref.column));
  }

  private dispatch<C extends Capability>(
    capability: C,
    ref: ElementRef
  ): QueryResult<{ element: ElementHandle; provider: CapabilityMap[C] }> {
    return andThen(this.resolve(ref), (element) => {
      const language = this.model.languageOf(element);
      const provider = this.registry.select(capability, element, language);
      if (!provider) {
        return Err(
          QueryErrors.noProvider(CAPABILITY_LABELS[capability], language, this.registry.supportedLanguages(capability))
        );
      }
      return Ok({ element, provider });
    });
  }

  private queryOptions(options: CallOptions): QueryOptions {
    return { signal: options.signal, limits: this.limits };
  }

  /**
   * Runs a query, turning "still indexing" and cancellation into errors.
   */
  private guard<T>(run: () => QueryResult<T>): QueryResult<T> {
    if (!this.model.isReady()) {
      return Err(QueryErrors.indexNotReady());
    }
    try {
      return run();
    } catch (error: unknown) {
      if (isCancellation(error)) return Err(QueryErrors.cancelled(error.message));
      if (error instanceof IndexNotReadyError) return Err(QueryErrors.indexNotReady(error.message));
      throw error;
    }
  }
}
