import type { CodeModel, ElementHandle } from "../../core/ports/CodeModel.js";
import type { LanguageTraits } from "../../core/ports/LanguageTraits.js";
import type { CapabilityProvider, QueryOptions } from "../../core/ports/providers.js";
import type { TraversalContext } from "../../core/algorithms/context.js";
import type { LanguageTag } from "../../core/model.js";

/**
 * Base class for capability providers.
 * Binds a language family's traits to a code model and answers the shared
 * parts of the provider contract.
 */
export abstract class BaseProvider implements CapabilityProvider {
  readonly language: LanguageTag;
  private availability: boolean | undefined;

  constructor(
    protected readonly model: CodeModel,
    protected readonly traits: LanguageTraits
  ) {
    this.language = traits.languages[0];
  }

  /**
   * Elements in any of the family's languages. Delegates registered under a
   * secondary tag reuse this check unchanged.
   */
  canHandle(element: ElementHandle): boolean {
    return this.traits.languages.includes(this.model.languageOf(element));
  }

  /** Probed once: whether the model carries any of the family's languages. */
  isAvailable(): boolean {
    this.availability ??= this.traits.languages.some((tag) => this.model.supportsLanguage(tag));
    return this.availability;
  }

  protected context(options: QueryOptions): TraversalContext {
    return {
      model: this.model,
      traits: this.traits,
      limits: options.limits,
      signal: options.signal,
    };
  }
}
