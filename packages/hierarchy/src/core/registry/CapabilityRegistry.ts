import { createLogger, type Log } from "@codenav/core";
import type { ElementHandle } from "../ports/CodeModel.js";
import type { LanguageTag } from "../model.js";
import {
  CAPABILITIES,
  type Capability,
  type CapabilityMap,
  type CapabilityProvider,
  type LanguageFamily,
  type ProviderSet,
} from "../ports/providers.js";

interface Registration<P extends CapabilityProvider> {
  provider: P;
  /** Availability probed once at registration */
  available: boolean;
}

type RegistrationTable = { [C in Capability]: Registration<CapabilityMap[C]>[] };

/**
 * Wraps each provider so it answers for another language tag.
 */
export type ProviderDelegator = (providers: ProviderSet, language: LanguageTag) => ProviderSet;

export interface CapabilityRegistryOptions {
  log?: Log;
}

/**
 * Providers keyed by capability and language tag.
 *
 * Built once at startup and then only read. When two providers claim the
 * same tag, the one registered first wins.
 */
export class CapabilityRegistry {
  private readonly table: RegistrationTable = {
    typeHierarchy: [],
    callHierarchy: [],
    superMethods: [],
    symbolSearch: [],
    implementations: [],
  };
  private readonly log: Log;

  constructor(options: CapabilityRegistryOptions = {}) {
    this.log = options.log ?? createLogger("hierarchy");
  }

  register<C extends Capability>(capability: C, provider: CapabilityMap[C]): void {
    this.table[capability].push({ provider, available: this.probe(provider) });
  }

  /**
   * Register every provider of a family under its primary tag, and delegates
   * under the remaining tags. Families whose probe fails or throws are
   * skipped without affecting the others.
   *
   * @returns whether the family was registered
   */
  registerFamily(family: LanguageFamily, delegate: ProviderDelegator): boolean {
    try {
      if (!family.probe()) {
        this.log(`Skipping ${family.id} providers: language support not present`);
        return false;
      }
      const providers = family.createProviders();
      const [, ...aliases] = family.languages;
      this.registerAll(providers);
      for (const alias of aliases) {
        this.registerAll(delegate(providers, alias));
      }
      this.log(`Registered ${family.id} providers for ${family.languages.join(", ")}`);
      return true;
    } catch (error: unknown) {
      this.log(`Failed to register ${family.id} providers:`, error);
      return false;
    }
  }

  /**
   * First available provider that can handle the element. Providers
   * registered under `language` are tried before the rest.
   */
  select<C extends Capability>(
    capability: C,
    element: ElementHandle,
    language?: LanguageTag
  ): CapabilityMap[C] | null {
    const entries = this.table[capability];
    const usable = (entry: Registration<CapabilityMap[C]>): boolean =>
      entry.available && entry.provider.canHandle(element);

    if (language !== undefined) {
      const exact = entries.find((entry) => entry.provider.language === language && usable(entry));
      if (exact) return exact.provider;
    }
    return entries.find(usable)?.provider ?? null;
  }

  availableProviders<C extends Capability>(capability: C): CapabilityMap[C][] {
    return this.table[capability].filter((entry) => entry.available).map((entry) => entry.provider);
  }

  supportedLanguages(capability: Capability): LanguageTag[] {
    const languages = this.availableProviders(capability).map((provider) => provider.language);
    return [...new Set(languages)];
  }

  supportedLanguagesByCapability(): Record<Capability, LanguageTag[]> {
    return {
      typeHierarchy: this.supportedLanguages("typeHierarchy"),
      callHierarchy: this.supportedLanguages("callHierarchy"),
      superMethods: this.supportedLanguages("superMethods"),
      symbolSearch: this.supportedLanguages("symbolSearch"),
      implementations: this.supportedLanguages("implementations"),
    };
  }

  get size(): number {
    return CAPABILITIES.reduce((total, capability) => total + this.table[capability].length, 0);
  }

  private registerAll(providers: ProviderSet): void {
    if (providers.typeHierarchy) this.register("typeHierarchy", providers.typeHierarchy);
    if (providers.callHierarchy) this.register("callHierarchy", providers.callHierarchy);
    if (providers.superMethods) this.register("superMethods", providers.superMethods);
    if (providers.symbolSearch) this.register("symbolSearch", providers.symbolSearch);
    if (providers.implementations) this.register("implementations", providers.implementations);
  }

  private probe(provider: CapabilityProvider): boolean {
    try {
      return provider.isAvailable();
    } catch (error: unknown) {
      this.log(`Availability probe failed for ${provider.language} provider:`, error);
      return false;
    }
  }
}
