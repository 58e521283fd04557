import type { CodeModel } from "../../core/ports/CodeModel.js";
import type { LanguageTraits } from "../../core/ports/LanguageTraits.js";
import type { LanguageFamily } from "../../core/ports/providers.js";
import type { CapabilityRegistry } from "../../core/registry/CapabilityRegistry.js";
import {
  CallHierarchyProviderImpl,
  ImplementationsProviderImpl,
  SuperMethodsProviderImpl,
  SymbolSearchProviderImpl,
  TypeHierarchyProviderImpl,
} from "./CapabilityProviders.js";
import { delegateProviders } from "./LanguageDelegates.js";
import { jvmTraits } from "./families/jvm.js";
import { ecmaScriptTraits } from "./families/ecmascript.js";
import { pythonTraits } from "./families/python.js";
import { goTraits } from "./families/go.js";

/** Every family this build knows, in registration order. */
export const LANGUAGE_TRAITS: readonly LanguageTraits[] = [jvmTraits, ecmaScriptTraits, pythonTraits, goTraits];

/**
 * A family over one code model. Providers are only constructed once the
 * probe has confirmed the model carries one of the family's languages.
 */
export function createLanguageFamily(model: CodeModel, traits: LanguageTraits): LanguageFamily {
  return {
    id: traits.family,
    languages: traits.languages,
    probe: () => traits.languages.some((tag) => model.supportsLanguage(tag)),
    createProviders: () => ({
      typeHierarchy: new TypeHierarchyProviderImpl(model, traits),
      callHierarchy: new CallHierarchyProviderImpl(model, traits),
      superMethods: new SuperMethodsProviderImpl(model, traits),
      symbolSearch: new SymbolSearchProviderImpl(model, traits),
      implementations: new ImplementationsProviderImpl(model, traits),
    }),
  };
}

/**
 * Register every family the model supports.
 *
 * @returns ids of the families that were registered
 */
export function registerLanguageFamilies(
  registry: CapabilityRegistry,
  model: CodeModel,
  traits: readonly LanguageTraits[] = LANGUAGE_TRAITS
): string[] {
  return traits
    .map((familyTraits) => createLanguageFamily(model, familyTraits))
    .filter((family) => registry.registerFamily(family, delegateProviders))
    .map((family) => family.id);
}
