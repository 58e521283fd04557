import type { CodeModel, DeclarationKind, ElementHandle, NameCategory } from "./CodeModel.js";
import type { LanguageTag, SymbolKind, TypeKind } from "../model.js";

/**
 * How super methods are found for a language family.
 *
 * - `declared-overrides`: follow the model's direct override links, one hop per level.
 * - `supertype-walk`: climb declared supertypes and look for a method with the
 *   same name (and parameter types, if `matchSignatures`) in each ancestor.
 */
export type SuperMethodStrategy = "declared-overrides" | "supertype-walk";

/**
 * The per-language knobs the shared algorithms are parameterized over.
 * One instance per language family.
 */
export interface LanguageTraits {
  /** Family id used in logs */
  readonly family: string;

  /** Language tags the family covers, primary first */
  readonly languages: readonly LanguageTag[];

  /** Qualified (or simple) names of the implicit universal base types */
  readonly rootTypes: ReadonlySet<string>;

  /** Recursion ceiling for supertype and override walks */
  readonly maxTypeDepth: number;

  readonly superMethodStrategy: SuperMethodStrategy;

  /** Whether parameter types must match for a super method */
  readonly matchSignatures: boolean;

  /** Name categories symbol search walks, in order */
  readonly searchCategories: readonly NameCategory[];

  typeKind(kind: DeclarationKind): TypeKind;

  symbolKind(kind: DeclarationKind, hasContainer: boolean): SymbolKind;

  /** Display name of a callable in call hierarchy results */
  callableName(model: CodeModel, callable: ElementHandle): string;

  /** Rendered signature in super-method results */
  methodSignature(model: CodeModel, method: ElementHandle): string;
}
