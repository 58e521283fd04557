import type { DeclarationKind } from "../../../core/ports/CodeModel.js";
import type { LanguageTraits } from "../../../core/ports/LanguageTraits.js";
import type { SymbolKind, TypeKind } from "../../../core/model.js";
import { qualifiedCallableName, renderSignature, typeFirst } from "../rendering.js";

function typeKind(kind: DeclarationKind): TypeKind {
  switch (kind) {
    case "interface":
    case "trait":
      return "INTERFACE";
    case "enum":
      return "ENUM";
    case "annotation":
      return "ANNOTATION";
    case "record":
      return "RECORD";
    case "abstract_class":
      return "ABSTRACT_CLASS";
    case "object":
      return "OBJECT";
    default:
      return "CLASS";
  }
}

function symbolKind(kind: DeclarationKind, hasContainer: boolean): SymbolKind {
  switch (kind) {
    case "method":
      return "METHOD";
    case "constructor":
      return "CONSTRUCTOR";
    case "function":
      return hasContainer ? "METHOD" : "FUNCTION";
    case "field":
    case "property":
      return "FIELD";
    case "constant":
      return "CONSTANT";
    case "variable":
      return "VARIABLE";
    default:
      return typeKind(kind);
  }
}

/**
 * Java, with Kotlin served through a delegate: both share one declaration
 * and override model. Overrides come straight from the model and must match
 * on signature.
 */
export const jvmTraits: LanguageTraits = {
  family: "jvm",
  languages: ["java", "kotlin"],
  rootTypes: new Set(["java.lang.Object", "kotlin.Any"]),
  maxTypeDepth: 100,
  superMethodStrategy: "declared-overrides",
  matchSignatures: true,
  searchCategories: ["type", "callable", "field"],
  typeKind,
  symbolKind,
  callableName: (model, callable) => qualifiedCallableName(model, callable, true),
  methodSignature: (model, method) =>
    renderSignature(model, method, { parameter: typeFirst, returnSeparator: ": ", includeReturnType: true }),
};
