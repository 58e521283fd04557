import type { DeclarationKind } from "../../../core/ports/CodeModel.js";
import type { LanguageTraits } from "../../../core/ports/LanguageTraits.js";
import type { SymbolKind, TypeKind } from "../../../core/model.js";
import { nameOnly, qualifiedCallableName, renderSignature } from "../rendering.js";

function typeKind(kind: DeclarationKind): TypeKind {
  return kind === "protocol" ? "PROTOCOL" : "CLASS";
}

function symbolKind(kind: DeclarationKind, hasContainer: boolean): SymbolKind {
  switch (kind) {
    case "method":
    case "constructor":
    case "function":
      return hasContainer ? "METHOD" : "FUNCTION";
    case "field":
    case "property":
    case "variable":
      return hasContainer ? "FIELD" : "VARIABLE";
    case "constant":
      return "CONSTANT";
    default:
      return typeKind(kind);
  }
}

/**
 * Python: no signature-based overriding, so a method overrides any
 * same-named method of an ancestor class.
 */
export const pythonTraits: LanguageTraits = {
  family: "python",
  languages: ["python"],
  rootTypes: new Set(["object", "builtins.object"]),
  maxTypeDepth: 50,
  superMethodStrategy: "supertype-walk",
  matchSignatures: false,
  searchCategories: ["type", "callable", "field"],
  typeKind,
  symbolKind,
  callableName: (model, callable) => qualifiedCallableName(model, callable, false),
  methodSignature: (model, method) =>
    renderSignature(model, method, { parameter: nameOnly, returnSeparator: " -> ", includeReturnType: false }),
};
