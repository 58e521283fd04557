import type { DeclarationKind } from "../../../core/ports/CodeModel.js";
import type { LanguageTraits } from "../../../core/ports/LanguageTraits.js";
import type { SymbolKind, TypeKind } from "../../../core/model.js";
import { nameSpaceType, qualifiedCallableName, renderSignature } from "../rendering.js";

function typeKind(kind: DeclarationKind): TypeKind {
  return kind === "interface" ? "INTERFACE" : "STRUCT";
}

function symbolKind(kind: DeclarationKind, hasContainer: boolean): SymbolKind {
  switch (kind) {
    case "method":
      return "METHOD";
    case "function":
    case "constructor":
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
 * Go: no inheritance. A struct's supertypes are its embedded types and the
 * interfaces the model reports it satisfies; there is no universal root.
 */
export const goTraits: LanguageTraits = {
  family: "go",
  languages: ["go"],
  rootTypes: new Set(),
  maxTypeDepth: 50,
  superMethodStrategy: "supertype-walk",
  matchSignatures: true,
  searchCategories: ["type", "callable", "field"],
  typeKind,
  symbolKind,
  callableName: (model, callable) => qualifiedCallableName(model, callable, true),
  methodSignature: (model, method) =>
    renderSignature(model, method, { parameter: nameSpaceType, returnSeparator: " ", includeReturnType: true }),
};
