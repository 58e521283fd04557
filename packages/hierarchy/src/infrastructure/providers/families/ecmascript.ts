import type { DeclarationKind } from "../../../core/ports/CodeModel.js";
import type { LanguageTraits } from "../../../core/ports/LanguageTraits.js";
import type { SymbolKind, TypeKind } from "../../../core/model.js";
import { nameColonType, qualifiedCallableName, renderSignature } from "../rendering.js";

function typeKind(kind: DeclarationKind): TypeKind {
  switch (kind) {
    case "interface":
      return "INTERFACE";
    case "abstract_class":
      return "ABSTRACT_CLASS";
    case "enum":
      return "ENUM";
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
      return "PROPERTY";
    case "constant":
      return "CONSTANT";
    case "variable":
      return "VARIABLE";
    default:
      return typeKind(kind);
  }
}

/**
 * JavaScript, with TypeScript served through a delegate. Methods override
 * by name alone, so super methods come from walking declared supertypes.
 */
export const ecmaScriptTraits: LanguageTraits = {
  family: "ecmascript",
  languages: ["javascript", "typescript"],
  rootTypes: new Set(["Object"]),
  maxTypeDepth: 50,
  superMethodStrategy: "supertype-walk",
  matchSignatures: false,
  searchCategories: ["type", "callable", "field"],
  typeKind,
  symbolKind,
  callableName: (model, callable) => qualifiedCallableName(model, callable, true),
  methodSignature: (model, method) =>
    renderSignature(model, method, { parameter: nameColonType, returnSeparator: ": ", includeReturnType: true }),
};
