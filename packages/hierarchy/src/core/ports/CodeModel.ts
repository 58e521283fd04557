import type { LanguageTag, SearchScope } from "../model.js";

/**
 * Opaque handle to one declaration or reference site inside a code model.
 * Two handles denote the same element iff their ids are equal.
 */
export interface ElementHandle {
  readonly id: string;
}

/**
 * Declaration kinds a code model can report. Languages map their own
 * constructs onto these.
 */
export type DeclarationKind =
  | "class"
  | "abstract_class"
  | "interface"
  | "enum"
  | "annotation"
  | "record"
  | "struct"
  | "trait"
  | "protocol"
  | "object"
  | "method"
  | "constructor"
  | "function"
  | "field"
  | "property"
  | "variable"
  | "constant"
  | "reference"
  | "other";

/** Buckets used by name enumeration, searched in this order. */
export type NameCategory = "type" | "callable" | "field";

const TYPE_KINDS: ReadonlySet<DeclarationKind> = new Set([
  "class",
  "abstract_class",
  "interface",
  "enum",
  "annotation",
  "record",
  "struct",
  "trait",
  "protocol",
  "object",
]);

const CALLABLE_KINDS: ReadonlySet<DeclarationKind> = new Set(["method", "constructor", "function"]);

const FIELD_KINDS: ReadonlySet<DeclarationKind> = new Set(["field", "property", "variable", "constant"]);

export function isTypeKind(kind: DeclarationKind): boolean {
  return TYPE_KINDS.has(kind);
}

export function isCallableKind(kind: DeclarationKind): boolean {
  return CALLABLE_KINDS.has(kind);
}

export function categoryOf(kind: DeclarationKind): NameCategory | null {
  if (TYPE_KINDS.has(kind)) return "type";
  if (CALLABLE_KINDS.has(kind)) return "callable";
  if (FIELD_KINDS.has(kind)) return "field";
  return null;
}

export interface SourceLocation {
  /** Workspace-relative path */
  path: string;
  /** 1-indexed */
  line: number;
}

/**
 * A supertype as declared on a type, resolved or not.
 */
export interface SupertypeRef {
  /** Name as written at the declaration site */
  name: string;
  qualifiedName: string | null;
  relation: "superclass" | "interface";
  /** Resolved declaration; null for external or broken references */
  target: ElementHandle | null;
}

/**
 * A call expression inside a callable body.
 */
export interface CallSite {
  /** Callee name as written */
  calleeName: string;
  /** Resolved callee declaration, null when unresolved */
  target: ElementHandle | null;
  location: SourceLocation | null;
}

export interface Parameter {
  name: string;
  /** Declared type text; null where the language has none */
  type: string | null;
}

export interface Signature {
  parameters: Parameter[];
  returnType: string | null;
}

/**
 * Read-only access to a pre-built semantic model of a codebase.
 *
 * Sequences returned as `Iterable` are lazy and finite, and every call
 * returns a fresh iteration. Implementations may throw
 * {@link IndexNotReadyError} from any method while the model is being built.
 */
export interface CodeModel {
  isReady(): boolean;

  /** Whether the model carries declarations for this language */
  supportsLanguage(language: LanguageTag): boolean;

  /** Innermost element at a 1-indexed position */
  resolveAt(file: string, line: number, column: number): ElementHandle | null;

  resolveByQualifiedName(name: string): ElementHandle | null;

  /**
   * Declaration that the occurrence at a 1-indexed position refers to. A
   * position on a declaration resolves to that declaration.
   */
  definitionAt(file: string, line: number, column: number): ElementHandle | null;

  /** Superclass first, then interfaces in declaration order */
  declaredSupertypes(type: ElementHandle): SupertypeRef[];

  transitiveSubtypes(type: ElementHandle): Iterable<ElementHandle>;

  /** Callables declared directly in a type, in source order */
  declaredMethods(type: ElementHandle): Iterable<ElementHandle>;

  /** Methods overriding this one, transitively */
  overridingMethods(method: ElementHandle): Iterable<ElementHandle>;

  /** Methods this one directly overrides */
  overriddenMethods(method: ElementHandle): ElementHandle[];

  /** Reference occurrences of a declaration */
  referencesTo(element: ElementHandle): Iterable<ElementHandle>;

  callSitesWithin(callable: ElementHandle): Iterable<CallSite>;

  /** Nearest callable declaration enclosing an element (the element itself excluded) */
  enclosingCallable(element: ElementHandle): ElementHandle | null;

  /** Nearest type declaration enclosing an element (the element itself excluded) */
  containingType(element: ElementHandle): ElementHandle | null;

  allDeclaredNames(category: NameCategory, scope: SearchScope): Iterable<string>;

  declarationsNamed(name: string, category: NameCategory, scope: SearchScope): Iterable<ElementHandle>;

  nameOf(element: ElementHandle): string;
  qualifiedNameOf(element: ElementHandle): string | null;
  locationOf(element: ElementHandle): SourceLocation | null;
  kindOf(element: ElementHandle): DeclarationKind;
  languageOf(element: ElementHandle): LanguageTag;
  signatureOf(element: ElementHandle): Signature | null;
}
