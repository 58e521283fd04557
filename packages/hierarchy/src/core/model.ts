/**
 * Result data model for hierarchy and search queries.
 *
 * Every value here is created fresh per query and holds plain data only
 * (names, paths, lines), never handles into the code model.
 */

/** Language tag of an element, e.g. "java", "kotlin", "python". */
export type LanguageTag = string;

/** Kind of a type declaration as reported in hierarchy results. */
export type TypeKind =
  | "CLASS"
  | "INTERFACE"
  | "ABSTRACT_CLASS"
  | "ENUM"
  | "ANNOTATION"
  | "RECORD"
  | "STRUCT"
  | "TRAIT"
  | "PROTOCOL"
  | "OBJECT";

/** Kind of a symbol search match. */
export type SymbolKind =
  | TypeKind
  | "METHOD"
  | "FUNCTION"
  | "CONSTRUCTOR"
  | "FIELD"
  | "PROPERTY"
  | "VARIABLE"
  | "CONSTANT";

/**
 * A type in a hierarchy result.
 */
export interface TypeNode {
  /** Simple name */
  name: string;
  /** Fully-qualified name, when the language has one */
  qualifiedName: string | null;
  /** Workspace-relative path; null for unresolved or external types */
  file: string | null;
  /** 1-indexed line; null for unresolved or external types */
  line: number | null;
  kind: TypeKind;
  language: LanguageTag;
  /**
   * Nested supertypes. Present on nodes of the supertype tree (empty for
   * leaves), absent on the flat subtype list.
   */
  supertypes?: TypeNode[];
}

export interface TypeHierarchyResult {
  node: TypeNode;
  supertypes: TypeNode[];
  subtypes: TypeNode[];
}

export type CallDirection = "callers" | "callees";

/**
 * A method in a call hierarchy result.
 */
export interface CallNode {
  /** `Container.method(paramTypes)`, or a family-specific rendering */
  name: string;
  file: string;
  line: number;
  language: LanguageTag;
  children?: CallNode[];
}

export interface CallHierarchyResult {
  node: CallNode;
  direction: CallDirection;
  depth: number;
  calls: CallNode[];
}

/**
 * The method a super-method query started from.
 */
export interface MethodInfo {
  name: string;
  signature: string;
  /** Qualified (or simple) name of the declaring type, null for free functions */
  containingClass: string | null;
  file: string | null;
  line: number | null;
  language: LanguageTag;
}

export interface SuperMethodEntry {
  name: string;
  signature: string;
  containingClass: string;
  containingClassKind: TypeKind;
  file: string | null;
  line: number | null;
  isInterface: boolean;
  /** 1 for the nearest ancestor */
  depth: number;
  language: LanguageTag;
}

export interface SuperMethodsResult {
  method: MethodInfo;
  hierarchy: SuperMethodEntry[];
  totalCount: number;
}

export interface SymbolMatch {
  name: string;
  qualifiedName: string | null;
  kind: SymbolKind;
  file: string;
  line: number;
  containerName: string | null;
  language: LanguageTag;
}

export type SearchScope = "project" | "all";

export interface ImplementationEntry {
  name: string;
  file: string;
  line: number;
  kind: SymbolKind;
  language: LanguageTag;
}

export interface ImplementationsResult {
  element: string;
  implementations: ImplementationEntry[];
}

/** One occurrence referring to a declaration. */
export interface UsageEntry {
  file: string;
  line: number;
  /** Callable, or else type, whose body holds the occurrence; null at top level */
  container: string | null;
  language: LanguageTag;
}

export interface UsagesResult {
  element: string;
  usages: UsageEntry[];
  totalCount: number;
}

export interface DefinitionResult {
  name: string;
  qualifiedName: string | null;
  /** Declaration kind as the code model reports it, e.g. "method" */
  kind: string;
  file: string | null;
  line: number | null;
  language: LanguageTag;
}

export interface IndexStatus {
  ready: boolean;
  /** Tags with at least one available provider */
  languages: LanguageTag[];
}

/**
 * Where a query starts: a source position, or a fully-qualified name.
 */
export type ElementRef =
  | { file: string; line: number; column: number }
  | { qualifiedName: string };

export function describeRef(ref: ElementRef): string {
  return "qualifiedName" in ref ? ref.qualifiedName : `${ref.file}:${ref.line}:${ref.column}`;
}
