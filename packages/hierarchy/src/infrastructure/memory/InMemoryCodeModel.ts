import {
  categoryOf,
  isCallableKind,
  isTypeKind,
  type CallSite,
  type CodeModel,
  type DeclarationKind,
  type ElementHandle,
  type NameCategory,
  type Parameter,
  type Signature,
  type SourceLocation,
  type SupertypeRef,
} from "../../core/ports/CodeModel.js";
import type { LanguageTag, SearchScope } from "../../core/model.js";
import { IndexNotReadyError } from "../../core/errors.js";

export interface SupertypeSpec {
  name: string;
  qualifiedName?: string;
  /** Defaults to "superclass" */
  relation?: "superclass" | "interface";
  /**
   * Id of the declaration this resolves to. When omitted, the qualified name
   * (or name) is looked up among the declared types; no match leaves the
   * reference unresolved.
   */
  target?: string;
}

export interface CallSpec {
  callee: string;
  /** Id of the called declaration; omitted for unresolved calls */
  target?: string;
  line?: number;
}

export interface DeclarationSpec {
  id: string;
  name: string;
  kind: DeclarationKind;
  language: LanguageTag;
  /** Defaults to `<parent qualified name>.<name>`, or `name` at top level */
  qualifiedName?: string;
  file?: string;
  line?: number;
  /** Last line of the declaration; defaults to `line` */
  endLine?: number;
  /** Id of the enclosing declaration */
  parent?: string;
  supertypes?: SupertypeSpec[];
  parameters?: Parameter[];
  returnType?: string;
  /** Ids of the methods this one directly overrides */
  overrides?: string[];
  calls?: CallSpec[];
  /** Library declaration, only visible to "all" scope searches */
  external?: boolean;
}

export interface InMemoryCodeModelOptions {
  /** Languages the host supports; defaults to every language declared */
  languages?: LanguageTag[];
  ready?: boolean;
}

interface Reference {
  id: string;
  target: string;
  /** Declaration whose body contains the call */
  within: string;
  line: number;
}

/**
 * A code model held entirely in memory, built from a declaration table.
 * Backs snapshot-based serving and stands in for a host index in tests.
 *
 * References are derived from resolved call sites: every call with a target
 * is one reference occurrence of that target.
 */
export class InMemoryCodeModel implements CodeModel {
  private readonly declarations = new Map<string, DeclarationSpec>();
  private readonly qualifiedNames = new Map<string, string>();
  private readonly handles = new Map<string, ElementHandle>();
  private readonly references = new Map<string, Reference>();
  private readonly referencesByTarget = new Map<string, string[]>();
  private readonly subtypesOf = new Map<string, string[]>();
  private readonly overridersOf = new Map<string, string[]>();
  private readonly languages: ReadonlySet<LanguageTag>;
  private ready: boolean;

  constructor(declarations: DeclarationSpec[], options: InMemoryCodeModelOptions = {}) {
    for (const declaration of declarations) {
      if (this.declarations.has(declaration.id)) {
        throw new Error(`Duplicate declaration id: ${declaration.id}`);
      }
      this.declarations.set(declaration.id, declaration);
    }
    for (const declaration of declarations) {
      this.assertNoParentCycle(declaration);
    }
    for (const declaration of declarations) {
      this.qualifiedNames.set(declaration.id, this.deriveQualifiedName(declaration));
    }
    this.indexRelations();
    this.languages = new Set(options.languages ?? declarations.map((d) => d.language));
    this.ready = options.ready ?? true;
  }

  setReady(ready: boolean): void {
    this.ready = ready;
  }

  isReady(): boolean {
    return this.ready;
  }

  supportsLanguage(language: LanguageTag): boolean {
    return this.languages.has(language);
  }

  resolveAt(file: string, line: number, _column: number): ElementHandle | null {
    this.ensureReady();
    let best: DeclarationSpec | null = null;
    for (const declaration of this.declarations.values()) {
      if (declaration.file !== file || declaration.line === undefined) continue;
      const end = declaration.endLine ?? declaration.line;
      if (line < declaration.line || line > end) continue;
      if (!best || span(declaration) <= span(best)) best = declaration;
    }
    return best ? this.handle(best.id) : null;
  }

  /** A call on the given line resolves to its target; otherwise the declaration there. */
  definitionAt(file: string, line: number, column: number): ElementHandle | null {
    this.ensureReady();
    for (const reference of this.references.values()) {
      if (reference.line === line && this.declarationById(reference.within).file === file) {
        return this.handle(reference.target);
      }
    }
    return this.resolveAt(file, line, column);
  }

  resolveByQualifiedName(name: string): ElementHandle | null {
    this.ensureReady();
    for (const [id, qualifiedName] of this.qualifiedNames) {
      if (qualifiedName === name) return this.handle(id);
    }
    return null;
  }

  declaredSupertypes(type: ElementHandle): SupertypeRef[] {
    const declaration = this.declaration(type);
    return (declaration.supertypes ?? []).map((spec) => {
      const target = this.resolveSupertype(spec);
      return {
        name: spec.name,
        qualifiedName: spec.qualifiedName ?? (target ? this.qualifiedNames.get(target) ?? null : null),
        relation: spec.relation ?? "superclass",
        target: target ? this.handle(target) : null,
      };
    });
  }

  *transitiveSubtypes(type: ElementHandle): Iterable<ElementHandle> {
    yield* this.closure(type.id, this.subtypesOf);
  }

  *declaredMethods(type: ElementHandle): Iterable<ElementHandle> {
    for (const declaration of this.declarations.values()) {
      if (declaration.parent === type.id && isCallableKind(declaration.kind)) {
        yield this.handle(declaration.id);
      }
    }
  }

  *overridingMethods(method: ElementHandle): Iterable<ElementHandle> {
    yield* this.closure(method.id, this.overridersOf);
  }

  overriddenMethods(method: ElementHandle): ElementHandle[] {
    const declaration = this.declaration(method);
    return (declaration.overrides ?? [])
      .filter((id) => this.declarations.has(id))
      .map((id) => this.handle(id));
  }

  *referencesTo(element: ElementHandle): Iterable<ElementHandle> {
    for (const id of this.referencesByTarget.get(element.id) ?? []) {
      yield this.handle(id);
    }
  }

  *callSitesWithin(callable: ElementHandle): Iterable<CallSite> {
    const declaration = this.declaration(callable);
    for (const call of declaration.calls ?? []) {
      const target = call.target !== undefined && this.declarations.has(call.target) ? call.target : null;
      const line = call.line ?? declaration.line;
      yield {
        calleeName: call.callee,
        target: target ? this.handle(target) : null,
        location: declaration.file !== undefined && line !== undefined ? { path: declaration.file, line } : null,
      };
    }
  }

  enclosingCallable(element: ElementHandle): ElementHandle | null {
    return this.findEnclosing(element, (d) => isCallableKind(d.kind));
  }

  containingType(element: ElementHandle): ElementHandle | null {
    return this.findEnclosing(element, (d) => isTypeKind(d.kind));
  }

  *allDeclaredNames(category: NameCategory, scope: SearchScope): Iterable<string> {
    this.ensureReady();
    const seen = new Set<string>();
    for (const declaration of this.inScope(category, scope)) {
      if (seen.has(declaration.name)) continue;
      seen.add(declaration.name);
      yield declaration.name;
    }
  }

  *declarationsNamed(name: string, category: NameCategory, scope: SearchScope): Iterable<ElementHandle> {
    for (const declaration of this.inScope(category, scope)) {
      if (declaration.name === name) yield this.handle(declaration.id);
    }
  }

  nameOf(element: ElementHandle): string {
    const reference = this.references.get(element.id);
    if (reference) return this.declarationById(reference.target).name;
    return this.declaration(element).name;
  }

  qualifiedNameOf(element: ElementHandle): string | null {
    if (this.references.has(element.id)) return null;
    this.declaration(element);
    return this.qualifiedNames.get(element.id) ?? null;
  }

  locationOf(element: ElementHandle): SourceLocation | null {
    const reference = this.references.get(element.id);
    if (reference) {
      const file = this.declarationById(reference.within).file;
      return file !== undefined ? { path: file, line: reference.line } : null;
    }
    const declaration = this.declaration(element);
    if (declaration.file === undefined || declaration.line === undefined) return null;
    return { path: declaration.file, line: declaration.line };
  }

  kindOf(element: ElementHandle): DeclarationKind {
    if (this.references.has(element.id)) return "reference";
    return this.declaration(element).kind;
  }

  languageOf(element: ElementHandle): LanguageTag {
    const reference = this.references.get(element.id);
    if (reference) return this.declarationById(reference.within).language;
    return this.declaration(element).language;
  }

  signatureOf(element: ElementHandle): Signature | null {
    if (this.references.has(element.id)) return null;
    const declaration = this.declaration(element);
    if (!isCallableKind(declaration.kind)) return null;
    return { parameters: declaration.parameters ?? [], returnType: declaration.returnType ?? null };
  }

  private indexRelations(): void {
    for (const declaration of this.declarations.values()) {
      for (const spec of declaration.supertypes ?? []) {
        const target = this.resolveSupertype(spec);
        if (target) append(this.subtypesOf, target, declaration.id);
      }
      for (const overridden of declaration.overrides ?? []) {
        append(this.overridersOf, overridden, declaration.id);
      }
      (declaration.calls ?? []).forEach((call, index) => {
        if (call.target === undefined || !this.declarations.has(call.target)) return;
        const id = `${declaration.id}#call${index}`;
        this.references.set(id, {
          id,
          target: call.target,
          within: declaration.id,
          line: call.line ?? declaration.line ?? 0,
        });
        append(this.referencesByTarget, call.target, id);
      });
    }
  }

  private resolveSupertype(spec: SupertypeSpec): string | null {
    if (spec.target !== undefined) {
      return this.declarations.has(spec.target) ? spec.target : null;
    }
    const wanted = spec.qualifiedName ?? spec.name;
    for (const [id, qualifiedName] of this.qualifiedNames) {
      if (qualifiedName === wanted && isTypeKind(this.declarationById(id).kind)) return id;
    }
    return null;
  }

  private *closure(start: string, edges: Map<string, string[]>): Generator<ElementHandle> {
    const seen = new Set<string>([start]);
    const queue = [...(edges.get(start) ?? [])];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      yield this.handle(next);
      queue.push(...(edges.get(next) ?? []));
    }
  }

  private findEnclosing(element: ElementHandle, accept: (d: DeclarationSpec) => boolean): ElementHandle | null {
    const reference = this.references.get(element.id);
    let current: DeclarationSpec | undefined = reference
      ? this.declarationById(reference.within)
      : this.parentOf(this.declaration(element));
    while (current) {
      if (accept(current)) return this.handle(current.id);
      current = this.parentOf(current);
    }
    return null;
  }

  private *inScope(category: NameCategory, scope: SearchScope): Generator<DeclarationSpec> {
    for (const declaration of this.declarations.values()) {
      if (categoryOf(declaration.kind) !== category) continue;
      if (scope === "project" && declaration.external) continue;
      yield declaration;
    }
  }

  private parentOf(declaration: DeclarationSpec): DeclarationSpec | undefined {
    return declaration.parent !== undefined ? this.declarations.get(declaration.parent) : undefined;
  }

  private assertNoParentCycle(declaration: DeclarationSpec): void {
    const seen = new Set<string>([declaration.id]);
    for (let parent = this.parentOf(declaration); parent; parent = this.parentOf(parent)) {
      if (seen.has(parent.id)) throw new Error(`Parent cycle at ${declaration.id}`);
      seen.add(parent.id);
    }
  }

  private deriveQualifiedName(declaration: DeclarationSpec): string {
    if (declaration.qualifiedName !== undefined) return declaration.qualifiedName;
    const parent = this.parentOf(declaration);
    return parent ? `${this.deriveQualifiedName(parent)}.${declaration.name}` : declaration.name;
  }

  private handle(id: string): ElementHandle {
    let handle = this.handles.get(id);
    if (!handle) {
      handle = { id };
      this.handles.set(id, handle);
    }
    return handle;
  }

  private declaration(element: ElementHandle): DeclarationSpec {
    this.ensureReady();
    return this.declarationById(element.id);
  }

  private declarationById(id: string): DeclarationSpec {
    const declaration = this.declarations.get(id);
    if (!declaration) throw new Error(`Unknown element: ${id}`);
    return declaration;
  }

  private ensureReady(): void {
    if (!this.ready) throw new IndexNotReadyError();
  }
}

function span(declaration: DeclarationSpec): number {
  return (declaration.endLine ?? declaration.line ?? 0) - (declaration.line ?? 0);
}

function append(map: Map<string, string[]>, key: string, value: string): void {
  const list = map.get(key);
  if (list) list.push(value);
  else map.set(key, [value]);
}
