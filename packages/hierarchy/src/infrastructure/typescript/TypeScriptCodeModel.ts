import ts from "typescript";
import path from "node:path";
import { globSync } from "glob";
import { Err, Ok, type Result } from "@codenav/core";
import {
  categoryOf,
  type CallSite,
  type CodeModel,
  type DeclarationKind,
  type ElementHandle,
  type NameCategory,
  type Signature,
  type SourceLocation,
  type SupertypeRef,
} from "../../core/ports/CodeModel.js";
import type { LanguageTag, SearchScope } from "../../core/model.js";
import {
  bodyOf,
  callableForSignature,
  declarationKind,
  isCallableNode,
  isDeclarationName,
  isTypeDeclaration,
  nameNodeOf,
  nameText,
  parametersOf,
  returnTypeOf,
  type TypeDeclarationNode,
} from "./declarations.js";

interface IndexedDeclaration {
  node: ts.Node;
  name: string;
  qualifiedName: string;
  category: NameCategory;
}

const JAVASCRIPT_EXTENSIONS = new Set([".js", ".jsx", ".mjs", ".cjs"]);

/** tsconfig locations searched under the workspace root */
const TSCONFIG_PATTERNS = ["tsconfig.json", "packages/*/tsconfig.json", "apps/*/tsconfig.json"];

/**
 * Code model over a TypeScript/JavaScript program, answered by the compiler's
 * type checker.
 *
 * Only files of the workspace count as project code; declarations in
 * `.d.ts` files and node_modules are external. External supertypes and call
 * targets therefore come back unresolved.
 */
export class TypeScriptCodeModel implements CodeModel {
  private readonly checker: ts.TypeChecker;
  private readonly projectFiles: readonly ts.SourceFile[];
  private readonly projectFileNames: ReadonlySet<string>;
  private readonly nodes = new Map<string, ts.Node>();
  private readonly handles = new Map<ts.Node, ElementHandle>();
  private readonly indexes = new Map<SearchScope, IndexedDeclaration[]>();
  private subtypeIndex: Map<ts.Node, ts.Node[]> | null = null;

  private constructor(
    private readonly rootDir: string,
    private readonly program: ts.Program
  ) {
    this.checker = program.getTypeChecker();
    this.projectFiles = program
      .getSourceFiles()
      .filter((file) => !file.isDeclarationFile && !file.fileName.includes("/node_modules/"));
    this.projectFileNames = new Set(this.projectFiles.map((file) => file.fileName));
  }

  /**
   * Build from explicit source files, e.g. a generated test project.
   */
  static fromFiles(rootDir: string, fileNames: string[], options: ts.CompilerOptions = {}): TypeScriptCodeModel {
    const compilerOptions: ts.CompilerOptions = {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.NodeNext,
      moduleResolution: ts.ModuleResolutionKind.NodeNext,
      allowJs: true,
      noEmit: true,
      ...options,
    };
    const root = path.resolve(rootDir);
    const files = fileNames.map((file) => path.resolve(root, file));
    const host = ts.createCompilerHost(compilerOptions, true);
    return new TypeScriptCodeModel(root, ts.createProgram(files, compilerOptions, host));
  }

  /**
   * Build from the workspace's tsconfig files: an explicit one, or every
   * match of the root and `packages/*` locations.
   */
  static fromWorkspace(rootDir: string, tsconfigPath?: string): Result<TypeScriptCodeModel, Error> {
    const root = path.resolve(rootDir);
    const configs = tsconfigPath
      ? [path.resolve(root, tsconfigPath)]
      : globSync(TSCONFIG_PATTERNS, { cwd: root, absolute: true }).sort();

    if (configs.length === 0) {
      return Err(new Error(`No tsconfig.json found in ${root}`));
    }

    const fileNames = new Set<string>();
    let options: ts.CompilerOptions | null = null;
    for (const configPath of configs) {
      const parsed = parseConfig(configPath);
      if (!parsed.ok) return parsed;
      options ??= parsed.value.options;
      for (const file of parsed.value.fileNames) fileNames.add(file);
    }

    return Ok(TypeScriptCodeModel.fromFiles(root, [...fileNames], { ...(options ?? {}), noEmit: true }));
  }

  get fileCount(): number {
    return this.projectFiles.length;
  }

  isReady(): boolean {
    return true;
  }

  supportsLanguage(language: LanguageTag): boolean {
    return language === "typescript" || language === "javascript";
  }

  resolveAt(file: string, line: number, column: number): ElementHandle | null {
    const located = this.locate(file, line, column);
    if (!located) return null;
    const declaration = innermostAt(located, (node): node is ts.Node => declarationKind(node) !== null);
    return declaration ? this.handle(declaration) : null;
  }

  definitionAt(file: string, line: number, column: number): ElementHandle | null {
    const located = this.locate(file, line, column);
    if (!located) return null;

    const identifier = innermostAt(located, ts.isIdentifier);
    const declaration = identifier
      ? this.symbolAt(identifier)?.declarations?.find((candidate) => declarationKind(candidate) !== null)
      : undefined;
    return declaration ? this.handle(declaration) : this.resolveAt(file, line, column);
  }

  resolveByQualifiedName(name: string): ElementHandle | null {
    const entry = this.index("project").find((candidate) => candidate.qualifiedName === name);
    return entry ? this.handle(entry.node) : null;
  }

  declaredSupertypes(type: ElementHandle): SupertypeRef[] {
    const node = this.node(type);
    if (!ts.isClassDeclaration(node) && !ts.isInterfaceDeclaration(node)) return [];

    const refs: SupertypeRef[] = [];
    for (const clause of node.heritageClauses ?? []) {
      const relation =
        ts.isClassDeclaration(node) && clause.token === ts.SyntaxKind.ExtendsKeyword ? "superclass" : "interface";
      for (const expression of clause.types) {
        const target = this.resolveTypeExpression(expression.expression);
        refs.push({
          name: expression.expression.getText(),
          qualifiedName: target ? qualifiedNameOf(target) : null,
          relation,
          target: target ? this.handle(target) : null,
        });
      }
    }
    return refs;
  }

  *transitiveSubtypes(type: ElementHandle): Iterable<ElementHandle> {
    for (const subtype of this.subtypeClosure(this.node(type))) {
      yield this.handle(subtype);
    }
  }

  *declaredMethods(type: ElementHandle): Iterable<ElementHandle> {
    const node = this.node(type);
    if (!ts.isClassDeclaration(node) && !ts.isInterfaceDeclaration(node)) return;
    for (const member of node.members) {
      if (ts.isMethodDeclaration(member) || ts.isMethodSignature(member)) yield this.handle(member);
    }
  }

  *overridingMethods(method: ElementHandle): Iterable<ElementHandle> {
    const node = this.node(method);
    const owner = enclosing(node, isTypeDeclaration);
    if (!owner) return;
    const name = nameText(node);
    for (const subtype of this.subtypeClosure(owner)) {
      const member = findMember(subtype, name);
      if (member) yield this.handle(member);
    }
  }

  overriddenMethods(method: ElementHandle): ElementHandle[] {
    const node = this.node(method);
    const owner = enclosing(node, isTypeDeclaration);
    if (!owner) return [];

    const name = nameText(node);
    const found: ts.Node[] = [];
    const seen = new Set<ts.Node>([owner]);
    const search = (type: ts.Node): void => {
      for (const supertype of this.supertypeNodes(type)) {
        if (seen.has(supertype)) continue;
        seen.add(supertype);
        const member = findMember(supertype, name);
        if (member) {
          if (!found.includes(member)) found.push(member);
        } else {
          search(supertype);
        }
      }
    };
    search(owner);
    return found.map((member) => this.handle(member));
  }

  *referencesTo(element: ElementHandle): Iterable<ElementHandle> {
    const nameNode = nameNodeOf(this.node(element));
    if (!nameNode || !ts.isIdentifier(nameNode)) return;
    const target = this.symbolAt(nameNode);
    if (!target) return;

    for (const sourceFile of this.projectFiles) {
      for (const identifier of identifiersNamed(sourceFile, nameNode.text)) {
        if (identifier === nameNode || isDeclarationName(identifier)) continue;
        if (this.symbolAt(identifier) === target) yield this.handle(identifier);
      }
    }
  }

  *callSitesWithin(callable: ElementHandle): Iterable<CallSite> {
    const node = this.node(callable);
    if (!isCallableNode(node)) return;
    const body = bodyOf(node);
    if (!body) return;

    const calls: ts.CallExpression[] = [];
    const visit = (current: ts.Node): void => {
      if (ts.isFunctionDeclaration(current) || ts.isClassDeclaration(current)) return;
      if (ts.isCallExpression(current)) calls.push(current);
      ts.forEachChild(current, visit);
    };
    ts.forEachChild(body, visit);

    for (const call of calls) {
      yield this.toCallSite(call);
    }
  }

  enclosingCallable(element: ElementHandle): ElementHandle | null {
    const callable = enclosing(this.node(element), isCallableNode);
    return callable ? this.handle(callable) : null;
  }

  containingType(element: ElementHandle): ElementHandle | null {
    const type = enclosing(this.node(element), isTypeDeclaration);
    return type ? this.handle(type) : null;
  }

  *allDeclaredNames(category: NameCategory, scope: SearchScope): Iterable<string> {
    const seen = new Set<string>();
    for (const entry of this.index(scope)) {
      if (entry.category !== category || seen.has(entry.name)) continue;
      seen.add(entry.name);
      yield entry.name;
    }
  }

  *declarationsNamed(name: string, category: NameCategory, scope: SearchScope): Iterable<ElementHandle> {
    for (const entry of this.index(scope)) {
      if (entry.category === category && entry.name === name) yield this.handle(entry.node);
    }
  }

  nameOf(element: ElementHandle): string {
    return nameText(this.node(element));
  }

  qualifiedNameOf(element: ElementHandle): string | null {
    const node = this.node(element);
    return declarationKind(node) ? qualifiedNameOf(node) : null;
  }

  locationOf(element: ElementHandle): SourceLocation | null {
    const node = this.node(element);
    const sourceFile = node.getSourceFile();
    const anchor = nameNodeOf(node) ?? node;
    const { line } = sourceFile.getLineAndCharacterOfPosition(anchor.getStart(sourceFile));
    return { path: this.relative(sourceFile.fileName), line: line + 1 };
  }

  kindOf(element: ElementHandle): DeclarationKind {
    const node = this.node(element);
    return declarationKind(node) ?? (ts.isIdentifier(node) ? "reference" : "other");
  }

  languageOf(element: ElementHandle): LanguageTag {
    const extension = path.extname(this.node(element).getSourceFile().fileName);
    return JAVASCRIPT_EXTENSIONS.has(extension) ? "javascript" : "typescript";
  }

  signatureOf(element: ElementHandle): Signature | null {
    const node = this.node(element);
    if (!isCallableNode(node)) return null;
    const sourceFile = node.getSourceFile();
    return {
      parameters: parametersOf(node).map((parameter) => ({
        name: parameter.name.getText(sourceFile),
        type: parameter.type ? parameter.type.getText(sourceFile) : null,
      })),
      returnType: returnTypeOf(node)?.getText(sourceFile) ?? null,
    };
  }

  /** Project source file and character offset of a 1-indexed position. */
  private locate(
    file: string,
    line: number,
    column: number
  ): { sourceFile: ts.SourceFile; position: number } | null {
    const absolute = path.resolve(this.rootDir, file);
    const sourceFile = this.projectFiles.find((candidate) => path.resolve(candidate.fileName) === absolute);
    if (!sourceFile) return null;

    const lineStarts = sourceFile.getLineStarts();
    if (line < 1 || line > lineStarts.length) return null;
    const lineEnd = line < lineStarts.length ? lineStarts[line] - 1 : sourceFile.text.length;
    return { sourceFile, position: Math.min(lineStarts[line - 1] + Math.max(column - 1, 0), lineEnd) };
  }

  private toCallSite(call: ts.CallExpression): CallSite {
    const sourceFile = call.getSourceFile();
    const callee = call.expression;
    const calleeName = ts.isPropertyAccessExpression(callee)
      ? callee.name.text
      : ts.isIdentifier(callee)
        ? callee.text
        : callee.getText(sourceFile);

    const declaration = this.checker.getResolvedSignature(call)?.declaration;
    const target = declaration ? callableForSignature(declaration) : null;
    const { line } = sourceFile.getLineAndCharacterOfPosition(call.getStart(sourceFile));

    return {
      calleeName,
      target: target && this.isProjectNode(target) ? this.handle(target) : null,
      location: { path: this.relative(sourceFile.fileName), line: line + 1 },
    };
  }

  private resolveTypeExpression(expression: ts.Expression): TypeDeclarationNode | null {
    const location = ts.isPropertyAccessExpression(expression) ? expression.name : expression;
    const declaration = this.symbolAt(location)?.declarations?.find(
      (candidate): candidate is ts.ClassDeclaration | ts.InterfaceDeclaration =>
        ts.isClassDeclaration(candidate) || ts.isInterfaceDeclaration(candidate)
    );
    return declaration && this.isProjectNode(declaration) ? declaration : null;
  }

  private supertypeNodes(type: ts.Node): ts.Node[] {
    if (!ts.isClassDeclaration(type) && !ts.isInterfaceDeclaration(type)) return [];
    const nodes: ts.Node[] = [];
    for (const clause of type.heritageClauses ?? []) {
      for (const expression of clause.types) {
        const target = this.resolveTypeExpression(expression.expression);
        if (target) nodes.push(target);
      }
    }
    return nodes;
  }

  private *subtypeClosure(type: ts.Node): Generator<ts.Node> {
    const index = this.subtypes();
    const seen = new Set<ts.Node>([type]);
    const queue = [...(index.get(type) ?? [])];
    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined || seen.has(next)) continue;
      seen.add(next);
      yield next;
      queue.push(...(index.get(next) ?? []));
    }
  }

  private subtypes(): Map<ts.Node, ts.Node[]> {
    if (this.subtypeIndex) return this.subtypeIndex;
    const index = new Map<ts.Node, ts.Node[]>();
    for (const entry of this.index("project")) {
      for (const supertype of this.supertypeNodes(entry.node)) {
        const list = index.get(supertype);
        if (list) list.push(entry.node);
        else index.set(supertype, [entry.node]);
      }
    }
    this.subtypeIndex = index;
    return index;
  }

  private index(scope: SearchScope): IndexedDeclaration[] {
    const cached = this.indexes.get(scope);
    if (cached) return cached;

    const files = scope === "project" ? this.projectFiles : this.program.getSourceFiles();
    const entries: IndexedDeclaration[] = [];
    const visit = (node: ts.Node): void => {
      const kind = declarationKind(node);
      const category = kind ? categoryOf(kind) : null;
      if (category) {
        entries.push({ node, name: nameText(node), qualifiedName: qualifiedNameOf(node), category });
      }
      ts.forEachChild(node, visit);
    };
    for (const file of files) ts.forEachChild(file, visit);

    this.indexes.set(scope, entries);
    return entries;
  }

  private symbolAt(node: ts.Node): ts.Symbol | undefined {
    const symbol = this.checker.getSymbolAtLocation(node);
    if (symbol && symbol.flags & ts.SymbolFlags.Alias) return this.checker.getAliasedSymbol(symbol);
    return symbol;
  }

  private isProjectNode(node: ts.Node): boolean {
    return this.projectFileNames.has(node.getSourceFile().fileName);
  }

  private relative(fileName: string): string {
    return path.relative(this.rootDir, fileName).split(path.sep).join("/");
  }

  private handle(node: ts.Node): ElementHandle {
    let handle = this.handles.get(node);
    if (!handle) {
      handle = { id: `${node.getSourceFile().fileName}:${node.pos}:${node.end}:${node.kind}` };
      this.handles.set(node, handle);
      this.nodes.set(handle.id, node);
    }
    return handle;
  }

  private node(element: ElementHandle): ts.Node {
    const node = this.nodes.get(element.id);
    if (!node) throw new Error(`Unknown element: ${element.id}`);
    return node;
  }
}

function parseConfig(configPath: string): Result<ts.ParsedCommandLine, Error> {
  const configFile = ts.readConfigFile(configPath, ts.sys.readFile);
  if (configFile.error) {
    return Err(new Error(ts.flattenDiagnosticMessageText(configFile.error.messageText, "\n")));
  }
  const parsed = ts.parseJsonConfigFileContent(configFile.config, ts.sys, path.dirname(configPath));
  const errors = parsed.errors.filter((error) => error.category === ts.DiagnosticCategory.Error);
  if (errors.length > 0) {
    return Err(new Error(errors.map((e) => ts.flattenDiagnosticMessageText(e.messageText, "\n")).join("\n")));
  }
  return Ok(parsed);
}

/** Nearest ancestor (the node itself excluded) matching the guard. */
function enclosing<T extends ts.Node>(node: ts.Node, guard: (candidate: ts.Node) => candidate is T): T | null {
  for (let current = node.parent; current; current = current.parent) {
    if (guard(current)) return current;
  }
  return null;
}

/** Deepest node matching the guard whose span holds the position. */
function innermostAt<T extends ts.Node>(
  { sourceFile, position }: { sourceFile: ts.SourceFile; position: number },
  guard: (node: ts.Node) => node is T
): T | null {
  let found: T | null = null;
  let current: ts.Node | undefined = sourceFile;
  while (current) {
    const container: ts.Node | undefined = current
      .getChildren(sourceFile)
      .find((child) => position >= child.getStart(sourceFile) && position < child.getEnd());
    if (container && guard(container)) found = container;
    current = container;
  }
  return found;
}

/** `Outer.Inner.member`, through enclosing types and namespaces. */
function qualifiedNameOf(node: ts.Node): string {
  const parts = [nameText(node)];
  for (let current = node.parent; current; current = current.parent) {
    if (isTypeDeclaration(current) || ts.isModuleDeclaration(current)) {
      parts.unshift(ts.isModuleDeclaration(current) ? current.name.getText() : nameText(current));
    }
  }
  return parts.join(".");
}

function findMember(type: ts.Node, name: string): ts.Node | undefined {
  if (!ts.isClassDeclaration(type) && !ts.isInterfaceDeclaration(type)) return undefined;
  const members: readonly ts.Node[] = type.members;
  return members.find(
    (member) => (ts.isMethodDeclaration(member) || ts.isMethodSignature(member)) && nameText(member) === name
  );
}

function identifiersNamed(sourceFile: ts.SourceFile, name: string): ts.Identifier[] {
  const found: ts.Identifier[] = [];
  const visit = (node: ts.Node): void => {
    if (ts.isIdentifier(node) && node.text === name) found.push(node);
    ts.forEachChild(node, visit);
  };
  ts.forEachChild(sourceFile, visit);
  return found;
}
