/**
 * Mapping from TypeScript syntax nodes onto code-model declaration kinds.
 */

import ts from "typescript";
import type { DeclarationKind } from "../../core/ports/CodeModel.js";

/** A function-valued `const f = () => ...` or `const f = function () {}` */
export type FunctionVariable = ts.VariableDeclaration & {
  name: ts.Identifier;
  initializer: ts.ArrowFunction | ts.FunctionExpression;
};

export type CallableNode =
  | ts.MethodDeclaration
  | ts.MethodSignature
  | ts.FunctionDeclaration
  | ts.ConstructorDeclaration
  | FunctionVariable;

export type TypeDeclarationNode = ts.ClassDeclaration | ts.InterfaceDeclaration | ts.EnumDeclaration;

export function isFunctionVariable(node: ts.Node): node is FunctionVariable {
  return (
    ts.isVariableDeclaration(node) &&
    ts.isIdentifier(node.name) &&
    node.initializer !== undefined &&
    (ts.isArrowFunction(node.initializer) || ts.isFunctionExpression(node.initializer))
  );
}

export function isCallableNode(node: ts.Node): node is CallableNode {
  return (
    ts.isMethodDeclaration(node) ||
    ts.isMethodSignature(node) ||
    (ts.isFunctionDeclaration(node) && node.name !== undefined) ||
    ts.isConstructorDeclaration(node) ||
    isFunctionVariable(node)
  );
}

export function isTypeDeclaration(node: ts.Node): node is TypeDeclarationNode {
  return (
    (ts.isClassDeclaration(node) && node.name !== undefined) ||
    ts.isInterfaceDeclaration(node) ||
    ts.isEnumDeclaration(node)
  );
}

function isTopLevelVariable(node: ts.VariableDeclaration): boolean {
  const statement = node.parent.parent;
  return ts.isVariableStatement(statement) && (ts.isSourceFile(statement.parent) || ts.isModuleBlock(statement.parent));
}

/**
 * Kind of a node we index as a declaration, or null. Local variables are
 * not declarations here, function-valued ones excepted.
 */
export function declarationKind(node: ts.Node): DeclarationKind | null {
  if (ts.isClassDeclaration(node)) {
    if (!node.name) return null;
    return ts.getCombinedModifierFlags(node) & ts.ModifierFlags.Abstract ? "abstract_class" : "class";
  }
  if (ts.isInterfaceDeclaration(node)) return "interface";
  if (ts.isEnumDeclaration(node)) return "enum";
  if (ts.isMethodDeclaration(node) || ts.isMethodSignature(node)) return "method";
  if (ts.isConstructorDeclaration(node)) return "constructor";
  if (ts.isFunctionDeclaration(node)) return node.name ? "function" : null;
  if (ts.isPropertyDeclaration(node) || ts.isPropertySignature(node)) return "property";
  if (ts.isVariableDeclaration(node) && ts.isIdentifier(node.name)) {
    if (isFunctionVariable(node)) return "function";
    if (!isTopLevelVariable(node)) return null;
    return ts.getCombinedNodeFlags(node) & ts.NodeFlags.Const ? "constant" : "variable";
  }
  return null;
}

export function nameNodeOf(node: ts.Node): ts.Node | undefined {
  if (
    ts.isClassDeclaration(node) ||
    ts.isInterfaceDeclaration(node) ||
    ts.isEnumDeclaration(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isMethodSignature(node) ||
    ts.isFunctionDeclaration(node) ||
    ts.isPropertyDeclaration(node) ||
    ts.isPropertySignature(node) ||
    ts.isVariableDeclaration(node)
  ) {
    return node.name;
  }
  return undefined;
}

export function nameText(node: ts.Node): string {
  if (ts.isIdentifier(node) || ts.isPrivateIdentifier(node)) return node.text;
  if (ts.isConstructorDeclaration(node)) return "constructor";
  const name = nameNodeOf(node);
  if (!name) return "";
  return ts.isIdentifier(name) || ts.isPrivateIdentifier(name) ? name.text : name.getText();
}

/** The identifier naming a declaration, as opposed to one referring to it. */
export function isDeclarationName(identifier: ts.Identifier): boolean {
  const parent = identifier.parent;
  return (ts.isParameter(parent) && parent.name === identifier) || nameNodeOf(parent) === identifier;
}

export function parametersOf(node: CallableNode): ts.NodeArray<ts.ParameterDeclaration> {
  return isFunctionVariable(node) ? node.initializer.parameters : node.parameters;
}

export function returnTypeOf(node: CallableNode): ts.TypeNode | undefined {
  return isFunctionVariable(node) ? node.initializer.type : node.type;
}

export function bodyOf(node: CallableNode): ts.Node | undefined {
  if (isFunctionVariable(node)) return node.initializer.body;
  return ts.isMethodSignature(node) ? undefined : node.body;
}

/**
 * The declaration a resolved call signature belongs to, mapped onto the
 * callable node we index (function-valued variables for arrow functions).
 */
export function callableForSignature(declaration: ts.Node): CallableNode | null {
  if (isCallableNode(declaration)) return declaration;
  if ((ts.isArrowFunction(declaration) || ts.isFunctionExpression(declaration)) && isFunctionVariable(declaration.parent)) {
    return declaration.parent;
  }
  return null;
}
