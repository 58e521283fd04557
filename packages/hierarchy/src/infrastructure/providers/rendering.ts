import type { CodeModel, ElementHandle, Parameter } from "../../core/ports/CodeModel.js";
import { parameterTypes } from "../../core/algorithms/context.js";

type ParameterStyle = (parameter: Parameter) => string;

/** `Type name`, as in Java */
export const typeFirst: ParameterStyle = (p) => (p.type ? `${p.type} ${p.name}` : p.name);

/** `name: Type`, as in TypeScript and Kotlin */
export const nameColonType: ParameterStyle = (p) => (p.type ? `${p.name}: ${p.type}` : p.name);

/** `name Type`, as in Go */
export const nameSpaceType: ParameterStyle = (p) => (p.type ? `${p.name} ${p.type}` : p.name);

/** Bare parameter names */
export const nameOnly: ParameterStyle = (p) => p.name;

export interface SignatureFormat {
  parameter: ParameterStyle;
  /** Text between `)` and the return type, e.g. ": " or " " */
  returnSeparator: string;
  includeReturnType: boolean;
}

export function renderSignature(model: CodeModel, method: ElementHandle, format: SignatureFormat): string {
  const signature = model.signatureOf(method);
  const params = (signature?.parameters ?? []).map(format.parameter).join(", ");
  const returnType = format.includeReturnType && signature?.returnType;
  return `${model.nameOf(method)}(${params})${returnType ? `${format.returnSeparator}${returnType}` : ""}`;
}

/**
 * `Container.method(paramTypes)`; free functions render without a container.
 */
export function qualifiedCallableName(model: CodeModel, callable: ElementHandle, withParams: boolean): string {
  const owner = model.containingType(callable);
  const base = owner ? `${model.nameOf(owner)}.${model.nameOf(callable)}` : model.nameOf(callable);
  if (!withParams) return base;
  return `${base}(${parameterTypes(model.signatureOf(callable)).join(", ")})`;
}
