import { checkCancelled } from "@codenav/core";
import { isCallableKind, isTypeKind } from "../ports/CodeModel.js";
import type { CodeModel, ElementHandle, Signature, SupertypeRef } from "../ports/CodeModel.js";
import type { LanguageTraits } from "../ports/LanguageTraits.js";
import type { QueryLimits } from "../ports/providers.js";
import type { TypeNode } from "../model.js";

/**
 * Everything one traversal needs. Built per call, never shared.
 */
export interface TraversalContext {
  model: CodeModel;
  traits: LanguageTraits;
  limits: QueryLimits;
  signal?: AbortSignal;
}

export function step(ctx: TraversalContext): void {
  checkCancelled(ctx.signal);
}

/** Ceiling for type and override walks: the stricter of family and config. */
export function typeDepthCeiling(ctx: TraversalContext): number {
  return Math.min(ctx.traits.maxTypeDepth, ctx.limits.maxTypeDepth);
}

export function displayName(model: CodeModel, element: ElementHandle): string {
  return model.qualifiedNameOf(element) ?? model.nameOf(element);
}

/** The element itself if it is a type, else its enclosing type. */
export function asType(model: CodeModel, element: ElementHandle): ElementHandle | null {
  return isTypeKind(model.kindOf(element)) ? element : model.containingType(element);
}

/** The element itself if it is a callable, else its enclosing callable. */
export function asCallable(model: CodeModel, element: ElementHandle): ElementHandle | null {
  return isCallableKind(model.kindOf(element)) ? element : model.enclosingCallable(element);
}

export function parameterTypes(signature: Signature | null): string[] {
  return signature?.parameters.map((p) => p.type ?? p.name) ?? [];
}

/**
 * Identity of a callable across a traversal: declaring type (or file, for
 * free functions), name and parameter types. Overloads get distinct keys.
 */
export function methodKey(model: CodeModel, callable: ElementHandle): string {
  const owner = model.containingType(callable);
  const container = owner ? displayName(model, owner) : (model.locationOf(callable)?.path ?? "");
  const params = parameterTypes(model.signatureOf(callable)).join(",");
  return `${container}.${model.nameOf(callable)}(${params})`;
}

export function sameParameterTypes(a: Signature | null, b: Signature | null): boolean {
  const left = parameterTypes(a);
  const right = parameterTypes(b);
  return left.length === right.length && left.every((type, i) => type === right[i]);
}

export function isRootType(ctx: TraversalContext, ref: SupertypeRef): boolean {
  const { rootTypes } = ctx.traits;
  if (rootTypes.size === 0) return false;
  const qualified = ref.target ? ctx.model.qualifiedNameOf(ref.target) : ref.qualifiedName;
  return rootTypes.has(qualified ?? ref.name);
}

export function toTypeNode(ctx: TraversalContext, type: ElementHandle): TypeNode {
  const { model, traits } = ctx;
  const location = model.locationOf(type);
  return {
    name: model.nameOf(type),
    qualifiedName: model.qualifiedNameOf(type),
    file: location?.path ?? null,
    line: location?.line ?? null,
    kind: traits.typeKind(model.kindOf(type)),
    language: model.languageOf(type),
  };
}

export function* take<T>(items: Iterable<T>, limit: number): Generator<T> {
  if (limit <= 0) return;
  let count = 0;
  for (const item of items) {
    yield item;
    if (++count >= limit) return;
  }
}
