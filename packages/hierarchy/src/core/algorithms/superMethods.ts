/**
 * Ancestor chain of a method: every method it overrides, nearest first.
 */

import type { ElementHandle } from "../ports/CodeModel.js";
import type { MethodInfo, SuperMethodEntry, SuperMethodsResult, TypeKind } from "../model.js";
import {
  type TraversalContext,
  displayName,
  isRootType,
  sameParameterTypes,
  step,
  typeDepthCeiling,
} from "./context.js";

export interface SuperMethodHit {
  method: ElementHandle;
  /** Declaring type of `method`, when the model knows it */
  owner: ElementHandle | null;
  /** Hops from the starting method's declaring type */
  depth: number;
}

const INTERFACE_KINDS: ReadonlySet<TypeKind> = new Set(["INTERFACE", "TRAIT", "PROTOCOL"]);

export function resolveSuperMethods(method: ElementHandle, ctx: TraversalContext): SuperMethodsResult {
  const hierarchy = collectSuperMethods(method, ctx).map((hit) => toEntry(hit, ctx));
  return {
    method: methodInfo(method, ctx),
    hierarchy,
    totalCount: hierarchy.length,
  };
}

function methodInfo(method: ElementHandle, ctx: TraversalContext): MethodInfo {
  const { model, traits } = ctx;
  const owner = model.containingType(method);
  const location = model.locationOf(method);
  return {
    name: model.nameOf(method),
    signature: traits.methodSignature(model, method),
    containingClass: owner ? displayName(model, owner) : null,
    file: location?.path ?? null,
    line: location?.line ?? null,
    language: model.languageOf(method),
  };
}

/**
 * Methods overridden by `method`, in walk order, each ancestor/name pair at
 * most once. Strategy and signature matching come from the language traits.
 */
export function collectSuperMethods(method: ElementHandle, ctx: TraversalContext): SuperMethodHit[] {
  return ctx.traits.superMethodStrategy === "declared-overrides"
    ? followOverrides(method, ctx)
    : walkSupertypes(method, ctx);
}

function followOverrides(method: ElementHandle, ctx: TraversalContext): SuperMethodHit[] {
  const { model } = ctx;
  const ceiling = typeDepthCeiling(ctx);
  const visited = new Set<string>();
  const hits: SuperMethodHit[] = [];

  const visit = (current: ElementHandle, depth: number): void => {
    if (depth > ceiling) return;
    for (const overridden of model.overriddenMethods(current)) {
      step(ctx);
      const owner = model.containingType(overridden);
      const key = `${owner ? displayName(model, owner) : ""}.${model.nameOf(overridden)}`;
      if (visited.has(key)) continue;
      visited.add(key);
      hits.push({ method: overridden, owner, depth });
      visit(overridden, depth + 1);
    }
  };

  visit(method, 1);
  return hits;
}

function walkSupertypes(method: ElementHandle, ctx: TraversalContext): SuperMethodHit[] {
  const { model, traits } = ctx;
  const start = model.containingType(method);
  if (!start) return [];

  const ceiling = typeDepthCeiling(ctx);
  const name = model.nameOf(method);
  const signature = model.signatureOf(method);
  const visited = new Set<string>();
  const hits: SuperMethodHit[] = [];

  const walk = (type: ElementHandle, depth: number): void => {
    if (depth > ceiling) return;
    for (const ref of model.declaredSupertypes(type)) {
      step(ctx);
      if (!ref.target || isRootType(ctx, ref)) continue;

      const key = `${displayName(model, ref.target)}.${name}`;
      if (visited.has(key)) continue;
      visited.add(key);

      for (const candidate of model.declaredMethods(ref.target)) {
        if (model.nameOf(candidate) !== name) continue;
        if (traits.matchSignatures && !sameParameterTypes(signature, model.signatureOf(candidate))) continue;
        hits.push({ method: candidate, owner: ref.target, depth });
        break;
      }
      walk(ref.target, depth + 1);
    }
  };

  walk(start, 1);
  return hits;
}

function toEntry(hit: SuperMethodHit, ctx: TraversalContext): SuperMethodEntry {
  const { model, traits } = ctx;
  const location = model.locationOf(hit.method);
  const ownerKind: TypeKind = hit.owner ? traits.typeKind(model.kindOf(hit.owner)) : "CLASS";
  return {
    name: model.nameOf(hit.method),
    signature: traits.methodSignature(model, hit.method),
    containingClass: hit.owner ? displayName(model, hit.owner) : "unknown",
    containingClassKind: ownerKind,
    file: location?.path ?? null,
    line: location?.line ?? null,
    isInterface: INTERFACE_KINDS.has(ownerKind),
    depth: hit.depth,
    language: model.languageOf(hit.method),
  };
}
