/**
 * Supertype tree and flat subtype list of a type.
 */

import type { ElementHandle, SupertypeRef } from "../ports/CodeModel.js";
import type { TypeHierarchyResult, TypeNode } from "../model.js";
import {
  type TraversalContext,
  displayName,
  isRootType,
  step,
  take,
  toTypeNode,
  typeDepthCeiling,
} from "./context.js";

export function resolveTypeHierarchy(type: ElementHandle, ctx: TraversalContext): TypeHierarchyResult {
  step(ctx);
  const node = toTypeNode(ctx, type);
  return {
    node,
    supertypes: supertypeTree(type, ctx),
    subtypes: subtypeList(type, ctx),
  };
}

/**
 * Depth-first over declared supertypes, superclass before interfaces.
 *
 * A type already on the current path is skipped (cycles). A type expanded
 * elsewhere in the tree is listed again without children (diamonds).
 */
export function supertypeTree(type: ElementHandle, ctx: TraversalContext): TypeNode[] {
  const { model } = ctx;
  const ceiling = typeDepthCeiling(ctx);
  const rootKey = displayName(model, type);
  const path = new Set<string>([rootKey]);
  const expanded = new Set<string>([rootKey]);

  const walk = (current: ElementHandle, depth: number): TypeNode[] => {
    if (depth > ceiling) return [];

    const nodes: TypeNode[] = [];
    for (const ref of model.declaredSupertypes(current)) {
      step(ctx);
      if (isRootType(ctx, ref)) continue;

      if (!ref.target) {
        nodes.push(unresolvedNode(ref, model.languageOf(current)));
        continue;
      }

      const key = displayName(model, ref.target);
      if (path.has(key)) continue;

      const node = toTypeNode(ctx, ref.target);
      if (expanded.has(key)) {
        node.supertypes = [];
      } else {
        expanded.add(key);
        path.add(key);
        node.supertypes = walk(ref.target, depth + 1);
        path.delete(key);
      }
      nodes.push(node);
    }
    return nodes;
  };

  return walk(type, 1);
}

export function subtypeList(type: ElementHandle, ctx: TraversalContext): TypeNode[] {
  const nodes: TypeNode[] = [];
  for (const subtype of take(ctx.model.transitiveSubtypes(type), ctx.limits.maxSubtypes)) {
    step(ctx);
    nodes.push(toTypeNode(ctx, subtype));
  }
  return nodes;
}

function unresolvedNode(ref: SupertypeRef, language: string): TypeNode {
  return {
    name: ref.name,
    qualifiedName: ref.qualifiedName,
    file: null,
    line: null,
    kind: ref.relation === "interface" ? "INTERFACE" : "CLASS",
    language,
    supertypes: [],
  };
}
