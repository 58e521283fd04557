/**
 * Concrete implementations: overriding methods of a method, or inheritors
 * of a type. Methods win when the element sits inside one.
 */

import type { ElementHandle } from "../ports/CodeModel.js";
import type { ImplementationEntry, ImplementationsResult } from "../model.js";
import { type TraversalContext, asCallable, asType, displayName, step, take } from "./context.js";

export function resolveImplementations(
  element: ElementHandle,
  ctx: TraversalContext
): ImplementationsResult | null {
  const { model } = ctx;

  const method = asCallable(model, element);
  if (method) {
    const owner = model.containingType(method);
    if (owner) {
      return {
        element: `${displayName(model, owner)}.${model.nameOf(method)}`,
        implementations: collect(model.overridingMethods(method), ctx, true),
      };
    }
  }

  const type = asType(model, element);
  if (type) {
    return {
      element: displayName(model, type),
      implementations: collect(model.transitiveSubtypes(type), ctx, false),
    };
  }

  return null;
}

function collect(elements: Iterable<ElementHandle>, ctx: TraversalContext, methods: boolean): ImplementationEntry[] {
  const { model, traits } = ctx;
  const entries: ImplementationEntry[] = [];

  for (const element of take(elements, ctx.limits.maxImplementations)) {
    step(ctx);
    const location = model.locationOf(element);
    if (!location) continue;

    const owner = methods ? model.containingType(element) : null;
    entries.push({
      name: owner ? `${model.nameOf(owner)}.${model.nameOf(element)}` : displayName(model, element),
      file: location.path,
      line: location.line,
      kind: methods ? traits.symbolKind(model.kindOf(element), owner !== null) : traits.typeKind(model.kindOf(element)),
      language: model.languageOf(element),
    });
  }
  return entries;
}
