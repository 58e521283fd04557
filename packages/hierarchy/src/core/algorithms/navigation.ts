/**
 * Usages of a declaration, and the declaration an occurrence refers to.
 * Both read the code model directly; no language traits are involved.
 */

import { checkCancelled } from "@codenav/core";
import type { CodeModel, ElementHandle } from "../ports/CodeModel.js";
import type { DefinitionResult, UsageEntry, UsagesResult } from "../model.js";
import { displayName, take } from "./context.js";

export interface UsageOptions {
  limit: number;
  signal?: AbortSignal;
}

export function collectUsages(model: CodeModel, element: ElementHandle, options: UsageOptions): UsagesResult {
  const usages: UsageEntry[] = [];
  for (const reference of take(model.referencesTo(element), options.limit)) {
    checkCancelled(options.signal);
    const location = model.locationOf(reference);
    if (!location) continue;
    const container = model.enclosingCallable(reference) ?? model.containingType(reference);
    usages.push({
      file: location.path,
      line: location.line,
      container: container ? displayName(model, container) : null,
      language: model.languageOf(reference),
    });
  }
  return { element: displayName(model, element), usages, totalCount: usages.length };
}

export function describeDefinition(model: CodeModel, declaration: ElementHandle): DefinitionResult {
  const location = model.locationOf(declaration);
  return {
    name: model.nameOf(declaration),
    qualifiedName: model.qualifiedNameOf(declaration),
    kind: model.kindOf(declaration),
    file: location?.path ?? null,
    line: location?.line ?? null,
    language: model.languageOf(declaration),
  };
}
