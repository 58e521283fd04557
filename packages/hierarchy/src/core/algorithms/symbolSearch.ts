/**
 * Fuzzy symbol search: substring or ordered-subsequence matching, ranked by
 * exact match then edit distance.
 */

import type { ElementHandle, NameCategory } from "../ports/CodeModel.js";
import type { SymbolQuery } from "../ports/providers.js";
import type { SymbolMatch } from "../model.js";
import { type TraversalContext, step } from "./context.js";

/**
 * True when `candidate` contains `pattern` case-insensitively, or contains
 * its characters in order (`USvc` matches `UserService`).
 */
export function matchesPattern(candidate: string, pattern: string): boolean {
  const name = candidate.toLowerCase();
  const query = pattern.toLowerCase();
  if (name.includes(query)) return true;

  const wanted = [...query];
  let next = 0;
  for (const char of name) {
    if (char === wanted[next]) next++;
    if (next === wanted.length) return true;
  }
  return next === wanted.length;
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current.push(Math.min(previous[j] + 1, current[j - 1] + 1, substitution));
    }
    previous = current;
  }
  return previous[b.length];
}

/**
 * Exact (case-insensitive) name matches first, then ascending edit distance
 * between lower-cased pattern and name. Ties keep their input order.
 */
export function rankMatches(matches: SymbolMatch[], pattern: string): SymbolMatch[] {
  const query = pattern.toLowerCase();
  return matches
    .map((match) => {
      const name = match.name.toLowerCase();
      return { match, exact: name === query, distance: levenshtein(query, name) };
    })
    .sort((a, b) => {
      if (a.exact !== b.exact) return a.exact ? -1 : 1;
      return a.distance - b.distance;
    })
    .map((ranked) => ranked.match);
}

/**
 * Collect matches in the family's languages, or only in `query.language`
 * when set: type names first, then callables, then fields, stopping as soon
 * as `query.limit` is reached.
 */
export function searchSymbols(query: SymbolQuery, ctx: TraversalContext): SymbolMatch[] {
  const { model, traits } = ctx;
  const matches: SymbolMatch[] = [];
  const pattern = query.pattern.trim();
  if (pattern.length === 0 || query.limit <= 0) return matches;

  const languages = new Set(
    query.language === undefined ? traits.languages : traits.languages.filter((tag) => tag === query.language)
  );
  if (languages.size === 0) return matches;

  for (const category of traits.searchCategories) {
    if (matches.length >= query.limit) break;
    const names = new Set<string>();

    for (const name of model.allDeclaredNames(category, query.scope)) {
      if (matches.length >= query.limit) break;
      step(ctx);
      if (names.has(name) || !matchesPattern(name, pattern)) continue;
      names.add(name);

      for (const declaration of model.declarationsNamed(name, category, query.scope)) {
        if (matches.length >= query.limit) break;
        if (!languages.has(model.languageOf(declaration))) continue;
        const match = toMatch(declaration, category, ctx);
        if (match) matches.push(match);
      }
    }
  }

  return rankMatches(matches, pattern);
}

function toMatch(declaration: ElementHandle, category: NameCategory, ctx: TraversalContext): SymbolMatch | null {
  const { model, traits } = ctx;
  const location = model.locationOf(declaration);
  if (!location) return null;

  const container = category === "type" ? null : model.containingType(declaration);
  return {
    name: model.nameOf(declaration),
    qualifiedName: model.qualifiedNameOf(declaration),
    kind: traits.symbolKind(model.kindOf(declaration), container !== null),
    file: location.path,
    line: location.line,
    containerName: container ? model.nameOf(container) : null,
    language: model.languageOf(declaration),
  };
}
