/**
 * Caller and callee trees of a callable.
 *
 * One visited set spans the whole traversal, so a method reachable along two
 * paths is expanded once and listed once. Two bounds hold at the same time:
 * the requested depth, and `limits.maxCallStackDepth` as an absolute
 * recursion ceiling. Each node keeps at most `limits.maxCallsPerLevel` children.
 */

import type { CallSite, ElementHandle } from "../ports/CodeModel.js";
import type { CallDirection, CallHierarchyResult, CallNode } from "../model.js";
import { collectSuperMethods } from "./superMethods.js";
import { type TraversalContext, methodKey, step } from "./context.js";

export function resolveCallHierarchy(
  method: ElementHandle,
  direction: CallDirection,
  depth: number,
  ctx: TraversalContext
): CallHierarchyResult {
  step(ctx);
  const traversal = new CallTraversal(ctx);
  traversal.visited.add(methodKey(ctx.model, method));

  const calls =
    direction === "callers"
      ? traversal.callers(method, depth, 1)
      : traversal.callees(method, depth, 1);

  return { node: traversal.toNode(method), direction, depth, calls };
}

class CallTraversal {
  readonly visited = new Set<string>();

  constructor(private readonly ctx: TraversalContext) {}

  /**
   * Callers of `method`, searching references to the method and to every
   * method it overrides, since a call through a supertype may dispatch here.
   */
  callers(method: ElementHandle, remaining: number, stackDepth: number): CallNode[] {
    const { model, limits } = this.ctx;
    if (remaining <= 0 || stackDepth > limits.maxCallStackDepth) return [];

    const searchSet = [
      method,
      ...collectSuperMethods(method, this.ctx)
        .slice(0, limits.maxPolymorphicMethods)
        .map((hit) => hit.method),
    ];
    const searchKeys = new Set(searchSet.map((m) => methodKey(model, m)));
    const seen = new Set<string>();
    const level = new LevelBuffer(limits.maxCallsPerLevel);

    search: for (const target of searchSet) {
      for (const reference of model.referencesTo(target)) {
        step(this.ctx);
        if (level.full) break search;

        const caller = model.enclosingCallable(reference);
        if (!caller) continue;

        const key = methodKey(model, caller);
        if (seen.has(key)) continue;
        seen.add(key);
        if (searchKeys.has(key) || this.visited.has(key)) continue;

        this.visited.add(key);
        level.add(this.expand(caller, this.callers(caller, remaining - 1, stackDepth + 1)));
      }
    }
    return level.nodes;
  }

  /**
   * Callees of `method`, from the call expressions in its body. A call whose
   * target cannot be resolved becomes an `[unresolved]` leaf.
   */
  callees(method: ElementHandle, remaining: number, stackDepth: number): CallNode[] {
    const { model, limits } = this.ctx;
    if (remaining <= 0 || stackDepth > limits.maxCallStackDepth) return [];

    const level = new LevelBuffer(limits.maxCallsPerLevel);
    for (const site of model.callSitesWithin(method)) {
      step(this.ctx);
      if (level.full) break;

      if (!site.target) {
        level.add(this.unresolved(site, method));
        continue;
      }

      const key = methodKey(model, site.target);
      if (this.visited.has(key)) continue;
      this.visited.add(key);
      level.add(this.expand(site.target, this.callees(site.target, remaining - 1, stackDepth + 1)));
    }
    return level.nodes;
  }

  toNode(callable: ElementHandle): CallNode {
    const { model, traits } = this.ctx;
    const location = model.locationOf(callable);
    return {
      name: traits.callableName(model, callable),
      file: location?.path ?? "unknown",
      line: location?.line ?? 0,
      language: model.languageOf(callable),
    };
  }

  private expand(callable: ElementHandle, children: CallNode[]): CallNode {
    const node = this.toNode(callable);
    if (children.length > 0) node.children = children;
    return node;
  }

  private unresolved(site: CallSite, within: ElementHandle): CallNode {
    return {
      name: `${site.calleeName}(...) [unresolved]`,
      file: site.location?.path ?? "unknown",
      line: site.location?.line ?? 0,
      language: this.ctx.model.languageOf(within),
    };
  }
}

/**
 * Children of one node: capped, and unique under (name, file, line).
 */
class LevelBuffer {
  readonly nodes: CallNode[] = [];
  private readonly keys = new Set<string>();

  constructor(private readonly cap: number) {}

  get full(): boolean {
    return this.nodes.length >= this.cap;
  }

  add(node: CallNode): void {
    const key = `${node.name}|${node.file}|${node.line}`;
    if (this.full || this.keys.has(key)) return;
    this.keys.add(key);
    this.nodes.push(node);
  }
}
