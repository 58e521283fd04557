/**
 * Wiring: code model, capability registry and query facade from a config.
 */

import path from "node:path";
import { createLogger, type Log, type Result, Ok, Err } from "@codenav/core";
import type { CodeModel } from "./core/ports/CodeModel.js";
import { CapabilityRegistry } from "./core/registry/CapabilityRegistry.js";
import { QueryFacade } from "./core/services/QueryFacade.js";
import { loadSnapshot } from "./infrastructure/memory/snapshot.js";
import { registerLanguageFamilies } from "./infrastructure/providers/LanguageFamilies.js";
import { TypeScriptCodeModel } from "./infrastructure/typescript/TypeScriptCodeModel.js";
import type { HierarchyConfig } from "./config.js";
import type { Services } from "./tools/index.js";

export function loadCodeModel(config: HierarchyConfig, log: Log): Result<CodeModel, Error> {
  if (config.snapshot) {
    const snapshotPath = path.resolve(config.root, config.snapshot);
    log(`Loading code model snapshot: ${snapshotPath}`);
    return loadSnapshot(snapshotPath);
  }

  log(`Building TypeScript code model for: ${config.root}`);
  const model = TypeScriptCodeModel.fromWorkspace(config.root, config.tsconfig ?? undefined);
  if (model.ok) log(`Indexed ${model.value.fileCount} source file(s)`);
  return model;
}

export function createServices(model: CodeModel, config: HierarchyConfig, log: Log = createLogger("hierarchy")): Services {
  const registry = new CapabilityRegistry({ log });
  const families = registerLanguageFamilies(registry, model);
  if (families.length === 0) {
    log("Warning: no language family matched the code model");
  }
  return { facade: new QueryFacade(model, registry, config.limits) };
}

/**
 * Model and services in one step, failing with the first error.
 */
export function buildServices(config: HierarchyConfig, log: Log = createLogger("hierarchy")): Result<Services, Error> {
  const model = loadCodeModel(config, log);
  if (!model.ok) return Err(model.error);
  return Ok(createServices(model.value, config, log));
}
