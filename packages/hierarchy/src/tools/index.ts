import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { QueryFacade } from "../core/services/QueryFacade.js";

import { registerTypeHierarchy } from "./typeHierarchy.js";
import { registerCallHierarchy } from "./callHierarchy.js";
import { registerFindSuperMethods } from "./findSuperMethods.js";
import { registerFindImplementations } from "./findImplementations.js";
import { registerFindSymbol } from "./findSymbol.js";
import { registerListSupportedLanguages } from "./listSupportedLanguages.js";
import { registerFindUsages } from "./findUsages.js";
import { registerGoToDefinition } from "./goToDefinition.js";
import { registerGetIndexStatus } from "./getIndexStatus.js";

export interface Services {
  facade: QueryFacade;
}

export function registerAllTools(server: McpServer, services: Services): void {
  const { facade } = services;

  // Hierarchies
  registerTypeHierarchy(server, facade);
  registerCallHierarchy(server, facade);
  registerFindSuperMethods(server, facade);
  registerFindImplementations(server, facade);

  // Navigation
  registerFindUsages(server, facade);
  registerGoToDefinition(server, facade);

  // Search and introspection
  registerFindSymbol(server, facade);
  registerListSupportedLanguages(server, facade);
  registerGetIndexStatus(server, facade);
}

export { formatTypeHierarchy } from "./typeHierarchy.js";
export { formatCallHierarchy } from "./callHierarchy.js";
export { formatSuperMethods } from "./findSuperMethods.js";
export { formatImplementations } from "./findImplementations.js";
export { formatSymbolMatches } from "./findSymbol.js";
export { formatSupportedLanguages } from "./listSupportedLanguages.js";
export { formatUsages } from "./findUsages.js";
export { formatDefinition } from "./goToDefinition.js";
export { formatIndexStatus } from "./getIndexStatus.js";
export type { Formatted, ToolRegistrar } from "./types.js";
