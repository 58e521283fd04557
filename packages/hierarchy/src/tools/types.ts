import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { QueryFacade } from "../core/services/QueryFacade.js";

export interface ToolRegistrar {
  (server: McpServer, facade: QueryFacade): void;
}

/** Markdown body plus structured payload of a successful query */
export interface Formatted<T extends Record<string, unknown>> {
  text: string;
  data: T;
}

export function formatLocation(file: string | null, line: number | null): string {
  if (file === null) return "(external)";
  return line === null ? file : `${file}:${line}`;
}
