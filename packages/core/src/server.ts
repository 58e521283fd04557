/**
 * Stdio MCP server bootstrap shared by every server in the workspace.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Log } from "./logger.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Build the services the tools run against */
  createServices: () => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  /** Runs after tool registration, before the transport connects */
  onStartup?: (services: S) => Promise<void> | void;

  onShutdown?: (services: S) => Promise<void> | void;

  /** Where lifecycle messages go; defaults to console.error */
  log?: Log;
}

/**
 * Create the server, register tools, install SIGTERM/SIGINT handlers and
 * connect over stdio.
 *
 * @example
 * ```typescript
 * await bootstrapServer({
 *   config: { name: "codenav:hierarchy", version: "0.1.0" },
 *   createServices: () => ({ facade }),
 *   registerTools: registerAllTools,
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<McpServer> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;
  const log = options.log ?? ((message: string, ...details: unknown[]) => console.error(message, ...details));

  const services = await createServices();

  const server = new McpServer({ name: config.name, version: config.version });
  registerTools(server, services);

  const shutdown = async (signal: string): Promise<void> => {
    log(`Received ${signal}, shutting down ${config.name}`);
    try {
      await onShutdown?.(services);
      await server.close();
    } catch (error: unknown) {
      log("Error during shutdown:", error);
      process.exit(1);
    }
    process.exit(0);
  };

  process.once("SIGTERM", () => void shutdown("SIGTERM"));
  process.once("SIGINT", () => void shutdown("SIGINT"));

  await onStartup?.(services);
  await server.connect(new StdioServerTransport());
  return server;
}

/**
 * Preferred entry point: {@link bootstrapServer} with a fatal-error exit.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
