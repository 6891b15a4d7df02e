/**
 * MCP Server bootstrap utilities.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

/**
 * Configuration for an MCP server.
 */
export interface ServerConfig {
  name: string;
  version: string;
}

/**
 * Options for bootstrapping an MCP server.
 */
export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Factory function to create services */
  createServices: () => S | Promise<S>;

  /** Function to register all tools with the server */
  registerTools: (server: McpServer, services: S) => void;

  /** Called after tools are registered, before the transport connects */
  onStartup?: (services: S) => Promise<void> | void;

  /** Called on SIGTERM/SIGINT before the server closes */
  onShutdown?: (services: S) => Promise<void> | void;
}

/**
 * Bootstrap an MCP server on stdio.
 *
 * stdout belongs to the protocol, so every diagnostic goes to stderr.
 *
 * @example
 * ```typescript
 * await bootstrapServer({
 *   config: { name: "clicky", version: "0.1.0" },
 *   createServices: () => ({ cards: new CardService(boards), basePath }),
 *   registerTools: (server, services) => registerCardTools(server, services),
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);

  const transport = new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    console.error(`[${config.name}] Shutting down...`);
    await onShutdown?.(services);
    await server.close();
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());

  await onStartup?.(services);

  await server.connect(transport);
  console.error(`[${config.name}] Ready on stdio`);
}

/**
 * Run bootstrapServer, exiting with status 1 on a startup failure.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error(`[${options.config.name}] Fatal error:`, error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
