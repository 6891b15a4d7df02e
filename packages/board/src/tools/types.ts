/**
 * Shared types for card tool registration.
 */

import type { McpServer } from "@clicky/core";
import type { CardService } from "../core/CardService.js";

/**
 * What every card tool needs: the service and the board it works on.
 */
export interface CardToolContext {
  cards: CardService;
  basePath: string;
}

/**
 * Function type for registering a tool with an MCP server.
 */
export interface ToolRegistrar {
  (server: McpServer, context: CardToolContext): void;
}
