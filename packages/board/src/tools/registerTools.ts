/**
 * Register all card MCP tools.
 * Designed for AI agents - structured output, minimal verbosity.
 */

import type { McpServer } from "@clicky/core";
import type { CardToolContext } from "./types.js";

import { registerCardList } from "./cardList.js";
import { registerCardAdd } from "./cardAdd.js";
import { registerCardGet } from "./cardGet.js";
import { registerCardUpdate } from "./cardUpdate.js";
import { registerCardMove } from "./cardMove.js";
import { registerCardDelete } from "./cardDelete.js";

export function registerCardTools(server: McpServer, context: CardToolContext): void {
  registerCardList(server, context);
  registerCardAdd(server, context);
  registerCardGet(server, context);
  registerCardUpdate(server, context);
  registerCardMove(server, context);
  registerCardDelete(server, context);
}
