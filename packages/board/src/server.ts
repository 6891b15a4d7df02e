/**
 * Card MCP server.
 * Exposes the board found from the working directory to coding agents.
 */

import { runServer } from "@clicky/core";
import { BoardService } from "./core/BoardService.js";
import { CardService } from "./core/CardService.js";
import { JsonBoardStore } from "./infrastructure/JsonBoardStore.js";
import { registerCardTools } from "./tools/registerTools.js";
import { resolveBasePath, type BoardStoreConfig } from "./config.js";

export interface CardServerOptions {
  /** Explicit board directory; otherwise resolved from cwd */
  path?: string;
  storeConfig?: BoardStoreConfig;
}

interface Services {
  cards: CardService;
  basePath: string;
}

export function startCardServer(options: CardServerOptions = {}): void {
  runServer<Services>({
    config: {
      name: "clicky",
      version: "0.1.0",
    },
    createServices: () => {
      const store = new JsonBoardStore(options.storeConfig);
      const basePath = resolveBasePath({ path: options.path, cwd: process.cwd(), env: process.env }, store);
      return { cards: new CardService(new BoardService(store)), basePath };
    },
    registerTools: (server, services) => {
      registerCardTools(server, services);
    },
    onStartup: (services) => {
      console.error(`[board] Serving board at ${services.basePath}`);
    },
  });
}
