/**
 * card_delete tool - Remove card from board.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@clicky/core";
import type { ToolRegistrar } from "./types.js";

interface DeleteInput {
  id: string;
}

export const registerCardDelete: ToolRegistrar = (server, { cards, basePath }) => {
  server.registerTool(
    "card_delete",
    {
      title: "Delete card",
      description: "Remove card from board.",
      inputSchema: {
        id: z.string().describe("Card ID"),
      },
    },
    async (input: DeleteInput) => {
      const result = cards.delete(basePath, input.id);
      return resultToResponse(result, () => jsonResponse({ deleted: true, id: input.id }));
    }
  );
};
