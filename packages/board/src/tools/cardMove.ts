/**
 * card_move tool - Move card to a different column.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@clicky/core";
import type { ToolRegistrar } from "./types.js";
import { cardSummary } from "./format.js";

interface MoveInput {
  id: string;
  column: string;
}

export const registerCardMove: ToolRegistrar = (server, { cards, basePath }) => {
  server.registerTool(
    "card_move",
    {
      title: "Move card",
      description: "Move card to the bottom of another column. Returns the updated card.",
      inputSchema: {
        id: z.string().describe("Card ID"),
        column: z.string().describe("Target column ID"),
      },
    },
    async (input: MoveInput) => {
      const result = cards.moveTo(basePath, input.id, input.column);

      return resultToResponse(result, (board) => {
        const card = board.getCard(input.id);
        return jsonResponse({ moved: true, card: card ? cardSummary(board, card) : undefined });
      });
    }
  );
};
