/**
 * card_add tool - Create a new card.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@clicky/core";
import type { ToolRegistrar } from "./types.js";
import { cardSummary } from "./format.js";

interface AddInput {
  title: string;
  description?: string;
  assignee?: string;
  column?: string;
}

export const registerCardAdd: ToolRegistrar = (server, { cards, basePath }) => {
  server.registerTool(
    "card_add",
    {
      title: "Add card",
      description: "Create a new card at the bottom of a column. Returns the created card.",
      inputSchema: {
        title: z.string().describe("Card title"),
        description: z.string().optional().describe("Card description"),
        assignee: z.string().optional().describe("Who is working on it"),
        column: z.string().optional().describe("Target column ID (default: todo)"),
      },
    },
    async (input: AddInput) => {
      const result = cards.create(basePath, {
        title: input.title,
        description: input.description,
        assignee: input.assignee,
        columnId: input.column,
      });

      return resultToResponse(result, ({ cardId, board }) => {
        const card = board.getCard(cardId);
        return jsonResponse(card ? cardSummary(board, card) : { id: cardId });
      });
    }
  );
};
