/**
 * card_get tool - Get full card details.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@clicky/core";
import type { ToolRegistrar } from "./types.js";
import { cardSummary } from "./format.js";

interface GetInput {
  id: string;
}

export const registerCardGet: ToolRegistrar = (server, { cards, basePath }) => {
  server.registerTool(
    "card_get",
    {
      title: "Get card",
      description: "Get full card details by ID.",
      inputSchema: {
        id: z.string().describe("Card ID, e.g. PRJ-001"),
      },
    },
    async (input: GetInput) => {
      const result = cards.get(basePath, input.id);
      return resultToResponse(result, ({ card, board }) => jsonResponse(cardSummary(board, card)));
    }
  );
};
