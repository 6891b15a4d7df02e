/**
 * card_list tool - List cards grouped by column.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@clicky/core";
import type { ToolRegistrar } from "./types.js";

interface ListInput {
  column?: string;
  assignee?: string;
}

export const registerCardList: ToolRegistrar = (server, { cards, basePath }) => {
  server.registerTool(
    "card_list",
    {
      title: "List cards",
      description: "List cards column by column, in display order. Optional column and assignee filters.",
      inputSchema: {
        column: z.string().optional().describe("Only this column ID"),
        assignee: z.string().optional().describe("Only cards assigned to this name"),
      },
    },
    async (input: ListInput) => {
      const result = cards.list(basePath, { columnId: input.column, assignee: input.assignee });

      return resultToResponse(result, (listing) =>
        jsonResponse({
          board: listing.board.name,
          columns: listing.columns.map(({ column, cards: columnCards }) => ({
            id: column.id,
            name: column.name,
            cards: columnCards.map((c) => ({
              id: c.id,
              title: c.title,
              assignee: c.assignee,
              description: c.description?.substring(0, 100),
            })),
          })),
          total: listing.total,
        })
      );
    }
  );
};
