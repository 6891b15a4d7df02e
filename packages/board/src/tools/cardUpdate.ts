/**
 * card_update tool - Update card fields.
 */

import { z } from "zod";
import { jsonResponse, resultToResponse } from "@clicky/core";
import { FieldUpdate } from "../core/CardService.js";
import type { ToolRegistrar } from "./types.js";
import { cardSummary } from "./format.js";

interface UpdateInput {
  id: string;
  title?: string;
  description?: string | null;
  assignee?: string | null;
}

/**
 * Absent leaves the field alone, null clears it, a string replaces it.
 */
function toFieldUpdate(value: string | null | undefined): FieldUpdate<string> {
  if (value === undefined) return FieldUpdate.leave();
  if (value === null) return FieldUpdate.clear();
  return FieldUpdate.set(value);
}

export const registerCardUpdate: ToolRegistrar = (server, { cards, basePath }) => {
  server.registerTool(
    "card_update",
    {
      title: "Update card",
      description: "Update card fields. Pass null for description or assignee to clear it. Returns the updated card.",
      inputSchema: {
        id: z.string().describe("Card ID"),
        title: z.string().optional().describe("New title"),
        description: z.string().nullable().optional().describe("New description, or null to clear"),
        assignee: z.string().nullable().optional().describe("New assignee, or null to clear"),
      },
    },
    async (input: UpdateInput) => {
      const result = cards.update(basePath, input.id, {
        title: input.title,
        description: toFieldUpdate(input.description),
        assignee: toFieldUpdate(input.assignee),
      });

      return resultToResponse(result, (board) => {
        const card = board.getCard(input.id);
        return jsonResponse(card ? cardSummary(board, card) : { id: input.id });
      });
    }
  );
};
