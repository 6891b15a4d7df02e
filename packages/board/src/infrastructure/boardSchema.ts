/**
 * zod schema for the persisted board document.
 */

import { z } from "zod";
import { Ok, Err, type Result } from "@clicky/core";
import { BOARD_SCHEMA_VERSION, type BoardRecord } from "../core/model.js";

const cardSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string().optional(),
  assignee: z.string().optional(),
  columnId: z.string().min(1),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

const columnSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  order: z.number().int().nonnegative(),
  cards: z.array(z.string()),
});

/**
 * Boards written before the version field existed load as version 1.
 */
export const boardSchema: z.ZodType<BoardRecord, z.ZodTypeDef, unknown> = z.object({
  version: z.number().int().positive().default(BOARD_SCHEMA_VERSION),
  id: z.string().min(1),
  name: z.string(),
  cardIdPrefix: z.string(),
  nextCardNumber: z.number().int().positive(),
  columns: z.array(columnSchema).min(1),
  cards: z.array(cardSchema),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

/**
 * Parse raw JSON into a board record, or describe what is wrong with it.
 */
export function parseBoardRecord(raw: unknown): Result<BoardRecord, string> {
  const parsed = boardSchema.safeParse(raw);
  if (parsed.success) {
    return Ok(parsed.data);
  }
  return Err(
    parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ")
  );
}
