/**
 * Interactive flows behind `--interactive`. Each one asks all of its
 * questions before it writes, and writes the board once, so leaving a
 * prompt halfway leaves the board as it was.
 */

import { basename } from "node:path";
import { Err, Ok } from "@clicky/core";
import {
  alreadyExists,
  FieldUpdate,
  invalidInput,
  notFound,
  type Board,
  type Card,
  type CardFilter,
} from "@clicky/board";
import type { CliContext } from "../context.js";
import { CliError, orFail } from "../errors.js";
import {
  formatCard,
  formatCreated,
  formatDeleted,
  formatInitialized,
  formatListing,
  formatMoved,
  formatUpdated,
} from "../format.js";
import { printLines } from "../output.js";
import type { Choice, Prompter } from "./Prompter.js";

export interface ColumnPreset {
  label: string;
  add: { id: string; name: string; order: number }[];
  remove: string[];
}

export const COLUMN_PRESETS: readonly ColumnPreset[] = [
  { label: "Default (To Do, In Progress, Done)", add: [], remove: [] },
  { label: "Simple (To Do, Done)", add: [], remove: ["in_progress"] },
  {
    label: "Development (Backlog, In Progress, Review, Done)",
    add: [
      { id: "backlog", name: "Backlog", order: 0 },
      { id: "review", name: "Review", order: 1 },
    ],
    remove: ["todo"],
  },
];

export function requireCard(board: Board, cardId: string): Card {
  const card = board.getCard(cardId);
  if (!card) {
    throw new CliError(notFound("card", cardId).message);
  }
  return card;
}

function cardChoices(board: Board): Choice<Card>[] {
  return board.columns.flatMap((column) =>
    board.cardsInColumnOrder(column.id).map((card) => ({
      label: `${card.id}: ${card.title} [${column.name}]`,
      value: card,
    }))
  );
}

function columnChoices(board: Board, except?: string): Choice<string>[] {
  return board.columns
    .filter((column) => column.id !== except)
    .map((column) => ({ label: column.name, value: column.id }));
}

/**
 * Let the user pick a card, or print a notice and return null on an empty board.
 */
async function pickCard(ctx: CliContext, prompter: Prompter, board: Board, message: string): Promise<Card | null> {
  const choices = cardChoices(board);
  if (choices.length === 0) {
    ctx.output.log("No cards found on this board.");
    return null;
  }
  return prompter.select(message, choices);
}

export async function initWizard(ctx: CliContext, prompter: Prompter, basePath: string): Promise<void> {
  if (ctx.boards.exists(basePath)) {
    throw new CliError(alreadyExists(basePath).message);
  }

  const name = await prompter.text("Board name:", { default: basename(basePath) || "board" });

  let preset = COLUMN_PRESETS[0];
  if (await prompter.confirm("Customize the columns?", false)) {
    preset = await prompter.select(
      "Column layout:",
      COLUMN_PRESETS.map((p) => ({ label: p.label, value: p }))
    );
  }

  const board = orFail(
    ctx.boards.initialize(basePath, name, (draft) => {
      for (const column of preset.add) {
        if (!draft.addColumn(column.id, column.name, column.order)) {
          return Err(invalidInput("id", `Column already exists: ${column.id}`));
        }
      }
      for (const columnId of preset.remove) {
        if (!draft.removeColumn(columnId)) {
          return Err(invalidInput("column", `Cannot remove column: ${columnId}`));
        }
      }
      return Ok(draft);
    })
  );

  printLines(ctx.output, formatInitialized(board, basePath));
}

export async function createWizard(ctx: CliContext, prompter: Prompter, basePath: string): Promise<void> {
  const board = orFail(ctx.boards.load(basePath));

  const title = await prompter.text("Card title:", { required: "Title is required" });
  const description = await prompter.text("Description (optional):");
  const assignee = await prompter.text("Assignee (optional):");
  const columnId = await prompter.select("Column:", columnChoices(board));

  const created = orFail(
    ctx.cards.create(basePath, {
      title,
      description: description || undefined,
      assignee: assignee || undefined,
      columnId,
    })
  );
  printLines(ctx.output, formatCreated(requireCard(created.board, created.cardId)));
}

export async function moveWizard(ctx: CliContext, prompter: Prompter, basePath: string): Promise<void> {
  const board = orFail(ctx.boards.load(basePath));
  const card = await pickCard(ctx, prompter, board, "Select card to move:");
  if (!card) return;

  ctx.output.log(`  Currently in: ${board.getColumn(card.columnId)?.name ?? card.columnId}`);

  const targets = columnChoices(board, card.columnId);
  if (targets.length === 0) {
    ctx.output.log("No other columns to move to.");
    return;
  }
  const columnId = await prompter.select("Move to column:", targets);

  const moved = orFail(ctx.cards.moveTo(basePath, card.id, columnId));
  printLines(ctx.output, formatMoved(moved, requireCard(moved, card.id)));
}

export async function showWizard(ctx: CliContext, prompter: Prompter, basePath: string): Promise<void> {
  const board = orFail(ctx.boards.load(basePath));
  const card = await pickCard(ctx, prompter, board, "Select card to view:");
  if (!card) return;

  printLines(ctx.output, formatCard(board, card));
}

export async function listWizard(ctx: CliContext, prompter: Prompter, basePath: string): Promise<void> {
  const board = orFail(ctx.boards.load(basePath));
  const filter: CardFilter = {};

  if (await prompter.confirm("Filter the list?", false)) {
    if (await prompter.confirm("Filter by column?", false)) {
      filter.columnId = await prompter.select("Column:", columnChoices(board));
    }
    if (await prompter.confirm("Filter by assignee?", false)) {
      const assignees = [...new Set(board.cards.flatMap((c) => (c.assignee === undefined ? [] : [c.assignee])))].sort();
      if (assignees.length === 0) {
        ctx.output.log("No assignees found on any cards.");
      } else {
        filter.assignee = await prompter.select(
          "Assignee:",
          assignees.map((a) => ({ label: a, value: a }))
        );
      }
    }
  }

  printLines(ctx.output, formatListing(orFail(ctx.cards.list(basePath, filter))));
}

async function askOptionalField(
  prompter: Prompter,
  label: string,
  current: string | undefined
): Promise<FieldUpdate<string>> {
  if (!(await prompter.confirm(`Update ${label}?`, false))) {
    return FieldUpdate.leave();
  }

  if (current === undefined) {
    const value = await prompter.text(`Add ${label}:`);
    return value === "" ? FieldUpdate.leave() : FieldUpdate.set(value);
  }

  if (await prompter.confirm(`Clear ${label}?`, false)) {
    return FieldUpdate.clear();
  }
  const value = await prompter.text(`New ${label}:`, { default: current });
  return value === "" ? FieldUpdate.clear() : FieldUpdate.set(value);
}

export async function updateWizard(ctx: CliContext, prompter: Prompter, basePath: string): Promise<void> {
  const board = orFail(ctx.boards.load(basePath));
  const card = await pickCard(ctx, prompter, board, "Select card to update:");
  if (!card) return;

  ctx.output.log(`Selected: ${card.title}`);

  let title: string | undefined;
  if (await prompter.confirm("Update title?", false)) {
    title = await prompter.text("New title:", { default: card.title, required: "Title is required" });
  }
  const description = await askOptionalField(prompter, "description", card.description);
  const assignee = await askOptionalField(prompter, "assignee", card.assignee);

  if (title === undefined && description.kind === "leave" && assignee.kind === "leave") {
    ctx.output.log("No changes made.");
    return;
  }

  const updated = orFail(ctx.cards.update(basePath, card.id, { title, description, assignee }));
  printLines(ctx.output, formatUpdated(requireCard(updated, card.id)));
}

/**
 * Ask before deleting. Returns whether the card was deleted.
 */
export async function confirmAndDelete(
  ctx: CliContext,
  prompter: Prompter,
  basePath: string,
  cardId: string
): Promise<boolean> {
  if (!(await prompter.confirm(`Are you sure you want to delete ${cardId}?`, false))) {
    ctx.output.log("Cancelled.");
    return false;
  }

  orFail(ctx.cards.delete(basePath, cardId));
  printLines(ctx.output, formatDeleted(cardId));
  return true;
}

export async function deleteWizard(ctx: CliContext, prompter: Prompter, basePath: string): Promise<void> {
  const board = orFail(ctx.boards.load(basePath));
  const card = await pickCard(ctx, prompter, board, "Select card to delete:");
  if (!card) return;

  await confirmAndDelete(ctx, prompter, basePath, card.id);
}
