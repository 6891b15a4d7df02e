/**
 * Text blocks printed by commands and wizards.
 */

import { formatTimestamp, type Board, type Card, type CardListing } from "@clicky/board";

const CHECK = "✓";

function columnName(board: Board, columnId: string): string {
  return board.getColumn(columnId)?.name ?? columnId;
}

export function formatInitialized(board: Board, basePath: string): string[] {
  return [
    `${CHECK} Initialized board '${board.name}' in ${basePath}`,
    `  Card ID prefix: ${board.cardIdPrefix}`,
    `  Columns: ${board.columns.map((c) => c.name).join(", ")}`,
  ];
}

export function formatCreated(card: Card): string[] {
  return [`${CHECK} Created card ${card.id}`, `  Title: ${card.title}`];
}

export function formatMoved(board: Board, card: Card): string[] {
  return [`${CHECK} Moved ${card.id} to ${columnName(board, card.columnId)}`, `  Title: ${card.title}`];
}

export function formatUpdated(card: Card): string[] {
  return [`${CHECK} Updated ${card.id}`, `  Title: ${card.title}`];
}

export function formatDeleted(cardId: string): string[] {
  return [`${CHECK} Deleted ${cardId}`];
}

export function formatCard(board: Board, card: Card): string[] {
  const lines = [`Card: ${card.id}`, `  Title:       ${card.title}`];
  if (card.description !== undefined) {
    lines.push(`  Description: ${card.description}`);
  }
  lines.push(`  Column:      ${columnName(board, card.columnId)} (${card.columnId})`);
  if (card.assignee !== undefined) {
    lines.push(`  Assignee:    ${card.assignee}`);
  }
  lines.push(`  Created:     ${formatTimestamp(card.createdAt)}`);
  lines.push(`  Updated:     ${formatTimestamp(card.updatedAt)}`);
  return lines;
}

export function formatCardLine(card: Card): string {
  const assignee = card.assignee !== undefined ? ` [@${card.assignee}]` : "";
  return `  ${card.id}: ${card.title}${assignee}`;
}

export function formatListing(listing: CardListing): string[] {
  const { board } = listing;
  const lines = [`Board: ${board.name} (${board.id})`, `Total cards: ${listing.total}`];

  for (const { column, cards } of listing.columns) {
    const heading = `${column.name} (${column.id})`;
    lines.push("", heading, "─".repeat(heading.length));
    if (cards.length === 0) {
      lines.push("  (no cards)");
    } else {
      lines.push(...cards.map(formatCardLine));
    }
  }

  return lines;
}

export function formatInfo(board: Board): string[] {
  const lines = [
    `Board: ${board.name}`,
    `ID: ${board.id}`,
    `Card ID prefix: ${board.cardIdPrefix}`,
    `Created: ${formatTimestamp(board.createdAt)}`,
    "",
    "Columns:",
  ];
  for (const column of board.columns) {
    const count = column.cardCount();
    lines.push(`  ${column.name} (${column.id}): ${count} ${count === 1 ? "card" : "cards"}`);
  }
  lines.push("", `Total cards: ${board.cards.length}`);
  return lines;
}
