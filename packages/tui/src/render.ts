/**
 * Turn the application state into screen lines.
 * Pure: the runner decides where the lines go.
 */

import stripAnsi from "strip-ansi";
import { formatTimestamp, type Board, type Card } from "@clicky/board";
import { paint, THEME } from "./theme.js";
import type {
  BoardView,
  CardFormView,
  FormField,
  MoveCardView,
  View,
} from "./state/view.js";

export interface AppSnapshot {
  readonly board: Board | null;
  readonly view: View;
  readonly errorMessage: string | null;
}

export interface ScreenSize {
  columns: number;
  rows: number;
}

const MIN_COLUMN_WIDTH = 12;

const FIELD_LABELS: Record<FormField, string> = {
  title: "Title (required)",
  description: "Description",
  assignee: "Assignee",
};

const SHORTCUTS = [
  ["GLOBAL", [["q", "Quit"], ["?", "Toggle help"], ["Ctrl+C", "Quit from anywhere"]]],
  [
    "BOARD VIEW",
    [
      ["h/l ←/→", "Previous/next column"],
      ["k/j ↑/↓", "Previous/next card"],
      ["Enter", "Highlight, select, open card"],
      ["Esc", "Step back from selection"],
      ["h/l", "Quick move selected card"],
      ["k/j", "Reorder selected card"],
      ["c", "Create card"],
      ["r", "Reload board"],
    ],
  ],
  [
    "CARD DETAIL",
    [
      ["e", "Edit card"],
      ["d", "Delete card"],
      ["m", "Move card"],
      ["Esc", "Return to board"],
    ],
  ],
] as const;

/** Width of text as shown, ignoring escape codes. */
export function visibleWidth(text: string): number {
  return Array.from(stripAnsi(text)).length;
}

export function padEnd(text: string, width: number, fill = " "): string {
  return text + fill.repeat(Math.max(0, width - visibleWidth(text)));
}

/**
 * Shorten plain text to `width` characters, marking the cut with "...".
 */
export function truncate(text: string, width: number): string {
  const chars = Array.from(text);
  if (chars.length <= width) return text;
  if (width <= 3) return chars.slice(0, Math.max(width, 0)).join("");
  return `${chars.slice(0, width - 3).join("")}...`;
}

function header(text: string): string {
  return paint(` ${text} `, THEME.title);
}

export function render(app: AppSnapshot, size: ScreenSize): string[] {
  const lines = app.board ? renderView(app.board, app.view, size.columns) : [header("Clicky"), "", "No board loaded."];

  lines.push("");
  lines.push(
    app.errorMessage
      ? paint(`Error: ${app.errorMessage}`, THEME.error)
      : paint(footerHint(app.view), THEME.hint)
  );
  return lines;
}

function renderView(board: Board, view: View, width: number): string[] {
  switch (view.kind) {
    case "board":
      return renderBoard(board, view, width);
    case "cardDetail":
      return renderCardDetail(board, view.cardId);
    case "cardForm":
      return renderForm(board, view);
    case "moveCard":
      return renderMoveDialog(board, view);
    case "confirmDelete":
      return [
        paint(" Confirm Delete ", THEME.danger),
        "",
        `Are you sure you want to delete ${view.cardId}?`,
        "",
        " y: confirm | n: cancel ",
      ];
    case "help":
      return renderHelp();
  }
}

function cardLabel(card: Card): string {
  return card.assignee ? `${card.id} ${card.title} [@${card.assignee}]` : `${card.id} ${card.title}`;
}

/**
 * Columns side by side, each a box with its cards in display order.
 */
function renderBoard(board: Board, view: BoardView, width: number): string[] {
  const columns = board.columns;
  const columnWidth = Math.max(
    MIN_COLUMN_WIDTH,
    Math.floor((width - (columns.length - 1)) / Math.max(columns.length, 1))
  );
  const inner = columnWidth - 2;
  const { selection, selectedColumn } = view;

  const boxes = columns.map((column, index) => {
    const cards = board.cardsInColumnOrder(column.id);
    const active = index === selectedColumn;
    const borderStyle = active ? THEME.borderActive : THEME.border;

    const title = ` ${truncate(`${column.name} (${cards.length})`, inner - 2)} `;
    const top = paint(`┌${padEnd(title, inner, "─")}┐`, borderStyle);
    const bottom = paint(`└${"─".repeat(inner)}┘`, borderStyle);
    const side = paint("│", borderStyle);

    const rows = cards.map((card, cardIndex) => {
      const highlighted =
        active && selection.kind === "highlighted" && selection.cardIndex === cardIndex;
      const selected = selection.kind === "selected" && selection.cardId === card.id;
      const marker = selected ? "* " : highlighted ? "> " : "  ";
      const text = truncate(`${marker}${cardLabel(card)}`, inner);
      const styled = selected
        ? paint(text, THEME.selected)
        : highlighted
          ? paint(text, THEME.highlighted)
          : text;
      return `${side}${padEnd(styled, inner)}${side}`;
    });
    if (rows.length === 0) {
      rows.push(`${side}${padEnd(paint("  (empty)", THEME.muted), inner)}${side}`);
    }

    return { top, rows, bottom, blank: `${side}${" ".repeat(inner)}${side}` };
  });

  const height = Math.max(1, ...boxes.map((b) => b.rows.length));
  const lines = [header(`Clicky: ${board.name}`), ""];
  lines.push(boxes.map((b) => b.top).join(" "));
  for (let row = 0; row < height; row++) {
    lines.push(boxes.map((b) => b.rows[row] ?? b.blank).join(" "));
  }
  lines.push(boxes.map((b) => b.bottom).join(" "));
  return lines;
}

function renderCardDetail(board: Board, cardId: string): string[] {
  const card = board.getCard(cardId);
  if (!card) {
    return [header("Card Details"), "", `Card not found: ${cardId}`];
  }

  const lines = [header("Card Details"), "", `ID: ${card.id}`, `Title: ${card.title}`];
  if (card.description) lines.push(`Description: ${card.description}`);
  if (card.assignee) lines.push(`Assignee: ${card.assignee}`);
  lines.push(`Column: ${board.getColumn(card.columnId)?.name ?? card.columnId}`);
  lines.push(`Created: ${formatTimestamp(card.createdAt)}`);
  lines.push(`Updated: ${formatTimestamp(card.updatedAt)}`);
  return lines;
}

function renderForm(board: Board, view: CardFormView): string[] {
  const { form, mode } = view;
  const lines =
    mode.kind === "create"
      ? [header("Create Card"), "", `Column: ${board.getColumn(mode.columnId)?.name ?? mode.columnId}`]
      : [header(`Edit ${mode.cardId}`), ""];

  for (const field of ["title", "description", "assignee"] as const) {
    const focused = form.currentField === field;
    const editing = focused && form.inputMode === "editing";
    lines.push("");
    lines.push(focused ? paint(`> ${FIELD_LABELS[field]}`, THEME.label) : `  ${FIELD_LABELS[field]}`);
    lines.push(`    ${form[field]}${editing ? "_" : ""}`);
  }

  lines.push("");
  lines.push(
    form.inputMode === "editing" ? paint("-- EDITING --", THEME.editing) : paint("-- NORMAL --", THEME.muted)
  );
  return lines;
}

function renderMoveDialog(board: Board, view: MoveCardView): string[] {
  const card = board.getCard(view.cardId);
  const lines = [header(`Move ${view.cardId}`), ""];
  if (card) lines.push(card.title, "");

  board.columns.forEach((column, index) => {
    const current = card?.columnId === column.id ? " (current)" : "";
    const line = `${index === view.targetColumnIndex ? ">" : " "} ${column.name}${current}`;
    lines.push(index === view.targetColumnIndex ? paint(line, THEME.highlighted) : line);
  });
  return lines;
}

function renderHelp(): string[] {
  const lines = [header("Keyboard Shortcuts")];
  for (const [section, entries] of SHORTCUTS) {
    lines.push("", paint(` ${section}:`, THEME.label));
    for (const [key, description] of entries) {
      lines.push(`   ${key.padEnd(9)} ${description}`);
    }
  }
  lines.push("", " Press ? or Esc to close ");
  return lines;
}

function boardHint(view: BoardView): string {
  switch (view.selection.kind) {
    case "none":
      return "h/l Column | j/k Card | Enter Highlight | c Create | r Reload | ? Help | q Quit";
    case "highlighted":
      return "j/k Card | Enter Select | Esc Clear | c Create | ? Help | q Quit";
    case "selected":
      return "h/l Quick move | j/k Reorder | Enter Details | Esc Deselect | ? Help";
  }
}

/**
 * One line of hints for the keys that do something right now.
 */
export function footerHint(view: View): string {
  switch (view.kind) {
    case "board":
      return boardHint(view);
    case "cardDetail":
      return "e Edit | d Delete | m Move | Esc Back | ? Help";
    case "cardForm":
      return view.form.inputMode === "editing"
        ? "Enter Next field | Esc Stop editing | Backspace Delete"
        : "j/k Field | Type to edit | Enter Save | Esc Cancel | ? Help";
    case "moveCard":
      return "h/l Target column | Enter Move | Esc Cancel | ? Help";
    case "confirmDelete":
      return "y Confirm | n Cancel";
    case "help":
      return "Esc Close help | ? Toggle";
  }
}
