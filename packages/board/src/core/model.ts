/**
 * Persisted board records.
 * These are the JSON shapes written to .clicky/board.json; the entity
 * classes in Card.ts, Column.ts and Board.ts convert to and from them.
 */

/**
 * A card as stored on disk.
 */
export interface CardRecord {
  /** Board-unique identifier, PREFIX-NNN */
  id: string;
  title: string;
  description?: string;
  assignee?: string;
  /** Column this card belongs to */
  columnId: string;
  /** Creation timestamp (ISO 8601) */
  createdAt: string;
  /** Last update timestamp (ISO 8601) */
  updatedAt: string;
}

/**
 * A column as stored on disk.
 */
export interface ColumnRecord {
  /** Stable slug, e.g. "in_progress" */
  id: string;
  /** Display name */
  name: string;
  /** Left-to-right display position */
  order: number;
  /** Card ids in display order */
  cards: string[];
}

/**
 * The complete board document.
 */
export interface BoardRecord {
  /** Schema version for migrations */
  version: number;
  id: string;
  name: string;
  cardIdPrefix: string;
  nextCardNumber: number;
  columns: ColumnRecord[];
  cards: CardRecord[];
  createdAt: string;
  updatedAt: string;
}

export const BOARD_SCHEMA_VERSION = 1;

/**
 * Columns every new board starts with.
 */
export const DEFAULT_COLUMNS: ReadonlyArray<{ id: string; name: string; order: number }> = [
  { id: "todo", name: "To Do", order: 0 },
  { id: "in_progress", name: "In Progress", order: 1 },
  { id: "done", name: "Done", order: 2 },
];

/**
 * Column a card lands in when none is given.
 */
export const DEFAULT_COLUMN_ID = "todo";

/**
 * Current time as an ISO 8601 string.
 */
export function timestamp(): string {
  return new Date().toISOString();
}

/**
 * "YYYY-MM-DD HH:MM" in UTC, for display.
 */
export function formatTimestamp(iso: string): string {
  return iso.slice(0, 16).replace("T", " ");
}
