import type { Result } from "@clicky/core";
import type { Board } from "../Board.js";
import type { BoardError } from "../errors.js";

/**
 * Persistence port for whole boards.
 *
 * A key identifies one board; for the JSON store it is the project
 * directory that holds `.clicky/board.json`.
 */
export interface BoardStore {
  /** Fails with not_found (board) or storage_failure. */
  load(key: string): Result<Board, BoardError>;
  save(key: string, board: Board): Result<void, BoardError>;
  exists(key: string): boolean;
  delete(key: string): Result<void, BoardError>;
  /** Nearest key at or above `start` that holds a board, or null. */
  findRoot(start: string): string | null;
  /** Human-readable location of a key, for messages. */
  describe(key: string): string;
}
