/**
 * Board service - load, mutate and persist whole boards.
 */

import { basename, resolve } from "node:path";
import type { Result } from "@clicky/core";
import { Ok, Err, map } from "@clicky/core";
import { Board, type MoveDirection } from "./Board.js";
import {
  alreadyExists,
  edgeOfSequence,
  invalidInput,
  notFound,
  type BoardError,
} from "./errors.js";
import type { BoardStore } from "./ports/BoardStore.js";

/**
 * A board together with the directory it was found in.
 */
export interface LocatedBoard {
  board: Board;
  basePath: string;
}

export class BoardService {
  constructor(private readonly store: BoardStore) {}

  /**
   * Create a board in `basePath`. The name defaults to the directory name
   * and the board id is derived from the name. `setup` shapes the new
   * board before its first save; if it fails nothing is written.
   */
  initialize(
    basePath: string,
    name?: string,
    setup?: (board: Board) => Result<unknown, BoardError>
  ): Result<Board, BoardError> {
    if (this.store.exists(basePath)) {
      return Err(alreadyExists(this.store.describe(basePath)));
    }

    if (name !== undefined && name.trim() === "") {
      return Err(invalidInput("name", "Board name cannot be empty"));
    }

    const boardName = name?.trim() || basename(resolve(basePath)) || "board";
    const board = new Board(BoardService.sanitizeId(boardName), boardName);

    if (setup) {
      const prepared = setup(board);
      if (!prepared.ok) return prepared;
    }

    const saved = this.store.save(basePath, board);
    if (!saved.ok) return saved;

    return Ok(board);
  }

  load(basePath: string): Result<Board, BoardError> {
    return this.store.load(basePath);
  }

  /**
   * Search upward from `startPath` for a board and load it.
   */
  findAndLoad(startPath: string): Result<LocatedBoard, BoardError> {
    const basePath = this.store.findRoot(startPath);
    if (basePath === null) {
      return Err(notFound("board", startPath));
    }

    return map(this.store.load(basePath), (board) => ({ board, basePath }));
  }

  save(basePath: string, board: Board): Result<void, BoardError> {
    return this.store.save(basePath, board);
  }

  exists(basePath: string): boolean {
    return this.store.exists(basePath);
  }

  delete(basePath: string): Result<void, BoardError> {
    return this.store.delete(basePath);
  }

  /**
   * Load the board, apply `mutate`, and save it if the mutation succeeded.
   * A failed mutation leaves the stored board untouched.
   */
  update<T>(basePath: string, mutate: (board: Board) => Result<T, BoardError>): Result<T, BoardError> {
    const loaded = this.store.load(basePath);
    if (!loaded.ok) return loaded;

    const result = mutate(loaded.value);
    if (!result.ok) return result;

    const saved = this.store.save(basePath, loaded.value);
    if (!saved.ok) return saved;

    return result;
  }

  /**
   * Move a card one place up or down inside its column.
   */
  reorderCardInColumn(
    basePath: string,
    cardId: string,
    direction: MoveDirection
  ): Result<Board, BoardError> {
    return this.update(basePath, (board) => {
      if (!board.getCard(cardId)) {
        return Err(notFound("card", cardId));
      }
      if (!board.moveCardWithinColumn(cardId, direction)) {
        return Err(edgeOfSequence(cardId, direction));
      }
      return Ok(board);
    });
  }

  /**
   * Add a column. Without an order it goes after the last column.
   */
  addColumn(basePath: string, id: string, name: string, order?: number): Result<Board, BoardError> {
    const columnId = id.trim();
    if (columnId === "") {
      return Err(invalidInput("id", "Column id cannot be empty"));
    }
    if (order !== undefined && (!Number.isInteger(order) || order < 0)) {
      return Err(invalidInput("order", `Column order must be a non-negative integer: ${order}`));
    }

    return this.update(basePath, (board) => {
      const position = order ?? Math.max(-1, ...board.columns.map((c) => c.order)) + 1;
      if (!board.addColumn(columnId, name.trim() || columnId, position)) {
        return Err(invalidInput("id", `Column already exists: ${columnId}`));
      }
      return Ok(board);
    });
  }

  /**
   * Remove a column, moving its cards to the first remaining column.
   */
  removeColumn(basePath: string, id: string): Result<Board, BoardError> {
    return this.update(basePath, (board) => {
      if (!board.getColumn(id)) {
        return Err(notFound("column", id));
      }
      if (!board.removeColumn(id)) {
        return Err(invalidInput("id", "Cannot remove the last column"));
      }
      return Ok(board);
    });
  }

  /**
   * Turn a display name into a board id: lowercase, spaces and
   * underscores become hyphens, other punctuation is dropped.
   */
  static sanitizeId(name: string): string {
    const id = Array.from(name.toLowerCase().replace(/[ _]/g, "-"))
      .filter((ch) => ch === "-" || /[\p{L}\p{N}]/u.test(ch))
      .join("");
    return id || "board";
  }
}
