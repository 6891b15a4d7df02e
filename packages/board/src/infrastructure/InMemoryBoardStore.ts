import { dirname, resolve } from "node:path";
import { Ok, Err, type Result } from "@clicky/core";
import { Board } from "../core/Board.js";
import { notFound, storageFailure, type BoardError } from "../core/errors.js";
import type { BoardStore } from "../core/ports/BoardStore.js";
import type { BoardRecord } from "../core/model.js";

/**
 * Board store kept in process memory.
 *
 * Boards are stored as records, so a loaded board never shares state
 * with the one that was saved, the same as a round trip through disk.
 * `failNextSave` simulates a write error.
 */
export class InMemoryBoardStore implements BoardStore {
  private readonly boards = new Map<string, BoardRecord>();
  private pendingFailure: Error | null = null;

  load(key: string): Result<Board, BoardError> {
    const record = this.boards.get(resolve(key));
    if (!record) {
      return Err(notFound("board", key));
    }
    return Ok(Board.fromJSON(structuredClone(record)));
  }

  save(key: string, board: Board): Result<void, BoardError> {
    if (this.pendingFailure) {
      const cause = this.pendingFailure;
      this.pendingFailure = null;
      return Err(storageFailure(this.describe(key), cause));
    }
    this.boards.set(resolve(key), board.toJSON());
    return Ok(undefined);
  }

  exists(key: string): boolean {
    return this.boards.has(resolve(key));
  }

  delete(key: string): Result<void, BoardError> {
    if (!this.boards.delete(resolve(key))) {
      return Err(notFound("board", key));
    }
    return Ok(undefined);
  }

  findRoot(start: string): string | null {
    let current = resolve(start);
    for (;;) {
      if (this.boards.has(current)) return current;
      const parent = dirname(current);
      if (parent === current) return null;
      current = parent;
    }
  }

  describe(key: string): string {
    return `memory:${resolve(key)}`;
  }

  failNextSave(cause: Error = new Error("simulated write failure")): void {
    this.pendingFailure = cause;
  }
}
