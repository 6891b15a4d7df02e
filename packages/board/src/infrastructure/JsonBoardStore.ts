/**
 * Board storage - JSON file persistence.
 * Each board lives in <project>/.clicky/board.json (names come from the config).
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { Ok, Err, tryCatch, type Result } from "@clicky/core";
import { Board } from "../core/Board.js";
import { notFound, storageFailure, type BoardError } from "../core/errors.js";
import type { BoardStore } from "../core/ports/BoardStore.js";
import { DEFAULT_STORE_CONFIG, type BoardStoreConfig } from "../config.js";
import { parseBoardRecord } from "./boardSchema.js";

export class JsonBoardStore implements BoardStore {
  constructor(private readonly config: BoardStoreConfig = DEFAULT_STORE_CONFIG) {}

  /**
   * Path of the board file for a project directory.
   */
  boardPath(key: string): string {
    return join(key, this.config.dirName, this.config.fileName);
  }

  describe(key: string): string {
    return this.boardPath(key);
  }

  exists(key: string): boolean {
    return existsSync(this.boardPath(key));
  }

  load(key: string): Result<Board, BoardError> {
    const path = this.boardPath(key);
    if (!existsSync(path)) {
      return Err(notFound("board", key));
    }

    const read = tryCatch((): unknown => JSON.parse(readFileSync(path, "utf-8")));
    if (!read.ok) {
      return Err(storageFailure(path, read.error));
    }

    const parsed = parseBoardRecord(read.value);
    if (!parsed.ok) {
      return Err(storageFailure(path, new Error(`Invalid board data in ${path}: ${parsed.error}`)));
    }

    return Ok(Board.fromJSON(parsed.value));
  }

  /**
   * Write the whole board. The file is written next to its final name
   * and renamed over it, so readers never see a half-written document.
   */
  save(key: string, board: Board): Result<void, BoardError> {
    const path = this.boardPath(key);
    const tempPath = `${path}.tmp`;

    const written = tryCatch(() => {
      mkdirSync(dirname(path), { recursive: true });
      writeFileSync(tempPath, `${JSON.stringify(board.toJSON(), null, 2)}\n`, "utf-8");
      renameSync(tempPath, path);
    });

    return written.ok ? Ok(undefined) : Err(storageFailure(path, written.error));
  }

  delete(key: string): Result<void, BoardError> {
    const path = this.boardPath(key);
    if (!existsSync(path)) {
      return Err(notFound("board", key));
    }

    const removed = tryCatch(() => rmSync(path));
    return removed.ok ? Ok(undefined) : Err(storageFailure(path, removed.error));
  }

  /**
   * Walk up from `start` to the first directory holding a board file.
   */
  findRoot(start: string): string | null {
    let current = resolve(start);

    for (;;) {
      if (this.exists(current)) {
        return current;
      }
      const parent = dirname(current);
      if (parent === current) {
        return null;
      }
      current = parent;
    }
  }
}
