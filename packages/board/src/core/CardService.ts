/**
 * Card service - card operations as load/mutate/save transactions.
 */

import type { Result } from "@clicky/core";
import { Ok, Err, andThen } from "@clicky/core";
import type { Board } from "./Board.js";
import type { BoardService } from "./BoardService.js";
import type { Card } from "./Card.js";
import type { Column } from "./Column.js";
import { invalidInput, notFound, type BoardError } from "./errors.js";
import { DEFAULT_COLUMN_ID } from "./model.js";

/**
 * Update directive for an optional field: keep it, clear it, or replace it.
 */
export type FieldUpdate<T> =
  | { kind: "leave" }
  | { kind: "clear" }
  | { kind: "set"; value: T };

export const FieldUpdate = {
  leave: <T>(): FieldUpdate<T> => ({ kind: "leave" }),
  clear: <T>(): FieldUpdate<T> => ({ kind: "clear" }),
  set: <T>(value: T): FieldUpdate<T> => ({ kind: "set", value }),
};

export interface CreateCardInput {
  title: string;
  description?: string;
  assignee?: string;
  /** Defaults to "todo" */
  columnId?: string;
}

export interface UpdateCardInput {
  title?: string;
  description?: FieldUpdate<string>;
  assignee?: FieldUpdate<string>;
}

export interface CardFilter {
  columnId?: string;
  assignee?: string;
}

export interface CreatedCard {
  cardId: string;
  board: Board;
}

export interface FoundCard {
  card: Card;
  board: Board;
}

/**
 * Cards grouped by column, each group in the column's display order.
 */
export interface CardListing {
  board: Board;
  columns: { column: Column; cards: Card[] }[];
  total: number;
}

export class CardService {
  constructor(private readonly boards: BoardService) {}

  /**
   * Create a card. The title must not be blank and the column must exist;
   * both are checked before a card number is consumed.
   */
  create(basePath: string, input: CreateCardInput): Result<CreatedCard, BoardError> {
    const title = input.title.trim();
    if (title === "") {
      return Err(invalidInput("title", "Title is required"));
    }

    const columnId = input.columnId ?? DEFAULT_COLUMN_ID;

    return this.boards.update(basePath, (board) => {
      if (!board.getColumn(columnId)) {
        return Err(notFound("column", columnId));
      }

      const cardId = board.createCard(title, input.description, input.assignee, columnId);
      if (cardId === null) {
        return Err(notFound("column", columnId));
      }

      return Ok({ cardId, board });
    });
  }

  /**
   * Move a card to the bottom of another column.
   */
  moveTo(basePath: string, cardId: string, columnId: string): Result<Board, BoardError> {
    return this.boards.update(basePath, (board) => {
      if (!board.getCard(cardId)) {
        return Err(notFound("card", cardId));
      }
      if (!board.getColumn(columnId)) {
        return Err(notFound("column", columnId));
      }
      if (!board.moveCard(cardId, columnId)) {
        return Err(notFound("card", cardId));
      }
      return Ok(board);
    });
  }

  /**
   * Update any subset of title, description and assignee.
   */
  update(basePath: string, cardId: string, input: UpdateCardInput): Result<Board, BoardError> {
    const title = input.title?.trim();
    if (title === "") {
      return Err(invalidInput("title", "Title cannot be empty"));
    }

    return this.boards.update(basePath, (board) => {
      const card = board.getCard(cardId);
      if (!card) {
        return Err(notFound("card", cardId));
      }

      if (title !== undefined) {
        card.setTitle(title);
      }
      applyFieldUpdate(input.description, (value) => card.setDescription(value));
      applyFieldUpdate(input.assignee, (value) => card.setAssignee(value));
      board.touch();

      return Ok(board);
    });
  }

  delete(basePath: string, cardId: string): Result<Board, BoardError> {
    return this.boards.update(basePath, (board) => {
      if (!board.deleteCard(cardId)) {
        return Err(notFound("card", cardId));
      }
      return Ok(board);
    });
  }

  get(basePath: string, cardId: string): Result<FoundCard, BoardError> {
    const loaded = this.boards.load(basePath);
    if (!loaded.ok) return loaded;

    const card = loaded.value.getCard(cardId);
    if (!card) {
      return Err(notFound("card", cardId));
    }
    return Ok({ card, board: loaded.value });
  }

  /**
   * List cards column by column, optionally narrowed to one column or one assignee.
   */
  list(basePath: string, filter: CardFilter = {}): Result<CardListing, BoardError> {
    return andThen(this.boards.load(basePath), (board) => {
      if (filter.columnId !== undefined && !board.getColumn(filter.columnId)) {
        return Err(notFound("column", filter.columnId));
      }

      const columns = board.columns
        .filter((column) => filter.columnId === undefined || column.id === filter.columnId)
        .map((column) => ({
          column,
          cards: board
            .cardsInColumnOrder(column.id)
            .filter((card) => filter.assignee === undefined || card.assignee === filter.assignee),
        }));

      return Ok({
        board,
        columns,
        total: columns.reduce((sum, group) => sum + group.cards.length, 0),
      });
    });
  }
}

function applyFieldUpdate(
  update: FieldUpdate<string> | undefined,
  apply: (value: string | undefined) => void
): void {
  if (!update || update.kind === "leave") return;
  apply(update.kind === "clear" ? undefined : update.value);
}
