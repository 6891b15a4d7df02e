import type { Board } from "../core/Board.js";
import type { Card } from "../core/Card.js";

/**
 * Card as returned to agents, with the column's display name resolved.
 */
export function cardSummary(board: Board, card: Card) {
  return {
    ...card.toJSON(),
    columnName: board.getColumn(card.columnId)?.name ?? card.columnId,
  };
}
