import type { Board } from "../src/core/Board.js";

/**
 * Every way the card list and the column lists can disagree.
 * An empty array means the board is consistent.
 */
export function invariantViolations(board: Board): string[] {
  const problems: string[] = [];
  const columnIds = new Set(board.columns.map((c) => c.id));

  if (board.columns.length === 0) {
    problems.push("board has no columns");
  }
  if (columnIds.size !== board.columns.length) {
    problems.push("duplicate column ids");
  }

  const cardIds = board.cards.map((c) => c.id);
  if (new Set(cardIds).size !== cardIds.length) {
    problems.push("duplicate card ids");
  }

  for (const card of board.cards) {
    if (!columnIds.has(card.columnId)) {
      problems.push(`${card.id} points at missing column ${card.columnId}`);
    }
  }

  for (const column of board.columns) {
    const listed = [...column.cards].sort();
    const owned = board.cards.filter((c) => c.columnId === column.id).map((c) => c.id).sort();
    if (listed.join(",") !== owned.join(",")) {
      problems.push(`${column.id} lists [${listed}] but owns [${owned}]`);
    }
  }

  return problems;
}
