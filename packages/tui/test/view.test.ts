import { describe, it, expect } from "vitest";
import {
  boardView,
  cycleField,
  defaultBoardView,
  formFromCard,
  stepCard,
  stepColumn,
  stepTarget,
  toggleHelp,
  type View,
} from "../src/state/view.js";

describe("view state", () => {
  it("starts on the first column with nothing selected", () => {
    expect(defaultBoardView()).toEqual({ kind: "board", selectedColumn: 0, selection: { kind: "none" } });
  });

  it("cycles form fields in both directions", () => {
    expect(cycleField("title", 1)).toBe("description");
    expect(cycleField("description", 1)).toBe("assignee");
    expect(cycleField("assignee", 1)).toBe("title");
    expect(cycleField("title", -1)).toBe("assignee");
  });

  it("prefills a form from a card", () => {
    expect(formFromCard({ title: "Task", assignee: "dana" })).toEqual({
      title: "Task",
      description: "",
      assignee: "dana",
      currentField: "title",
      inputMode: "normal",
    });
  });

  describe("stepColumn", () => {
    it("clamps to the board", () => {
      expect(stepColumn(boardView(0), -1, 3)).toEqual(boardView(0));
      expect(stepColumn(boardView(2), 1, 3)).toEqual(boardView(2));
      expect(stepColumn(boardView(1), 1, 3)).toEqual(boardView(2));
    });

    it("drops a highlight when the column changes", () => {
      const view = boardView(0, { kind: "highlighted", column: 0, cardIndex: 2 });
      expect(stepColumn(view, 1, 3)).toEqual(boardView(1));
    });

    it("keeps a highlight when the column cannot change", () => {
      const view = boardView(0, { kind: "highlighted", column: 0, cardIndex: 2 });
      expect(stepColumn(view, -1, 3)).toBe(view);
    });
  });

  describe("stepCard", () => {
    it("highlights the top card going down and the bottom card going up", () => {
      expect(stepCard(boardView(1), 1, 4).selection).toEqual({ kind: "highlighted", column: 1, cardIndex: 0 });
      expect(stepCard(boardView(1), -1, 4).selection).toEqual({ kind: "highlighted", column: 1, cardIndex: 3 });
    });

    it("clamps the highlight to the column", () => {
      const bottom = boardView(0, { kind: "highlighted", column: 0, cardIndex: 3 });
      expect(stepCard(bottom, 1, 4)).toEqual(bottom);
      expect(stepCard(bottom, -1, 4).selection).toEqual({ kind: "highlighted", column: 0, cardIndex: 2 });
    });

    it("does nothing in an empty column", () => {
      expect(stepCard(boardView(2), 1, 0)).toEqual(boardView(2));
    });
  });

  it("clamps the move target", () => {
    const view = { kind: "moveCard", cardId: "A-001", targetColumnIndex: 2 } as const;
    expect(stepTarget(view, 1, 3).targetColumnIndex).toBe(2);
    expect(stepTarget(view, -1, 3).targetColumnIndex).toBe(1);
  });

  it("toggles help around the previous view", () => {
    const detail: View = { kind: "cardDetail", cardId: "A-001" };
    const help = toggleHelp(detail);

    expect(help).toEqual({ kind: "help", previous: detail });
    expect(toggleHelp(help)).toBe(detail);
  });
});
