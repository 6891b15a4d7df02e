import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import stripAnsi from "strip-ansi";
import { Board } from "@clicky/board";
import { footerHint, render, truncate, visibleWidth, type AppSnapshot } from "../src/render.js";
import { boardView, emptyForm, type View } from "../src/state/view.js";

const SIZE = { columns: 62, rows: 40 };

function plain(snapshot: AppSnapshot): string[] {
  return render(snapshot, SIZE).map((line) => stripAnsi(line));
}

describe("render", () => {
  let board: Board;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-04T05:06:07.000Z"));
    board = new Board("tui", "tui");
    board.createCard("Fix bug");
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function snapshot(view: View, errorMessage: string | null = null): AppSnapshot {
    return { board, view, errorMessage };
  }

  it("draws the columns side by side", () => {
    const lines = plain(snapshot(boardView(0)));

    expect(lines).toEqual([
      " Clicky: tui ",
      "",
      [
        `┌ To Do (1) ${"─".repeat(7)}┐`,
        `┌ In Progress (0) ${"─".repeat(1)}┐`,
        `┌ Done (0) ${"─".repeat(8)}┐`,
      ].join(" "),
      ["│  TUI-001 Fix bug │", `│  (empty)${" ".repeat(9)}│`, `│  (empty)${" ".repeat(9)}│`].join(" "),
      Array.from({ length: 3 }, () => `└${"─".repeat(18)}┘`).join(" "),
      "",
      footerHint(boardView(0)),
    ]);
  });

  it("marks highlighted and selected cards", () => {
    const highlighted = plain(snapshot(boardView(0, { kind: "highlighted", column: 0, cardIndex: 0 })));
    expect(highlighted[3]?.startsWith("│> TUI-001 Fix bug │")).toBe(true);

    const selected = plain(snapshot(boardView(1, { kind: "selected", cardId: "TUI-001" })));
    expect(selected[3]?.startsWith("│* TUI-001 Fix bug │")).toBe(true);
  });

  it("truncates long card titles to the column", () => {
    board.createCard("A title much longer than the column", undefined, "kim");
    const lines = plain(snapshot(boardView(0)));

    expect(lines[4]?.startsWith("│  TUI-002 A tit...│")).toBe(true);
  });

  it("shows the error instead of the hints", () => {
    const lines = plain(snapshot(boardView(0), "Storage error: disk full"));
    expect(lines[lines.length - 1]).toBe("Error: Storage error: disk full");
  });

  it("shows card details", () => {
    board.getCard("TUI-001")?.setAssignee("kim");

    expect(plain(snapshot({ kind: "cardDetail", cardId: "TUI-001" })).slice(0, 8)).toEqual([
      " Card Details ",
      "",
      "ID: TUI-001",
      "Title: Fix bug",
      "Assignee: kim",
      "Column: To Do",
      "Created: 2026-03-04 05:06",
      "Updated: 2026-03-04 05:06",
    ]);
  });

  it("shows the form with the focused field and a cursor while editing", () => {
    const form = { ...emptyForm(), title: "Draft", currentField: "description" as const, inputMode: "editing" as const };
    const lines = plain(snapshot({ kind: "cardForm", mode: { kind: "create", columnId: "done" }, form }));

    expect(lines.slice(0, 13)).toEqual([
      " Create Card ",
      "",
      "Column: Done",
      "",
      "  Title (required)",
      "    Draft",
      "",
      "> Description",
      "    _",
      "",
      "  Assignee",
      "    ",
      "",
    ]);
    expect(lines[13]).toBe("-- EDITING --");
  });

  it("shows the move dialog", () => {
    const lines = plain(snapshot({ kind: "moveCard", cardId: "TUI-001", targetColumnIndex: 1 }));

    expect(lines.slice(0, 7)).toEqual([
      " Move TUI-001 ",
      "",
      "Fix bug",
      "",
      "  To Do (current)",
      "> In Progress",
      "  Done",
    ]);
  });

  it("asks before deleting", () => {
    expect(plain(snapshot({ kind: "confirmDelete", cardId: "TUI-001" })).slice(0, 5)).toEqual([
      " Confirm Delete ",
      "",
      "Are you sure you want to delete TUI-001?",
      "",
      " y: confirm | n: cancel ",
    ]);
  });

  it("draws only the help screen over any view", () => {
    const lines = plain(snapshot({ kind: "help", previous: boardView(0) }));
    expect(lines[0]).toBe(" Keyboard Shortcuts ");
    expect(lines).toContain("   Enter     Highlight, select, open card");
    expect(lines[lines.length - 1]).toBe("Esc Close help | ? Toggle");
  });

  it("says so when no board is loaded", () => {
    const lines = render({ board: null, view: boardView(0), errorMessage: "No board found" }, SIZE).map((l) =>
      stripAnsi(l)
    );
    expect(lines).toEqual([" Clicky ", "", "No board loaded.", "", "Error: No board found"]);
  });
});

describe("text helpers", () => {
  it("measures text without escape codes", () => {
    expect(visibleWidth("\x1b[1;36mabc\x1b[0m")).toBe(3);
  });

  it("truncates with an ellipsis", () => {
    expect(truncate("abcdefgh", 8)).toBe("abcdefgh");
    expect(truncate("abcdefgh", 6)).toBe("abc...");
    expect(truncate("abcdefgh", 2)).toBe("ab");
  });
});
