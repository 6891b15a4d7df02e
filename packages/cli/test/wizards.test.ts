import { describe, it, expect, beforeEach, vi } from "vitest";
import { createHarness, type Harness } from "./helpers.js";

const ROOT = "/work/proj";

describe("interactive wizards", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness(ROOT);
  });

  async function seed(): Promise<void> {
    await h.run("init");
    await h.run("create", "Write docs", "-d", "Old text");
    h.stdout.length = 0;
  }

  describe("init", () => {
    it("applies a column preset", async () => {
      const prompter = h.script("Team Board", true, "Development");

      expect(await h.run("init", "-i")).toBe(0);
      expect(prompter.asked).toEqual(["Board name:", "Customize the columns?", "Column layout:"]);
      expect(prompter.closed).toBe(true);
      expect(h.stdout).toEqual([
        "✓ Initialized board 'Team Board' in /work/proj",
        "  Card ID prefix: TEA",
        "  Columns: Backlog, In Progress, Review, Done",
      ]);
    });

    it("writes the board with its preset in one save", async () => {
      const save = vi.spyOn(h.store, "save");
      h.script("Team Board", true, "Development");

      await h.run("init", "-i");
      expect(save).toHaveBeenCalledTimes(1);
      expect(h.board().columns.map((c) => c.id)).toEqual(["backlog", "in_progress", "review", "done"]);
    });

    it("leaves no board behind when the write fails", async () => {
      h.store.failNextSave(new Error("disk full"));
      h.script("Team Board", true, "Simple");

      expect(await h.run("init", "-i")).toBe(1);
      expect(h.stderr).toEqual(["Error: Storage error: disk full"]);
      expect(h.boards.exists(ROOT)).toBe(false);
    });

    it("uses the directory name and default columns when nothing is changed", async () => {
      h.script("", false);

      await h.run("init", "--interactive");
      const board = h.board();
      expect(board.name).toBe("proj");
      expect(board.columns.map((c) => c.id)).toEqual(["todo", "in_progress", "done"]);
    });

    it("keeps only two columns with the simple preset", async () => {
      h.script("", true, "Simple");

      await h.run("init", "-i");
      expect(h.board().columns.map((c) => c.name)).toEqual(["To Do", "Done"]);
    });

    it("stops before asking anything when a board exists", async () => {
      await h.run("init");
      const prompter = h.script("Again");

      expect(await h.run("init", "-i")).toBe(1);
      expect(prompter.asked).toEqual([]);
      expect(h.stderr).toEqual(["Error: Board already initialized in this directory"]);
    });
  });

  describe("create", () => {
    it("asks for every field and the column", async () => {
      await h.run("init");
      h.stdout.length = 0;
      h.script("Plan sprint", "Agenda", "", "In Progress");

      expect(await h.run("create", "-i")).toBe(0);
      expect(h.stdout).toEqual(["✓ Created card PRO-001", "  Title: Plan sprint"]);

      const card = h.board().getCard("PRO-001");
      expect(card?.columnId).toBe("in_progress");
      expect(card?.description).toBe("Agenda");
      expect(card?.assignee).toBeUndefined();
    });
  });

  describe("move", () => {
    it("moves the chosen card to the chosen column", async () => {
      await seed();
      const prompter = h.script("PRO-001", "Done");

      await h.run("move", "-i");
      expect(prompter.asked).toEqual(["Select card to move:", "Move to column:"]);
      expect(h.stdout).toEqual(["  Currently in: To Do", "✓ Moved PRO-001 to Done", "  Title: Write docs"]);
    });

    it("says so when the board has no cards", async () => {
      await h.run("init");
      h.stdout.length = 0;

      await h.run("move", "-i");
      expect(h.stdout).toEqual(["No cards found on this board."]);
    });
  });

  describe("show", () => {
    it("prints the chosen card", async () => {
      await seed();
      h.script("PRO-001");

      await h.run("show", "-i");
      expect(h.stdout.slice(0, 3)).toEqual(["Card: PRO-001", "  Title:       Write docs", "  Description: Old text"]);
    });
  });

  describe("list", () => {
    beforeEach(seed);

    it("filters by a chosen assignee", async () => {
      await h.run("create", "Fix bug", "-a", "sam");
      h.stdout.length = 0;
      h.script(true, false, true, "sam");

      await h.run("list", "-i");
      expect(h.stdout.slice(0, 2)).toEqual(["Board: proj (proj)", "Total cards: 1"]);
      expect(h.stdout).toContain("  PRO-002: Fix bug [@sam]");
    });

    it("lists everything when nobody is assigned", async () => {
      h.script(true, false, true);

      await h.run("list", "-i");
      expect(h.stdout.slice(0, 3)).toEqual([
        "No assignees found on any cards.",
        "Board: proj (proj)",
        "Total cards: 1",
      ]);
    });
  });

  describe("update", () => {
    beforeEach(seed);

    it("renames, clears and assigns in one pass", async () => {
      const prompter = h.script("PRO-001", true, "Renamed", true, true, true, "kim");

      expect(await h.run("update", "-i")).toBe(0);
      expect(prompter.asked).toEqual([
        "Select card to update:",
        "Update title?",
        "New title:",
        "Update description?",
        "Clear description?",
        "Update assignee?",
        "Add assignee:",
      ]);
      expect(h.stdout).toEqual(["Selected: Write docs", "✓ Updated PRO-001", "  Title: Renamed"]);

      const card = h.board().getCard("PRO-001");
      expect(card?.title).toBe("Renamed");
      expect(card?.description).toBeUndefined();
      expect(card?.assignee).toBe("kim");
    });

    it("keeps the current value when an edit is left blank", async () => {
      h.script("PRO-001", false, true, false, "", false);

      await h.run("update", "-i");
      expect(h.board().getCard("PRO-001")?.description).toBe("Old text");
    });

    it("saves nothing when every question is declined", async () => {
      const before = h.board().updatedAt;
      h.script("PRO-001", false, false, false);

      await h.run("update", "-i");
      expect(h.stdout).toEqual(["Selected: Write docs", "No changes made."]);
      expect(h.board().updatedAt).toBe(before);
    });
  });

  describe("delete", () => {
    beforeEach(seed);

    it("deletes the chosen card after confirmation", async () => {
      h.script("PRO-001", true);

      await h.run("delete", "-i");
      expect(h.stdout).toEqual(["✓ Deleted PRO-001"]);
      expect(h.board().cards).toEqual([]);
    });

    it("cancels without deleting", async () => {
      h.script("PRO-001", false);

      await h.run("delete", "-i");
      expect(h.stdout).toEqual(["Cancelled."]);
      expect(h.board().cards).toHaveLength(1);
    });
  });
});
