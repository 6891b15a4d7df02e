/**
 * Terminal UI application state and the actions keys trigger.
 *
 * The board is a read-through cache: every mutation goes to the services,
 * and on success the board is loaded again before the view moves on.
 * A failed call leaves the view where it was and sets `errorMessage`.
 */

import { FieldUpdate } from "@clicky/board";
import type { Board, BoardError, BoardService, Card, CardService, Column } from "@clicky/board";
import type { Result } from "@clicky/core";
import {
  boardView,
  cycleField,
  defaultBoardView,
  emptyForm,
  formFromCard,
  stepCard,
  stepColumn,
  stepTarget,
  toggleHelp,
  type CardFormData,
  type View,
} from "./state/view.js";

export interface TuiServices {
  boards: BoardService;
  cards: CardService;
}

export class TuiApp {
  view: View = defaultBoardView();
  board: Board | null = null;
  errorMessage: string | null = null;
  shouldQuit = false;

  constructor(
    private readonly services: TuiServices,
    readonly basePath: string
  ) {}

  /**
   * Load the board from the store. Returns false and records the error
   * if it could not be loaded.
   */
  reload(): boolean {
    const loaded = this.services.boards.load(this.basePath);
    if (!loaded.ok) {
      this.errorMessage = loaded.error.message;
      return false;
    }
    this.board = loaded.value;
    return true;
  }

  clearError(): void {
    this.errorMessage = null;
  }

  quit(): void {
    this.shouldQuit = true;
  }

  toggleHelp(): void {
    this.view = toggleHelp(this.view);
  }

  columns(): readonly Column[] {
    return this.board?.columns ?? [];
  }

  /** Cards of the column at `index`, in display order. */
  cardsAt(index: number): Card[] {
    const column = this.columns()[index];
    if (!this.board || !column) return [];
    return this.board.cardsInColumnOrder(column.id);
  }

  // Board view

  moveColumn(delta: -1 | 1): void {
    const view = this.view;
    if (view.kind !== "board") return;

    if (view.selection.kind === "selected") {
      this.quickMove(view.selection.cardId, delta);
      return;
    }
    this.view = stepColumn(view, delta, this.columns().length);
  }

  moveCursor(delta: -1 | 1): void {
    const view = this.view;
    if (view.kind !== "board") return;

    if (view.selection.kind === "selected") {
      this.reorder(view.selection.cardId, delta);
      return;
    }
    this.view = stepCard(view, delta, this.cardsAt(view.selectedColumn).length);
  }

  /**
   * Enter on the board: highlight the first card, confirm the highlighted
   * one, or open the confirmed one.
   */
  confirm(): void {
    const view = this.view;
    if (view.kind !== "board") return;

    const { selection, selectedColumn } = view;
    switch (selection.kind) {
      case "none":
        this.view = stepCard(view, 1, this.cardsAt(selectedColumn).length);
        return;
      case "highlighted": {
        const card = this.cardsAt(selectedColumn)[selection.cardIndex];
        if (card) {
          this.view = boardView(selectedColumn, { kind: "selected", cardId: card.id });
        }
        return;
      }
      case "selected":
        if (this.board?.getCard(selection.cardId)) {
          this.view = { kind: "cardDetail", cardId: selection.cardId };
        }
        return;
    }
  }

  /**
   * Esc on the board: selected falls back to highlighted, highlighted to none.
   */
  back(): void {
    const view = this.view;
    if (view.kind !== "board") return;

    const { selection, selectedColumn } = view;
    if (selection.kind === "selected") {
      const cardIndex = this.cardsAt(selectedColumn).findIndex((c) => c.id === selection.cardId);
      this.view =
        cardIndex === -1
          ? boardView(selectedColumn)
          : boardView(selectedColumn, { kind: "highlighted", column: selectedColumn, cardIndex });
    } else if (selection.kind === "highlighted") {
      this.view = boardView(selectedColumn);
    }
  }

  openCreateForm(): void {
    const view = this.view;
    if (view.kind !== "board") return;

    const column = this.columns()[view.selectedColumn];
    if (!column) return;
    this.view = { kind: "cardForm", mode: { kind: "create", columnId: column.id }, form: emptyForm() };
  }

  /**
   * Move the selected card to the neighbouring column and follow it there.
   */
  private quickMove(cardId: string, delta: -1 | 1): void {
    const card = this.board?.getCard(cardId);
    if (!this.board || !card) return;

    const target = this.board.columnIndex(card.columnId) + delta;
    const column = this.columns()[target];
    if (!column) return;

    this.commit(this.services.cards.moveTo(this.basePath, cardId, column.id), () =>
      boardView(target, { kind: "selected", cardId })
    );
  }

  private reorder(cardId: string, delta: -1 | 1): void {
    const result = this.services.boards.reorderCardInColumn(this.basePath, cardId, delta < 0 ? "up" : "down");
    if (!result.ok && result.error.kind === "edge_of_sequence") return;
    this.commit(result, () => this.view);
  }

  // Card detail

  startEdit(): void {
    const view = this.view;
    if (view.kind !== "cardDetail") return;

    const card = this.board?.getCard(view.cardId);
    if (!card) {
      this.errorMessage = `Card not found: ${view.cardId}`;
      return;
    }
    this.view = { kind: "cardForm", mode: { kind: "edit", cardId: card.id }, form: formFromCard(card) };
  }

  startDelete(): void {
    const view = this.view;
    if (view.kind !== "cardDetail") return;
    this.view = { kind: "confirmDelete", cardId: view.cardId };
  }

  startMove(): void {
    const view = this.view;
    if (view.kind !== "cardDetail") return;

    const card = this.board?.getCard(view.cardId);
    if (!this.board || !card) {
      this.errorMessage = `Card not found: ${view.cardId}`;
      return;
    }
    this.view = {
      kind: "moveCard",
      cardId: card.id,
      targetColumnIndex: Math.max(this.board.columnIndex(card.columnId), 0),
    };
  }

  /**
   * Leave the detail view for the card's column, with nothing selected.
   */
  closeDetail(): void {
    const view = this.view;
    if (view.kind !== "cardDetail") return;

    const card = this.board?.getCard(view.cardId);
    const index = card && this.board ? this.board.columnIndex(card.columnId) : 0;
    this.view = boardView(Math.max(index, 0));
  }

  // Card form

  nextField(): void {
    this.updateForm((form) => ({ ...form, currentField: cycleField(form.currentField, 1) }));
  }

  previousField(): void {
    this.updateForm((form) => ({ ...form, currentField: cycleField(form.currentField, -1) }));
  }

  /**
   * Append to the focused field. In normal mode this also starts editing,
   * so the first key is not lost.
   */
  typeChar(char: string): void {
    this.updateForm((form) => withFieldValue({ ...form, inputMode: "editing" }, fieldValue(form) + char));
  }

  backspace(): void {
    this.updateForm((form) => withFieldValue(form, Array.from(fieldValue(form)).slice(0, -1).join("")));
  }

  /** Enter while editing: done with this field, on to the next. */
  finishEditing(): void {
    this.updateForm((form) => ({
      ...form,
      currentField: cycleField(form.currentField, 1),
      inputMode: "normal",
    }));
  }

  stopEditing(): void {
    this.updateForm((form) => ({ ...form, inputMode: "normal" }));
  }

  submitForm(): void {
    const view = this.view;
    if (view.kind !== "cardForm") return;

    const { form, mode } = view;
    const title = form.title.trim();
    if (title === "") {
      this.errorMessage = "Title is required";
      return;
    }

    if (mode.kind === "create") {
      const result = this.services.cards.create(this.basePath, {
        title,
        description: optionalText(form.description),
        assignee: optionalText(form.assignee),
        columnId: mode.columnId,
      });
      this.commit(result, defaultBoardView);
    } else {
      const result = this.services.cards.update(this.basePath, mode.cardId, {
        title,
        description: textUpdate(form.description),
        assignee: textUpdate(form.assignee),
      });
      this.commit(result, defaultBoardView);
    }
  }

  cancelForm(): void {
    const view = this.view;
    if (view.kind !== "cardForm") return;

    const { mode } = view;
    if (mode.kind === "create") {
      this.view = boardView(Math.max(this.board?.columnIndex(mode.columnId) ?? 0, 0));
    } else {
      this.view = { kind: "cardDetail", cardId: mode.cardId };
    }
  }

  // Move dialog

  stepMoveTarget(delta: -1 | 1): void {
    const view = this.view;
    if (view.kind !== "moveCard") return;
    this.view = stepTarget(view, delta, this.columns().length);
  }

  confirmMove(): void {
    const view = this.view;
    if (view.kind !== "moveCard") return;

    const column = this.columns()[view.targetColumnIndex];
    if (!column) return;

    this.commit(this.services.cards.moveTo(this.basePath, view.cardId, column.id), () => ({
      kind: "cardDetail",
      cardId: view.cardId,
    }));
  }

  cancelMove(): void {
    const view = this.view;
    if (view.kind !== "moveCard") return;
    this.view = { kind: "cardDetail", cardId: view.cardId };
  }

  // Delete confirmation

  confirmDelete(): void {
    const view = this.view;
    if (view.kind !== "confirmDelete") return;
    this.commit(this.services.cards.delete(this.basePath, view.cardId), defaultBoardView);
  }

  cancelDelete(): void {
    const view = this.view;
    if (view.kind !== "confirmDelete") return;
    this.view = { kind: "cardDetail", cardId: view.cardId };
  }

  private updateForm(change: (form: CardFormData) => CardFormData): void {
    const view = this.view;
    if (view.kind !== "cardForm") return;
    this.view = { ...view, form: change(view.form) };
  }

  /**
   * Apply a service result: on failure keep the view and show the error,
   * on success reload and move to the next view.
   */
  private commit<T>(result: Result<T, BoardError>, next: () => View): void {
    if (!result.ok) {
      this.errorMessage = result.error.message;
      return;
    }
    this.reload();
    this.view = next();
  }
}

function fieldValue(form: CardFormData): string {
  return form[form.currentField];
}

function withFieldValue(form: CardFormData, value: string): CardFormData {
  switch (form.currentField) {
    case "title":
      return { ...form, title: value };
    case "description":
      return { ...form, description: value };
    case "assignee":
      return { ...form, assignee: value };
  }
}

function optionalText(value: string): string | undefined {
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

/** A blank form field clears the card's value. */
function textUpdate(value: string): FieldUpdate<string> {
  const trimmed = value.trim();
  return trimmed === "" ? FieldUpdate.clear() : FieldUpdate.set(trimmed);
}
