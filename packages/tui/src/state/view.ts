/**
 * View state for the terminal UI.
 *
 * Exactly one view is active at a time. Anything the view needs travels
 * inside its variant, so a form can't exist without the card it edits
 * and a selection can't outlive the board view it belongs to.
 */

export type CardSelection =
  | { kind: "none" }
  | { kind: "highlighted"; column: number; cardIndex: number }
  | { kind: "selected"; cardId: string };

export type FormField = "title" | "description" | "assignee";

export type InputMode = "normal" | "editing";

export interface CardFormData {
  title: string;
  description: string;
  assignee: string;
  currentField: FormField;
  inputMode: InputMode;
}

export type FormMode =
  | { kind: "create"; columnId: string }
  | { kind: "edit"; cardId: string };

export type BoardView = {
  kind: "board";
  selectedColumn: number;
  selection: CardSelection;
};

export type CardDetailView = { kind: "cardDetail"; cardId: string };

export type CardFormView = { kind: "cardForm"; mode: FormMode; form: CardFormData };

export type MoveCardView = { kind: "moveCard"; cardId: string; targetColumnIndex: number };

export type ConfirmDeleteView = { kind: "confirmDelete"; cardId: string };

export type HelpView = { kind: "help"; previous: View };

export type View =
  | BoardView
  | CardDetailView
  | CardFormView
  | MoveCardView
  | ConfirmDeleteView
  | HelpView;

export type ViewKind = View["kind"];

const FIELD_ORDER: readonly FormField[] = ["title", "description", "assignee"];

export function defaultBoardView(): BoardView {
  return boardView(0);
}

export function boardView(selectedColumn: number, selection: CardSelection = { kind: "none" }): BoardView {
  return { kind: "board", selectedColumn, selection };
}

export function emptyForm(): CardFormData {
  return { title: "", description: "", assignee: "", currentField: "title", inputMode: "normal" };
}

export function formFromCard(card: { title: string; description?: string; assignee?: string }): CardFormData {
  return {
    ...emptyForm(),
    title: card.title,
    description: card.description ?? "",
    assignee: card.assignee ?? "",
  };
}

/**
 * Title -> Description -> Assignee -> Title, and back.
 */
export function cycleField(field: FormField, step: 1 | -1): FormField {
  const index = FIELD_ORDER.indexOf(field);
  const next = (index + step + FIELD_ORDER.length) % FIELD_ORDER.length;
  return FIELD_ORDER[next] ?? "title";
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Step to a neighbouring column. Highlighting never survives a column
 * change; a confirmed selection is handled by quick move instead.
 */
export function stepColumn(view: BoardView, delta: number, columnCount: number): BoardView {
  const selectedColumn = clamp(view.selectedColumn + delta, 0, Math.max(columnCount - 1, 0));
  if (selectedColumn === view.selectedColumn) return view;
  return boardView(selectedColumn);
}

/**
 * Move the highlight up or down the current column.
 * With nothing highlighted, down starts at the top and up at the bottom.
 */
export function stepCard(view: BoardView, delta: number, cardCount: number): BoardView {
  const { selection, selectedColumn } = view;
  if (cardCount === 0) return view;

  if (selection.kind === "none") {
    const cardIndex = delta > 0 ? 0 : cardCount - 1;
    return boardView(selectedColumn, { kind: "highlighted", column: selectedColumn, cardIndex });
  }

  if (selection.kind === "highlighted") {
    const cardIndex = clamp(selection.cardIndex + delta, 0, cardCount - 1);
    return boardView(selectedColumn, { ...selection, cardIndex });
  }

  return view;
}

/**
 * Keep a stored target column inside the board.
 */
export function stepTarget(view: MoveCardView, delta: number, columnCount: number): MoveCardView {
  const targetColumnIndex = clamp(view.targetColumnIndex + delta, 0, Math.max(columnCount - 1, 0));
  return { ...view, targetColumnIndex };
}

/**
 * Help toggles: opening it from help closes it again.
 */
export function toggleHelp(view: View): View {
  return view.kind === "help" ? view.previous : { kind: "help", previous: view };
}
