/**
 * Terminal UI for clicky boards.
 */

export { TuiApp } from "./App.js";
export type { TuiServices } from "./App.js";
export {
  boardView,
  defaultBoardView,
  emptyForm,
  formFromCard,
  cycleField,
  stepCard,
  stepColumn,
  stepTarget,
  toggleHelp,
} from "./state/view.js";
export type {
  View,
  ViewKind,
  BoardView,
  CardSelection,
  CardFormData,
  CardFormView,
  FormField,
  FormMode,
  InputMode,
} from "./state/view.js";
export { handleKeypress } from "./keymap.js";
export { EventQueue, startEventSource, toKeyPress } from "./events.js";
export type { AppEvent, KeyPress, RawKey } from "./events.js";
export { render, footerHint, truncate, visibleWidth } from "./render.js";
export type { AppSnapshot, ScreenSize } from "./render.js";
export { runTui, DEFAULT_TICK_RATE_MS } from "./run.js";
export type { TuiOptions } from "./run.js";
