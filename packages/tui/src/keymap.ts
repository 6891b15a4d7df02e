/**
 * Key bindings per view.
 */

import type { TuiApp } from "./App.js";
import type { KeyPress } from "./events.js";
import type { View } from "./state/view.js";

type KeyHandler = (app: TuiApp, key: KeyPress) => void;
type KeyBindings = Record<string, KeyHandler>;

const WILDCARD = "*";

const left: KeyHandler = (app) => app.moveColumn(-1);
const right: KeyHandler = (app) => app.moveColumn(1);
const up: KeyHandler = (app) => app.moveCursor(-1);
const down: KeyHandler = (app) => app.moveCursor(1);
const help: KeyHandler = (app) => app.toggleHelp();

const type: KeyHandler = (app, key) => {
  if (key.char) app.typeChar(key.char);
};

const boardBindings: KeyBindings = {
  left,
  h: left,
  right,
  l: right,
  up,
  k: up,
  down,
  j: down,
  return: (app) => app.confirm(),
  enter: (app) => app.confirm(),
  escape: (app) => app.back(),
  c: (app) => app.openCreateForm(),
  r: (app) => {
    app.reload();
  },
  "?": help,
  q: (app) => app.quit(),
};

const cardDetailBindings: KeyBindings = {
  e: (app) => app.startEdit(),
  d: (app) => app.startDelete(),
  m: (app) => app.startMove(),
  escape: (app) => app.closeDetail(),
  q: (app) => app.closeDetail(),
  "?": help,
};

const formNormalBindings: KeyBindings = {
  up: (app) => app.previousField(),
  k: (app) => app.previousField(),
  down: (app) => app.nextField(),
  j: (app) => app.nextField(),
  tab: (app) => app.nextField(),
  return: (app) => app.submitForm(),
  enter: (app) => app.submitForm(),
  escape: (app) => app.cancelForm(),
  "?": help,
  [WILDCARD]: type,
};

const formEditingBindings: KeyBindings = {
  return: (app) => app.finishEditing(),
  enter: (app) => app.finishEditing(),
  escape: (app) => app.stopEditing(),
  backspace: (app) => app.backspace(),
  [WILDCARD]: type,
};

const moveCardBindings: KeyBindings = {
  left: (app) => app.stepMoveTarget(-1),
  h: (app) => app.stepMoveTarget(-1),
  right: (app) => app.stepMoveTarget(1),
  l: (app) => app.stepMoveTarget(1),
  return: (app) => app.confirmMove(),
  enter: (app) => app.confirmMove(),
  escape: (app) => app.cancelMove(),
  "?": help,
};

const confirmDeleteBindings: KeyBindings = {
  y: (app) => app.confirmDelete(),
  Y: (app) => app.confirmDelete(),
  n: (app) => app.cancelDelete(),
  N: (app) => app.cancelDelete(),
  escape: (app) => app.cancelDelete(),
  "?": help,
};

const helpBindings: KeyBindings = {
  "?": help,
  escape: help,
  q: help,
};

function bindingsFor(view: View): KeyBindings {
  switch (view.kind) {
    case "board":
      return boardBindings;
    case "cardDetail":
      return cardDetailBindings;
    case "cardForm":
      return view.form.inputMode === "editing" ? formEditingBindings : formNormalBindings;
    case "moveCard":
      return moveCardBindings;
    case "confirmDelete":
      return confirmDeleteBindings;
    case "help":
      return helpBindings;
  }
}

/**
 * Handle one key press. The previous error message is cleared first;
 * Ctrl+C quits from anywhere and other control chords are ignored.
 */
export function handleKeypress(app: TuiApp, key: KeyPress): void {
  app.clearError();

  if (key.ctrl) {
    if (key.name === "c") app.quit();
    return;
  }

  const bindings = bindingsFor(app.view);
  const handler = bindings[key.name] ?? bindings[WILDCARD];
  handler?.(app, key);
}
