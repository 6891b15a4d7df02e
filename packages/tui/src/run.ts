/**
 * Terminal runner: alternate screen, raw keyboard, redraw after every event.
 */

import { TuiApp, type TuiServices } from "./App.js";
import { EventQueue, startEventSource } from "./events.js";
import { handleKeypress } from "./keymap.js";
import { render } from "./render.js";

const ENTER_ALT_SCREEN = "\x1b[?1049h";
const LEAVE_ALT_SCREEN = "\x1b[?1049l";
const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";
const CLEAR_SCREEN = "\x1b[2J\x1b[H";

export const DEFAULT_TICK_RATE_MS = 250;

export interface TuiOptions {
  basePath: string;
  services: TuiServices;
  /** Redraw interval when no keys arrive */
  tickRateMs?: number;
  input?: NodeJS.ReadStream;
  output?: NodeJS.WriteStream;
}

/**
 * Run the board UI until the user quits.
 */
export async function runTui(options: TuiOptions): Promise<void> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;

  if (!input.isTTY) {
    throw new Error("The terminal UI needs an interactive terminal");
  }

  const app = new TuiApp(options.services, options.basePath);
  app.reload();

  const draw = (): void => {
    const rows = output.rows ?? 24;
    const lines = render(app, { columns: output.columns ?? 80, rows }).slice(0, rows);
    const editing = app.view.kind === "cardForm" && app.view.form.inputMode === "editing";
    output.write(CLEAR_SCREEN + lines.join("\r\n") + (editing ? SHOW_CURSOR : HIDE_CURSOR));
  };

  const queue = new EventQueue();
  output.write(ENTER_ALT_SCREEN + HIDE_CURSOR);
  input.setRawMode(true);
  input.resume();
  const stop = startEventSource(queue, {
    input,
    tickRateMs: options.tickRateMs ?? DEFAULT_TICK_RATE_MS,
  });

  try {
    draw();
    for (;;) {
      const event = await queue.next();
      if (event === null) break;

      if (event.kind === "key") {
        handleKeypress(app, event.key);
      }
      if (app.shouldQuit) break;
      draw();
    }
  } finally {
    stop();
    queue.close();
    input.setRawMode(false);
    input.pause();
    output.write(SHOW_CURSOR + LEAVE_ALT_SCREEN);
  }
}
