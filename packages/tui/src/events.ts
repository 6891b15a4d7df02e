/**
 * Input events for the terminal UI.
 *
 * Key presses and timer ticks go into one queue; the main loop takes
 * them out one at a time and finishes each before the next.
 */

import { emitKeypressEvents } from "node:readline";

export interface KeyPress {
  /** Key name ("up", "return", "escape") or the typed character itself */
  name: string;
  /** The printable character, when the key produces one */
  char?: string;
  ctrl: boolean;
}

export type AppEvent = { kind: "key"; key: KeyPress } | { kind: "tick" };

/**
 * Shape of the key object node:readline passes to "keypress" listeners.
 */
export interface RawKey {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
  shift?: boolean;
}

function isPrintable(sequence: string): boolean {
  const chars = Array.from(sequence);
  if (chars.length !== 1) return false;
  const code = sequence.codePointAt(0) ?? 0;
  return code >= 0x20 && code !== 0x7f;
}

/**
 * Normalize a readline key event. Printable keys are named by the
 * character they produce, so "J" and "j" stay distinct.
 */
export function toKeyPress(input: string | undefined, key: RawKey | undefined): KeyPress | null {
  const sequence = key?.sequence ?? input ?? "";
  const ctrl = key?.ctrl ?? false;

  if (!ctrl && !key?.meta && isPrintable(sequence)) {
    return { name: sequence, char: sequence, ctrl };
  }
  const name = key?.name;
  return name ? { name, ctrl } : null;
}

export class EventQueue {
  private readonly pending: AppEvent[] = [];
  private waiting: ((event: AppEvent | null) => void) | null = null;
  private closed = false;

  push(event: AppEvent): void {
    if (this.closed) return;

    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting(event);
      return;
    }
    this.pending.push(event);
  }

  /**
   * Next event, waiting for one if the queue is empty.
   * Resolves to null once the queue is closed and drained.
   */
  next(): Promise<AppEvent | null> {
    const event = this.pending.shift();
    if (event) return Promise.resolve(event);
    if (this.closed) return Promise.resolve(null);

    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  close(): void {
    this.closed = true;
    const waiting = this.waiting;
    this.waiting = null;
    waiting?.(null);
  }

  get size(): number {
    return this.pending.length;
  }
}

export interface EventSourceOptions {
  input: NodeJS.ReadStream;
  tickRateMs: number;
}

/**
 * Feed key presses from `input` and a tick every `tickRateMs` into the queue.
 * Returns a function that stops both.
 */
export function startEventSource(queue: EventQueue, options: EventSourceOptions): () => void {
  const { input, tickRateMs } = options;
  emitKeypressEvents(input);

  const onKeypress = (str: string | undefined, key: RawKey | undefined): void => {
    const press = toKeyPress(str, key);
    if (press) queue.push({ kind: "key", key: press });
  };
  input.on("keypress", onKeypress);

  const timer = setInterval(() => queue.push({ kind: "tick" }), tickRateMs);

  return () => {
    clearInterval(timer);
    input.off("keypress", onKeypress);
  };
}
