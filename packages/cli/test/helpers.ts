import { BoardService, CardService, InMemoryBoardStore, type Board } from "@clicky/board";
import type { TuiOptions } from "@clicky/tui";
import type { CliContext } from "../src/context.js";
import type { Choice, Prompter, TextOptions } from "../src/prompts/Prompter.js";
import { runCli } from "../src/program.js";

/**
 * Prompter that answers from a script. Text answers are strings, confirm
 * answers are booleans, and a select answer is the start of a choice label.
 */
export class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];
  closed = false;

  constructor(private readonly answers: (string | boolean)[]) {}

  private next(message: string): string | boolean {
    this.asked.push(message);
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`No scripted answer for: ${message}`);
    }
    return answer;
  }

  async text(message: string, options: TextOptions = {}): Promise<string> {
    const answer = this.next(message);
    if (typeof answer !== "string") {
      throw new Error(`Expected a text answer for: ${message}`);
    }
    return answer || options.default || "";
  }

  async select<T>(message: string, choices: readonly Choice<T>[]): Promise<T> {
    const answer = this.next(message);
    const choice = choices.find((c) => typeof answer === "string" && c.label.startsWith(answer));
    if (!choice) {
      throw new Error(`No choice matching ${String(answer)} for: ${message}`);
    }
    return choice.value;
  }

  async confirm(message: string): Promise<boolean> {
    const answer = this.next(message);
    if (typeof answer !== "boolean") {
      throw new Error(`Expected a yes/no answer for: ${message}`);
    }
    return answer;
  }

  close(): void {
    this.closed = true;
  }

  get remaining(): number {
    return this.answers.length;
  }
}

export interface Harness {
  ctx: CliContext;
  store: InMemoryBoardStore;
  boards: BoardService;
  cards: CardService;
  stdout: string[];
  stderr: string[];
  prompters: ScriptedPrompter[];
  tuiRuns: TuiOptions[];
  mcpPaths: string[];
  /** Flip to false to run commands as if stdin were piped */
  interactive: boolean;
  /** Queue answers for the next prompter a command opens */
  script(...answers: (string | boolean)[]): ScriptedPrompter;
  run(...argv: string[]): Promise<number>;
  board(path?: string): Board;
}

export function createHarness(cwd: string): Harness {
  const store = new InMemoryBoardStore();
  const boards = new BoardService(store);
  const cards = new CardService(boards);
  const stdout: string[] = [];
  const stderr: string[] = [];
  const prompters: ScriptedPrompter[] = [];
  const pending: ScriptedPrompter[] = [];
  const tuiRuns: TuiOptions[] = [];
  const mcpPaths: string[] = [];

  const ctx: CliContext = {
    store,
    boards,
    cards,
    output: {
      log: (line) => stdout.push(line),
      error: (line) => stderr.push(line),
    },
    createPrompter: () => {
      const prompter = pending.shift() ?? new ScriptedPrompter([]);
      prompters.push(prompter);
      return prompter;
    },
    launchTui: async (options) => {
      tuiRuns.push(options);
    },
    isInteractive: () => harness.interactive,
    startMcp: (basePath) => {
      mcpPaths.push(basePath);
    },
    cwd,
    env: {},
  };

  const harness: Harness = {
    ctx,
    store,
    boards,
    cards,
    stdout,
    stderr,
    prompters,
    tuiRuns,
    mcpPaths,
    interactive: true,
    script: (...answers) => {
      const prompter = new ScriptedPrompter(answers);
      pending.push(prompter);
      return prompter;
    },
    run: (...argv) => runCli(argv, ctx),
    board: (path = cwd) => {
      const loaded = boards.load(path);
      if (!loaded.ok) throw new Error(loaded.error.message);
      return loaded.value;
    },
  };
  return harness;
}
