/**
 * Everything a command needs, passed in rather than reached for.
 */

import { resolve } from "node:path";
import type { Command } from "commander";
import {
  BoardService,
  CardService,
  JsonBoardStore,
  PATH_ENV_VAR,
  resolveBasePath,
  startCardServer,
  type BoardStore,
} from "@clicky/board";
import { runTui, type TuiOptions } from "@clicky/tui";
import { consoleOutput, type Output } from "./output.js";
import type { Prompter } from "./prompts/Prompter.js";
import { ReadlinePrompter } from "./prompts/ReadlinePrompter.js";

export interface CliContext {
  store: BoardStore;
  boards: BoardService;
  cards: CardService;
  output: Output;
  /** Prompters hold the terminal, so each wizard opens its own */
  createPrompter: () => Prompter;
  launchTui: (options: TuiOptions) => Promise<void>;
  /** Whether stdin is a terminal the TUI can take over */
  isInteractive: () => boolean;
  startMcp: (basePath: string) => void;
  cwd: string;
  env: Record<string, string | undefined>;
}

export function createDefaultContext(): CliContext {
  const store = new JsonBoardStore();
  const boards = new BoardService(store);
  return {
    store,
    boards,
    cards: new CardService(boards),
    output: consoleOutput,
    createPrompter: () => new ReadlinePrompter(),
    launchTui: runTui,
    isInteractive: () => process.stdin.isTTY === true,
    startMcp: (basePath) => startCardServer({ path: basePath }),
    cwd: process.cwd(),
    env: process.env,
  };
}

type GlobalOptions = { path?: string };

/**
 * Board directory for a command that works on an existing board.
 */
export function boardPath(ctx: CliContext, command: Command): string {
  const { path } = command.optsWithGlobals<GlobalOptions>();
  return resolveBasePath({ path, cwd: ctx.cwd, env: ctx.env }, ctx.store);
}

/**
 * Board directory for `init`: never searches upward, a new board goes
 * exactly where it is asked for.
 */
export function initPath(ctx: CliContext, command: Command): string {
  const { path } = command.optsWithGlobals<GlobalOptions>();
  return resolve(ctx.cwd, path ?? ctx.env[PATH_ENV_VAR] ?? ".");
}

export async function withPrompter<T>(ctx: CliContext, run: (prompter: Prompter) => Promise<T>): Promise<T> {
  const prompter = ctx.createPrompter();
  try {
    return await run(prompter);
  } finally {
    prompter.close();
  }
}
