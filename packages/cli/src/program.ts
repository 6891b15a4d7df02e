/**
 * The clicky command-line program.
 */

import { Command, CommanderError } from "commander";
import type { CliContext } from "./context.js";
import { CliError } from "./errors.js";
import { registerColumnCommand } from "./commands/column.js";
import { registerCreateCommand } from "./commands/create.js";
import { registerDeleteCommand } from "./commands/delete.js";
import { registerInfoCommand } from "./commands/info.js";
import { registerInitCommand } from "./commands/init.js";
import { registerListCommand } from "./commands/list.js";
import { registerMcpCommand } from "./commands/mcp.js";
import { registerMoveCommand } from "./commands/move.js";
import { registerReorderCommand } from "./commands/reorder.js";
import { registerShowCommand } from "./commands/show.js";
import { registerTuiCommand } from "./commands/tui.js";
import { registerUpdateCommand } from "./commands/update.js";

export const VERSION = "0.1.0";

export function createProgram(ctx: CliContext): Command {
  const program = new Command();

  // Settings before subcommands: .command() copies them onto each child.
  program
    .name("clicky")
    .description("A kanban board that lives in your project directory")
    .version(VERSION)
    .option("-p, --path <dir>", "Board directory (default: nearest board above the working directory)")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => ctx.output.log(text.trimEnd()),
      writeErr: (text) => ctx.output.error(text.trimEnd()),
    });

  registerInitCommand(program, ctx);
  registerCreateCommand(program, ctx);
  registerMoveCommand(program, ctx);
  registerShowCommand(program, ctx);
  registerListCommand(program, ctx);
  registerUpdateCommand(program, ctx);
  registerDeleteCommand(program, ctx);
  registerInfoCommand(program, ctx);
  registerReorderCommand(program, ctx);
  registerColumnCommand(program, ctx);
  registerTuiCommand(program, ctx);
  registerMcpCommand(program, ctx);

  return program;
}

/**
 * Run one command line (without the node and script entries) and return
 * the exit code. Errors the user can act on are printed, anything else
 * is rethrown.
 */
export async function runCli(argv: readonly string[], ctx: CliContext): Promise<number> {
  const program = createProgram(ctx);

  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof CliError) {
      ctx.output.error(`Error: ${error.message}`);
      return 1;
    }
    throw error;
  }
}

export { createDefaultContext } from "./context.js";
export type { CliContext } from "./context.js";
export { CliError, orFail } from "./errors.js";
export type { Output } from "./output.js";
export type { Prompter, Choice, TextOptions } from "./prompts/Prompter.js";
export { ReadlinePrompter } from "./prompts/ReadlinePrompter.js";
