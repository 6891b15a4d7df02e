import type { Command } from "commander";
import { initPath, withPrompter, type CliContext } from "../context.js";
import { orFail } from "../errors.js";
import { formatInitialized } from "../format.js";
import { printLines } from "../output.js";
import { initWizard } from "../prompts/wizards.js";

type InitOptions = { name?: string; interactive?: boolean };

export function registerInitCommand(program: Command, ctx: CliContext): void {
  program
    .command("init")
    .description("Initialize a new board in the current directory")
    .option("-n, --name <name>", "Board name (defaults to the directory name)")
    .option("-i, --interactive", "Answer questions instead of passing options")
    .action(async (options: InitOptions, command: Command) => {
      const basePath = initPath(ctx, command);

      if (options.interactive) {
        await withPrompter(ctx, (prompter) => initWizard(ctx, prompter, basePath));
        return;
      }

      const board = orFail(ctx.boards.initialize(basePath, options.name));
      printLines(ctx.output, formatInitialized(board, basePath));
    });
}
