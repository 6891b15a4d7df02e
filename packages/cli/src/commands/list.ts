import type { Command } from "commander";
import { boardPath, withPrompter, type CliContext } from "../context.js";
import { orFail } from "../errors.js";
import { formatListing } from "../format.js";
import { printLines } from "../output.js";
import { listWizard } from "../prompts/wizards.js";

type ListOptions = { column?: string; assignee?: string; interactive?: boolean };

export function registerListCommand(program: Command, ctx: CliContext): void {
  program
    .command("list")
    .description("List cards column by column")
    .option("-c, --column <id>", "Only this column")
    .option("-a, --assignee <name>", "Only cards assigned to this person")
    .option("-i, --interactive", "Choose filters from a list")
    .action(async (options: ListOptions, command: Command) => {
      const basePath = boardPath(ctx, command);

      if (options.interactive) {
        await withPrompter(ctx, (prompter) => listWizard(ctx, prompter, basePath));
        return;
      }

      const listing = orFail(ctx.cards.list(basePath, { columnId: options.column, assignee: options.assignee }));
      printLines(ctx.output, formatListing(listing));
    });
}
