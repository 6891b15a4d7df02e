import type { Command } from "commander";
import { boardPath, withPrompter, type CliContext } from "../context.js";
import { CliError, orFail } from "../errors.js";
import { formatCreated } from "../format.js";
import { printLines } from "../output.js";
import { createWizard, requireCard } from "../prompts/wizards.js";

type CreateOptions = {
  description?: string;
  assignee?: string;
  column?: string;
  interactive?: boolean;
};

export function registerCreateCommand(program: Command, ctx: CliContext): void {
  program
    .command("create")
    .description("Create a new card")
    .argument("[title]", "Card title")
    .option("-d, --description <text>", "Card description")
    .option("-a, --assignee <name>", "Who the card is assigned to")
    .option("-c, --column <id>", "Column to create the card in (default: todo)")
    .option("-i, --interactive", "Answer questions instead of passing options")
    .action(async (title: string | undefined, options: CreateOptions, command: Command) => {
      const basePath = boardPath(ctx, command);

      if (options.interactive) {
        await withPrompter(ctx, (prompter) => createWizard(ctx, prompter, basePath));
        return;
      }
      if (title === undefined) {
        throw new CliError("A card title is required (or use --interactive)");
      }

      const created = orFail(
        ctx.cards.create(basePath, {
          title,
          description: options.description,
          assignee: options.assignee,
          columnId: options.column,
        })
      );
      printLines(ctx.output, formatCreated(requireCard(created.board, created.cardId)));
    });
}
