import type { Command } from "commander";
import { boardPath, withPrompter, type CliContext } from "../context.js";
import { CliError, orFail } from "../errors.js";
import { formatDeleted } from "../format.js";
import { printLines } from "../output.js";
import { confirmAndDelete, deleteWizard } from "../prompts/wizards.js";

type DeleteOptions = { force?: boolean; interactive?: boolean };

export function registerDeleteCommand(program: Command, ctx: CliContext): void {
  program
    .command("delete")
    .description("Delete a card")
    .argument("[card_id]", "Card to delete")
    .option("-f, --force", "Skip the confirmation")
    .option("-i, --interactive", "Pick the card from a list")
    .action(async (cardId: string | undefined, options: DeleteOptions, command: Command) => {
      const basePath = boardPath(ctx, command);

      if (options.interactive) {
        await withPrompter(ctx, (prompter) => deleteWizard(ctx, prompter, basePath));
        return;
      }
      if (cardId === undefined) {
        throw new CliError("A card id is required (or use --interactive)");
      }

      if (options.force) {
        orFail(ctx.cards.delete(basePath, cardId));
        printLines(ctx.output, formatDeleted(cardId));
        return;
      }

      // Fail on an unknown id before asking anything.
      orFail(ctx.cards.get(basePath, cardId));
      await withPrompter(ctx, (prompter) => confirmAndDelete(ctx, prompter, basePath, cardId));
    });
}
