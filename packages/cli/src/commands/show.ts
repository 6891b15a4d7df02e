import type { Command } from "commander";
import { boardPath, withPrompter, type CliContext } from "../context.js";
import { CliError, orFail } from "../errors.js";
import { formatCard } from "../format.js";
import { printLines } from "../output.js";
import { showWizard } from "../prompts/wizards.js";

type ShowOptions = { interactive?: boolean };

export function registerShowCommand(program: Command, ctx: CliContext): void {
  program
    .command("show")
    .description("Show one card")
    .argument("[card_id]", "Card to show")
    .option("-i, --interactive", "Pick the card from a list")
    .action(async (cardId: string | undefined, options: ShowOptions, command: Command) => {
      const basePath = boardPath(ctx, command);

      if (options.interactive) {
        await withPrompter(ctx, (prompter) => showWizard(ctx, prompter, basePath));
        return;
      }
      if (cardId === undefined) {
        throw new CliError("A card id is required (or use --interactive)");
      }

      const { board, card } = orFail(ctx.cards.get(basePath, cardId));
      printLines(ctx.output, formatCard(board, card));
    });
}
