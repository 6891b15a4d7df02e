import type { Command } from "commander";
import { boardPath, withPrompter, type CliContext } from "../context.js";
import { CliError, orFail } from "../errors.js";
import { formatMoved } from "../format.js";
import { printLines } from "../output.js";
import { moveWizard, requireCard } from "../prompts/wizards.js";

type MoveOptions = { interactive?: boolean };

export function registerMoveCommand(program: Command, ctx: CliContext): void {
  program
    .command("move")
    .description("Move a card to another column")
    .argument("[card_id]", "Card to move, e.g. PRO-001")
    .argument("[column]", "Target column id")
    .option("-i, --interactive", "Pick the card and column from a list")
    .action(
      async (cardId: string | undefined, columnId: string | undefined, options: MoveOptions, command: Command) => {
        const basePath = boardPath(ctx, command);

        if (options.interactive) {
          await withPrompter(ctx, (prompter) => moveWizard(ctx, prompter, basePath));
          return;
        }
        if (cardId === undefined || columnId === undefined) {
          throw new CliError("A card id and a column are required (or use --interactive)");
        }

        const board = orFail(ctx.cards.moveTo(basePath, cardId, columnId));
        printLines(ctx.output, formatMoved(board, requireCard(board, cardId)));
      }
    );
}
