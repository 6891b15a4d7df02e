import { Option, type Command } from "commander";
import { FieldUpdate } from "@clicky/board";
import { boardPath, withPrompter, type CliContext } from "../context.js";
import { CliError, orFail } from "../errors.js";
import { formatUpdated } from "../format.js";
import { printLines } from "../output.js";
import { requireCard, updateWizard } from "../prompts/wizards.js";

type UpdateOptions = {
  title?: string;
  description?: string;
  clearDescription?: boolean;
  assignee?: string;
  clearAssignee?: boolean;
  interactive?: boolean;
};

function fieldUpdate(value: string | undefined, clear: boolean | undefined): FieldUpdate<string> {
  if (clear) return FieldUpdate.clear();
  if (value !== undefined) return FieldUpdate.set(value);
  return FieldUpdate.leave();
}

export function registerUpdateCommand(program: Command, ctx: CliContext): void {
  program
    .command("update")
    .description("Change a card's title, description or assignee")
    .argument("[card_id]", "Card to update")
    .option("-t, --title <title>", "New title")
    .option("-d, --description <text>", "New description")
    .addOption(new Option("--clear-description", "Remove the description").conflicts("description"))
    .option("-a, --assignee <name>", "New assignee")
    .addOption(new Option("--clear-assignee", "Remove the assignee").conflicts("assignee"))
    .option("-i, --interactive", "Answer questions instead of passing options")
    .action(async (cardId: string | undefined, options: UpdateOptions, command: Command) => {
      const basePath = boardPath(ctx, command);

      if (options.interactive) {
        await withPrompter(ctx, (prompter) => updateWizard(ctx, prompter, basePath));
        return;
      }
      if (cardId === undefined) {
        throw new CliError("A card id is required (or use --interactive)");
      }

      const description = fieldUpdate(options.description, options.clearDescription);
      const assignee = fieldUpdate(options.assignee, options.clearAssignee);
      if (options.title === undefined && description.kind === "leave" && assignee.kind === "leave") {
        throw new CliError("Nothing to update");
      }

      const board = orFail(ctx.cards.update(basePath, cardId, { title: options.title, description, assignee }));
      printLines(ctx.output, formatUpdated(requireCard(board, cardId)));
    });
}
