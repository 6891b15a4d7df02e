import { Argument, type Command } from "commander";
import type { MoveDirection } from "@clicky/board";
import { boardPath, type CliContext } from "../context.js";
import { CliError, orFail } from "../errors.js";
import { requireCard } from "../prompts/wizards.js";

const DIRECTIONS: readonly MoveDirection[] = ["up", "down"];

function toDirection(value: string): MoveDirection {
  const direction = DIRECTIONS.find((d) => d === value);
  if (direction === undefined) {
    throw new CliError(`Unknown direction: ${value}`);
  }
  return direction;
}

export function registerReorderCommand(program: Command, ctx: CliContext): void {
  program
    .command("reorder")
    .description("Move a card one place up or down within its column")
    .argument("<card_id>", "Card to move")
    .addArgument(new Argument("<direction>", "Which way").choices(DIRECTIONS))
    .action((cardId: string, direction: string, _options: unknown, command: Command) => {
      const basePath = boardPath(ctx, command);
      const dir = toDirection(direction);

      const board = orFail(ctx.boards.reorderCardInColumn(basePath, cardId, dir));
      const card = requireCard(board, cardId);
      ctx.output.log(`✓ Moved ${card.id} ${dir} in ${board.getColumn(card.columnId)?.name ?? card.columnId}`);
    });
}
