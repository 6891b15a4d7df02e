import { InvalidArgumentError, type Command } from "commander";
import { boardPath, type CliContext } from "../context.js";
import { orFail } from "../errors.js";

type AddOptions = { order?: number };

function parseOrder(value: string): number {
  const order = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(order)) {
    throw new InvalidArgumentError("Order must be a non-negative integer.");
  }
  return order;
}

export function registerColumnCommand(program: Command, ctx: CliContext): void {
  const column = program.command("column").description("Add or remove board columns");

  column
    .command("add")
    .description("Add a column")
    .argument("<id>", "Column id, e.g. review")
    .argument("<name>", "Display name")
    .option("-o, --order <n>", "Sort position (default: after the last column)", parseOrder)
    .action((id: string, name: string, options: AddOptions, command: Command) => {
      const board = orFail(ctx.boards.addColumn(boardPath(ctx, command), id, name, options.order));
      const added = board.getColumn(id.trim());
      ctx.output.log(`✓ Added column ${added?.name ?? name} (${id.trim()})`);
      ctx.output.log(`  Columns: ${board.columns.map((c) => c.name).join(", ")}`);
    });

  column
    .command("remove")
    .description("Remove a column; its cards move to the first remaining column")
    .argument("<id>", "Column id")
    .action((id: string, _options: unknown, command: Command) => {
      const basePath = boardPath(ctx, command);
      const moving = orFail(ctx.boards.load(basePath)).getColumn(id)?.cardCount() ?? 0;

      const board = orFail(ctx.boards.removeColumn(basePath, id));
      ctx.output.log(`✓ Removed column ${id}`);
      if (moving > 0) {
        ctx.output.log(`  Moved ${moving} ${moving === 1 ? "card" : "cards"} to ${board.columns[0].name}`);
      }
    });
}
