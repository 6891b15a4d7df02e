import type { Command } from "commander";
import { boardPath, type CliContext } from "../context.js";
import { orFail } from "../errors.js";
import { formatInfo } from "../format.js";
import { printLines } from "../output.js";

export function registerInfoCommand(program: Command, ctx: CliContext): void {
  program
    .command("info")
    .description("Show board details and card counts")
    .action((_options: unknown, command: Command) => {
      const board = orFail(ctx.boards.load(boardPath(ctx, command)));
      printLines(ctx.output, formatInfo(board));
    });
}
