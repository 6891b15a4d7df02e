import { InvalidArgumentError, type Command } from "commander";
import { DEFAULT_TICK_RATE_MS } from "@clicky/tui";
import { boardPath, type CliContext } from "../context.js";
import { CliError, orFail } from "../errors.js";

type TuiCommandOptions = { tickRate: number };

function parseTickRate(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError("Tick rate must be a positive number of milliseconds.");
  }
  return ms;
}

export function registerTuiCommand(program: Command, ctx: CliContext): void {
  program
    .command("tui")
    .description("Open the board in the terminal UI")
    .option("--tick-rate <ms>", "Redraw interval", parseTickRate, DEFAULT_TICK_RATE_MS)
    .action(async (options: TuiCommandOptions, command: Command) => {
      const basePath = boardPath(ctx, command);
      orFail(ctx.boards.load(basePath));
      if (!ctx.isInteractive()) {
        throw new CliError("The terminal UI needs an interactive terminal");
      }

      await ctx.launchTui({
        basePath,
        services: { boards: ctx.boards, cards: ctx.cards },
        tickRateMs: options.tickRate,
      });
    });
}
