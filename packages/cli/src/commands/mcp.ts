import type { Command } from "commander";
import { boardPath, type CliContext } from "../context.js";

export function registerMcpCommand(program: Command, ctx: CliContext): void {
  program
    .command("mcp")
    .description("Serve the board's cards as MCP tools over stdio")
    .action((_options: unknown, command: Command) => {
      ctx.startMcp(boardPath(ctx, command));
    });
}
