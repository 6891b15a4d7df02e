import type { Result } from "@clicky/core";
import type { BoardError } from "@clicky/board";

/**
 * A failure already phrased for the user. Printed as "Error: <message>".
 */
export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

export function orFail<T>(result: Result<T, BoardError>): T {
  if (!result.ok) {
    throw new CliError(result.error.message);
  }
  return result.value;
}
