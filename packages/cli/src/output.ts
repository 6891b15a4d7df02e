/**
 * Where user-facing text goes. Commands never touch the console directly.
 */
export interface Output {
  log(line: string): void;
  error(line: string): void;
}

export const consoleOutput: Output = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

export function printLines(output: Output, lines: readonly string[]): void {
  for (const line of lines) output.log(line);
}
