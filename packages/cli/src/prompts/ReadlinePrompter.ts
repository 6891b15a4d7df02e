import { createInterface, type Interface } from "node:readline/promises";
import { CliError } from "../errors.js";
import type { Choice, Prompter, TextOptions } from "./Prompter.js";

/**
 * Prompter over stdin/stdout. Selections are answered by number.
 */
export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  /** Aborted when the interface closes, so a waiting question rejects */
  private readonly inputClosed = new AbortController();

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, output });
    this.rl.on("close", () => {
      this.inputClosed.abort();
    });
  }

  private async ask(question: string): Promise<string> {
    const { signal } = this.inputClosed;
    if (signal.aborted) {
      throw new CliError("Input closed");
    }

    try {
      return (await this.rl.question(question, { signal })).trim();
    } catch (error) {
      if (signal.aborted) {
        throw new CliError("Input closed");
      }
      throw error;
    }
  }

  async text(message: string, options: TextOptions = {}): Promise<string> {
    const hint = options.default ? ` (${options.default})` : "";

    for (;;) {
      const answer = (await this.ask(`${message}${hint} `)) || options.default || "";
      if (!options.required || answer !== "") {
        return answer;
      }
      this.output.write(`${options.required}\n`);
    }
  }

  async select<T>(message: string, choices: readonly Choice<T>[]): Promise<T> {
    if (choices.length === 0) {
      throw new CliError(`Nothing to choose for: ${message}`);
    }

    const menu = choices.map((choice, i) => `  ${i + 1}) ${choice.label}`).join("\n");

    for (;;) {
      const answer = await this.ask(`${message}\n${menu}\nEnter a number [1-${choices.length}]: `);
      const index = Number.parseInt(answer, 10) - 1;
      const choice = choices[index];
      if (String(index + 1) === answer && choice !== undefined) {
        return choice.value;
      }
    }
  }

  async confirm(message: string, defaultValue = false): Promise<boolean> {
    const hint = defaultValue ? "[Y/n]" : "[y/N]";

    for (;;) {
      const answer = (await this.ask(`${message} ${hint} `)).toLowerCase();
      if (answer === "") return defaultValue;
      if (answer === "y" || answer === "yes") return true;
      if (answer === "n" || answer === "no") return false;
    }
  }

  close(): void {
    this.rl.close();
  }
}
