import { describe, it, expect, afterEach } from "vitest";
import { PassThrough } from "node:stream";
import { ReadlinePrompter } from "../src/prompts/ReadlinePrompter.js";
import { CliError } from "../src/errors.js";

/**
 * Wire a prompter to streams that type the next answer whenever a
 * question is shown. Notices end in a newline and get no answer.
 */
function scripted(answers: string[]): { prompter: ReadlinePrompter; shown: string[] } {
  const input = new PassThrough();
  const output = new PassThrough();
  const shown: string[] = [];

  output.setEncoding("utf8");
  output.on("data", (chunk: string) => {
    shown.push(chunk);
    if (chunk.endsWith("\n")) return;
    const answer = answers.shift();
    if (answer !== undefined) {
      setImmediate(() => input.write(`${answer}\n`));
    }
  });

  return { prompter: new ReadlinePrompter(input, output), shown };
}

describe("ReadlinePrompter", () => {
  let prompter: ReadlinePrompter | undefined;

  afterEach(() => {
    prompter?.close();
  });

  it("falls back to the default for an empty answer", async () => {
    const setup = scripted([""]);
    prompter = setup.prompter;

    expect(await prompter.text("Board name:", { default: "proj" })).toBe("proj");
    expect(setup.shown[0]).toBe("Board name: (proj) ");
  });

  it("asks again until a required answer is given", async () => {
    const setup = scripted(["  ", "Ship it"]);
    prompter = setup.prompter;

    expect(await prompter.text("Card title:", { required: "Title is required" })).toBe("Ship it");
    expect(setup.shown.join("")).toContain("Title is required\n");
  });

  it("selects by number and ignores out-of-range answers", async () => {
    const setup = scripted(["7", "2"]);
    prompter = setup.prompter;

    const choice = await prompter.select("Column:", [
      { label: "To Do", value: "todo" },
      { label: "Done", value: "done" },
    ]);
    expect(choice).toBe("done");
    expect(setup.shown[0]).toBe("Column:\n  1) To Do\n  2) Done\nEnter a number [1-2]: ");
  });

  it("reads yes, no and the default", async () => {
    const setup = scripted(["", "YES", "n"]);
    prompter = setup.prompter;

    expect(await prompter.confirm("Go?", true)).toBe(true);
    expect(await prompter.confirm("Go?")).toBe(true);
    expect(await prompter.confirm("Go?", true)).toBe(false);
  });

  it("rejects a waiting question when input ends", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    output.on("data", () => {
      setImmediate(() => input.end());
    });
    prompter = new ReadlinePrompter(input, output);

    const pending = prompter.text("Card title:", { required: "Title is required" });
    await expect(pending).rejects.toBeInstanceOf(CliError);
    await expect(pending).rejects.toThrow("Input closed");
  });

  it("rejects questions asked after input ended", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    output.on("data", () => {
      setImmediate(() => input.end());
    });
    prompter = new ReadlinePrompter(input, output);

    await expect(prompter.confirm("Go?")).rejects.toThrow("Input closed");
    await expect(prompter.confirm("Go again?")).rejects.toThrow("Input closed");
  });
});
