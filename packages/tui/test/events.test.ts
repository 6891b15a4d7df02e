import { describe, it, expect } from "vitest";
import { EventQueue, toKeyPress } from "../src/events.js";

describe("toKeyPress", () => {
  it("names printable keys by their character", () => {
    expect(toKeyPress("j", { name: "j", sequence: "j" })).toEqual({ name: "j", char: "j", ctrl: false });
    expect(toKeyPress("J", { name: "j", sequence: "J", shift: true })).toEqual({
      name: "J",
      char: "J",
      ctrl: false,
    });
    expect(toKeyPress("?", { sequence: "?" })).toEqual({ name: "?", char: "?", ctrl: false });
    expect(toKeyPress(" ", { name: "space", sequence: " " })).toEqual({ name: " ", char: " ", ctrl: false });
  });

  it("keeps readline names for special keys", () => {
    expect(toKeyPress(undefined, { name: "up", sequence: "\x1b[A" })).toEqual({ name: "up", ctrl: false });
    expect(toKeyPress("\r", { name: "return", sequence: "\r" })).toEqual({ name: "return", ctrl: false });
    expect(toKeyPress("\x7f", { name: "backspace", sequence: "\x7f" })).toEqual({
      name: "backspace",
      ctrl: false,
    });
    expect(toKeyPress("\x03", { name: "c", sequence: "\x03", ctrl: true })).toEqual({ name: "c", ctrl: true });
  });

  it("ignores unnamed control input", () => {
    expect(toKeyPress("\x00", { sequence: "\x00" })).toBeNull();
  });
});

describe("EventQueue", () => {
  it("delivers queued events in order", async () => {
    const queue = new EventQueue();
    queue.push({ kind: "tick" });
    queue.push({ kind: "key", key: { name: "q", char: "q", ctrl: false } });

    expect(queue.size).toBe(2);
    expect(await queue.next()).toEqual({ kind: "tick" });
    expect(await queue.next()).toEqual({ kind: "key", key: { name: "q", char: "q", ctrl: false } });
  });

  it("wakes a waiting consumer", async () => {
    const queue = new EventQueue();
    const pending = queue.next();
    queue.push({ kind: "tick" });

    expect(await pending).toEqual({ kind: "tick" });
    expect(queue.size).toBe(0);
  });

  it("resolves to null once closed", async () => {
    const queue = new EventQueue();
    const pending = queue.next();
    queue.close();
    queue.push({ kind: "tick" });

    expect(await pending).toBeNull();
    expect(await queue.next()).toBeNull();
  });
});
