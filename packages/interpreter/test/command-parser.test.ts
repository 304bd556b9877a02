import { describe, it, expect } from "vitest";
import { parseCommand } from "../src/commands/command-parser.js";
import { EmptyInputError } from "../src/errors.js";
import { HABITS, utterance } from "./fixtures.js";

const parse = (text: string) => parseCommand(utterance(text), HABITS);

describe("parseCommand", () => {
  it("reads weekly goals", async () => {
    expect(await parse("Set goal for running to 4 times per week")).toEqual({
      kind: "set_goal",
      habit: { phrase: "running", habitId: "running" },
      target: 4,
    });
    expect(await parse("I want to do yoga 3 times a week.")).toEqual({
      kind: "set_goal",
      habit: { phrase: "yoga", habitId: "yoga" },
      target: 3,
    });
  });

  it("reads streak questions with and without a habit", async () => {
    expect(await parse("What's my running streak?")).toEqual({
      kind: "streak_query",
      habit: { phrase: "running", habitId: "running" },
    });
    expect(await parse("how many days in a row")).toEqual({ kind: "streak_query", habit: null });
  });

  it("reads progress and dashboard requests", async () => {
    expect(await parse("How am I doing?")).toEqual({ kind: "progress_query" });
    expect(await parse("show my dashboard")).toEqual({ kind: "dashboard" });
  });

  it("reads requests for a habit's entries", async () => {
    expect(await parse("show reading logs")).toEqual({ kind: "query", habit: { phrase: "reading", habitId: "reading" } });
    expect(await parse("Check my running history")).toEqual({
      kind: "query",
      habit: { phrase: "running", habitId: "running" },
    });
    expect(await parse("show me swimming entries")).toEqual({
      kind: "query",
      habit: { phrase: "swimming", habitId: null },
    });
  });

  it("reads one-word replies only as whole utterances", async () => {
    expect(await parse("Yes")).toEqual({ kind: "confirm" });
    expect(await parse("nope")).toEqual({ kind: "cancel" });
    expect((await parse("no phone after dinner")).kind).toBe("log");
  });

  it("reads help and export", async () => {
    expect(await parse("help")).toEqual({ kind: "help" });
    expect(await parse("what can i say")).toEqual({ kind: "help" });
    expect(await parse("export my data")).toEqual({ kind: "export" });
  });

  it("reads habit lists to add or delete", async () => {
    expect(await parse("add guitar and reading")).toEqual({
      kind: "add_habit",
      habits: [
        { phrase: "guitar", habitId: null },
        { phrase: "reading", habitId: "reading" },
      ],
    });
    expect(await parse("stop tracking yoga")).toEqual({
      kind: "delete_habit",
      habits: [{ phrase: "yoga", habitId: "yoga" }],
    });
  });

  it("interprets anything else as a log statement", async () => {
    const command = await parse("I ran 3 miles");
    expect(command.kind).toBe("log");
    if (command.kind === "log") {
      expect(command.report.events.map((e) => e.habitId)).toEqual(["running"]);
    }
  });

  it("rejects blank input", async () => {
    await expect(parse("  ")).rejects.toBeInstanceOf(EmptyInputError);
    await expect(parse("...")).rejects.toBeInstanceOf(EmptyInputError);
    await expect(parse("- -")).rejects.toBeInstanceOf(EmptyInputError);
  });
});
