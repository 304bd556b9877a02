import { describe, it, expect } from "vitest";
import type { HabitDefinition } from "@habitvoice/interpreter";
import { exportCsv, exportJson, progressReport } from "../src/export/exporters.js";
import type { JournalEntry } from "../src/journal/event-journal.js";
import { makeEvent } from "./fixtures.js";

const HABITS: HabitDefinition[] = [
  { id: "running", name: "running", aliases: [], unit: "count", weeklyGoal: 4 },
  { id: "sleep-early", name: "sleep early", aliases: [], unit: "boolean" },
];

const ENTRIES: JournalEntry[] = [
  {
    id: "e1",
    batchId: "b1",
    recordedAt: "2024-05-05T08:00:00.000Z",
    event: makeEvent({
      occurredAt: "2024-05-05T07:00:00.000Z",
      quantity: 3,
      unit: "miles",
      rawSpan: 'ran 3 miles, said "easy"',
    }),
  },
  {
    id: "e2",
    batchId: "b2",
    recordedAt: "2024-05-06T08:00:00.000Z",
    event: makeEvent({ occurredAt: "2024-05-06T07:00:00.000Z", rawSpan: "ran" }),
  },
  {
    id: "e3",
    batchId: "b2",
    recordedAt: "2024-05-06T08:00:00.000Z",
    event: makeEvent({
      habitId: "sleep-early",
      habitName: "sleep early",
      occurredAt: "2024-05-06T07:00:00.000Z",
      confidence: 0.85,
      rawSpan: "slept early",
    }),
  },
];

const NOW = new Date("2024-05-06T12:00:00.000Z");

describe("exportCsv", () => {
  it("writes a header and escapes commas and quotes", () => {
    const lines = exportCsv(ENTRIES).split("\n");

    expect(lines[0]).toBe("id,recordedAt,occurredAt,habitId,habitName,quantity,unit,confidence,status,rawSpan");
    expect(lines[1]).toBe(
      'e1,2024-05-05T08:00:00.000Z,2024-05-05T07:00:00.000Z,running,running,3,miles,1,resolved,"ran 3 miles, said ""easy"""',
    );
    expect(lines[2]).toBe("e2,2024-05-06T08:00:00.000Z,2024-05-06T07:00:00.000Z,running,running,,,1,resolved,ran");
    expect(lines).toHaveLength(5);
    expect(lines[4]).toBe("");
  });

  it("writes only the header for an empty journal", () => {
    expect(exportCsv([])).toBe("id,recordedAt,occurredAt,habitId,habitName,quantity,unit,confidence,status,rawSpan\n");
  });
});

describe("exportJson", () => {
  it("bundles habits, entries and a summary", () => {
    const data = JSON.parse(exportJson(ENTRIES, HABITS, { user: "sam", now: NOW }));

    expect(data.user).toBe("sam");
    expect(data.exportedAt).toBe("2024-05-06T12:00:00.000Z");
    expect(data.habits).toEqual(HABITS);
    expect(data.entries).toEqual(ENTRIES);
    expect(data.summary).toEqual({
      totalCompletions: 3,
      uniqueHabits: 2,
      currentStreaks: { running: 2, "sleep-early": 1 },
    });
  });
});

describe("progressReport", () => {
  it("renders totals, streaks and weekly goals", () => {
    expect(progressReport(ENTRIES, HABITS, { user: "sam", now: NOW })).toBe(
      [
        "HABITVOICE PROGRESS REPORT",
        "User: Sam",
        "Generated: 2024-05-06T12:00:00.000Z",
        "",
        "==================== SUMMARY ====================",
        "Total Completions: 3",
        "Unique Habits: 2",
        "Days Active: 2",
        "Total Streak Days: 3",
        "",
        "==================== CURRENT STREAKS ====================",
        "Running: 2 days",
        "Sleep Early: 1 day",
        "",
        "==================== LONGEST STREAKS ====================",
        "Running: 2 days",
        "Sleep Early: 1 day",
        "",
        "==================== WEEKLY PROGRESS ====================",
        "Running: 1/4 (25%)",
        "",
      ].join("\n"),
    );
  });

  it("says so when there is nothing yet", () => {
    const report = progressReport([], [], { now: NOW });

    expect(report.split("\n").slice(0, 2)).toEqual(["HABITVOICE PROGRESS REPORT", "Generated: 2024-05-06T12:00:00.000Z"]);
    expect(report).toContain("\nNo active streaks\n");
    expect(report).toContain("\nNo streak records yet\n");
    expect(report.endsWith("No weekly goals set\n")).toBe(true);
  });
});
