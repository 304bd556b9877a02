import { describe, it, expect } from "vitest";
import type { HabitDefinition } from "@habitvoice/interpreter";
import { dayKey, weekStart } from "../src/analytics/days.js";
import {
  dailyActivity,
  suggestHabits,
  unlockedAchievements,
  weekdayActivity,
} from "../src/analytics/insights.js";
import { summarize, weeklyProgress } from "../src/analytics/progress.js";
import { currentStreaks, longestStreaks } from "../src/analytics/streaks.js";
import { loadDefaultCatalog, type HabitCatalog } from "../src/registry/catalog.js";
import { entry } from "./fixtures.js";

const HABITS: HabitDefinition[] = [
  { id: "running", name: "running", aliases: [], unit: "count", weeklyGoal: 4, category: "Health & Fitness" },
  { id: "yoga", name: "yoga", aliases: [], unit: "duration", weeklyGoal: 2, category: "Health & Fitness" },
  { id: "reading", name: "reading", aliases: [], unit: "duration", weeklyGoal: 3, category: "Mental & Learning" },
  { id: "water", name: "drinking water", aliases: [], unit: "count" },
];

describe("days", () => {
  it("uses the local calendar day", () => {
    expect(dayKey("2024-05-06T02:00:00.000Z")).toBe("2024-05-06");
    expect(dayKey("2024-05-06T02:00:00.000Z", -300)).toBe("2024-05-05");
  });

  it("starts weeks on Monday", () => {
    expect(weekStart(new Date("2024-05-08T15:00:00.000Z")).toISOString()).toBe("2024-05-06T00:00:00.000Z");
    expect(weekStart(new Date("2024-05-12T23:00:00.000Z")).toISOString()).toBe("2024-05-06T00:00:00.000Z");
    expect(weekStart(new Date("2024-05-06T02:00:00.000Z"), -300).toISOString()).toBe("2024-04-29T05:00:00.000Z");
  });
});

describe("streaks", () => {
  const today = new Date("2024-05-06T12:00:00.000Z");

  it("counts back from today, or from yesterday", () => {
    const entries = [
      entry("running", "2024-05-04T07:00:00.000Z"),
      entry("running", "2024-05-05T07:00:00.000Z"),
      entry("running", "2024-05-06T07:00:00.000Z"),
      entry("running", "2024-05-06T18:00:00.000Z"),
      entry("yoga", "2024-05-04T07:00:00.000Z"),
      entry("yoga", "2024-05-05T07:00:00.000Z"),
      entry("water", "2024-05-02T07:00:00.000Z"),
    ];

    expect(currentStreaks(entries, today)).toEqual({ running: 3, yoga: 2 });
  });

  it("ignores days after today", () => {
    expect(currentStreaks([entry("yoga", "2024-05-07T07:00:00.000Z")], today)).toEqual({});
  });

  it("finds the longest run", () => {
    const entries = [
      entry("running", "2024-04-28T07:00:00.000Z"),
      entry("running", "2024-04-29T07:00:00.000Z"),
      entry("running", "2024-05-01T07:00:00.000Z"),
      entry("running", "2024-05-02T07:00:00.000Z"),
      entry("running", "2024-05-03T07:00:00.000Z"),
      entry("yoga", "2024-05-03T07:00:00.000Z"),
    ];

    expect(longestStreaks(entries)).toEqual({ running: 3, yoga: 1 });
  });
});

describe("weeklyProgress", () => {
  it("counts completions since Monday against each goal", () => {
    const now = new Date("2024-05-08T12:00:00.000Z");
    const entries = [
      entry("running", "2024-05-05T23:00:00.000Z"),
      entry("running", "2024-05-06T07:00:00.000Z"),
      entry("running", "2024-05-07T07:00:00.000Z"),
      entry("yoga", "2024-05-06T07:00:00.000Z"),
      entry("yoga", "2024-05-07T07:00:00.000Z"),
      entry("yoga", "2024-05-08T07:00:00.000Z"),
      entry("water", "2024-05-07T07:00:00.000Z"),
    ];

    expect(weeklyProgress(entries, HABITS, now)).toEqual([
      { habitId: "running", habitName: "running", completed: 2, target: 4, percentage: 50, status: "in_progress" },
      { habitId: "yoga", habitName: "yoga", completed: 3, target: 2, percentage: 100, status: "completed" },
      { habitId: "reading", habitName: "reading", completed: 0, target: 3, percentage: 0, status: "not_started" },
    ]);
  });
});

describe("summarize", () => {
  it("totals completions, habits, days and categories", () => {
    const now = new Date("2024-05-06T12:00:00.000Z");
    const entries = [
      entry("running", "2024-05-05T07:00:00.000Z"),
      entry("running", "2024-05-06T07:00:00.000Z"),
      entry("reading", "2024-05-06T20:00:00.000Z"),
      entry("meditation", "2024-05-01T07:00:00.000Z"),
    ];

    const summary = summarize(entries, HABITS, now);

    expect(summary.totalCompletions).toBe(4);
    expect(summary.uniqueHabits).toBe(3);
    expect(summary.daysActive).toBe(3);
    expect(summary.currentStreaks).toEqual({ running: 2, reading: 1 });
    expect(summary.totalStreakDays).toBe(3);
    expect(summary.completionsByCategory).toEqual({ "Health & Fitness": 2, "Mental & Learning": 1, Other: 1 });
    expect(summary.achievements).toEqual([]);
    expect(summary.dailyActivity).toEqual([
      { date: "2024-05-01", count: 1 },
      { date: "2024-05-05", count: 1 },
      { date: "2024-05-06", count: 2 },
    ]);
    expect(summary.suggestions).toEqual({
      suggestions: ["workout", "yoga", "gym", "meditating", "journaling"],
      reason: "Based on your habits",
    });
  });
});

describe("achievements", () => {
  it("unlocks milestones in table order", () => {
    const unlocked = unlockedAchievements({
      totalCompletions: 52,
      uniqueHabits: 5,
      daysActive: 12,
      currentStreaks: { running: 8, yoga: 3 },
    });

    expect(unlocked.map((a) => a.id)).toEqual(["completions-10", "completions-50", "habits-5", "days-7", "streak-7"]);
  });

  it("unlocks nothing for a fresh ledger", () => {
    expect(unlockedAchievements({ totalCompletions: 0, uniqueHabits: 0, daysActive: 0, currentStreaks: {} })).toEqual([]);
  });
});

describe("activity", () => {
  const entries = [
    entry("running", "2024-05-07T07:00:00.000Z"),
    entry("running", "2024-05-06T07:00:00.000Z"),
    entry("yoga", "2024-05-06T19:00:00.000Z"),
    entry("yoga", "2024-05-05T07:00:00.000Z"),
    entry("reading", "2024-05-12T21:00:00.000Z"),
  ];

  it("counts completions per day, oldest first", () => {
    expect(dailyActivity(entries)).toEqual([
      { date: "2024-05-05", count: 1 },
      { date: "2024-05-06", count: 2 },
      { date: "2024-05-07", count: 1 },
      { date: "2024-05-12", count: 1 },
    ]);
  });

  it("counts completions per weekday from Monday", () => {
    expect(weekdayActivity(entries).map((w) => w.count)).toEqual([2, 1, 0, 0, 0, 0, 2]);
    expect(weekdayActivity(entries)[0]).toEqual({ weekday: "Monday", count: 2 });
  });

  it("uses the local day", () => {
    const late = [entry("running", "2024-05-13T02:00:00.000Z")];
    expect(weekdayActivity(late, { utcOffsetMinutes: -300 })[6]).toEqual({ weekday: "Sunday", count: 1 });
    expect(dailyActivity(late, { utcOffsetMinutes: -300 })).toEqual([{ date: "2024-05-12", count: 1 }]);
  });
});

describe("suggestHabits", () => {
  const catalog = loadDefaultCatalog();

  it("offers popular habits to newcomers", () => {
    expect(suggestHabits([], HABITS, catalog)).toEqual({
      suggestions: ["reading", "workout", "meditating", "journaling", "drinking water"],
      reason: "Popular habits for beginners",
    });
  });

  it("prefers the categories already tracked", () => {
    const entries = [entry("running", "2024-05-06T07:00:00.000Z"), entry("reading", "2024-05-06T08:00:00.000Z")];

    expect(suggestHabits(entries, HABITS, catalog)).toEqual({
      suggestions: ["workout", "yoga", "gym", "meditating", "journaling"],
      reason: "Based on your habits",
    });
  });

  it("reads a custom catalog", () => {
    const custom: HabitCatalog = {
      categories: [
        { name: "Craft", habitIds: ["knitting", "pottery"] },
        { name: "Outdoors", habitIds: ["hiking"] },
      ],
      habits: [
        { id: "knitting", name: "knitting", aliases: [], unit: "duration", category: "Craft" },
        { id: "pottery", name: "pottery", aliases: [], unit: "duration", category: "Craft" },
        { id: "hiking", name: "hiking", aliases: [], unit: "count", category: "Outdoors" },
      ],
      popularHabitIds: ["hiking", "unknown"],
    };

    expect(suggestHabits([entry("knitting", "2024-05-06T07:00:00.000Z")], [], custom)).toEqual({
      suggestions: ["pottery", "hiking"],
      reason: "Based on your habits",
    });
  });
});
