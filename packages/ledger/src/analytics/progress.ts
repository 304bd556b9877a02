import type { HabitDefinition } from "@habitvoice/interpreter";
import type { JournalEntry } from "../journal/event-journal.js";
import { categoryOf, loadDefaultCatalog, type HabitCatalog } from "../registry/catalog.js";
import { addDays, dayKey, weekStart } from "./days.js";
import {
  dailyActivity,
  suggestHabits,
  unlockedAchievements,
  weekdayActivity,
  type Achievement,
  type DailyCount,
  type HabitSuggestions,
  type WeekdayCount,
} from "./insights.js";
import { currentStreaks, longestStreaks, type DayOptions, type StreakTable } from "./streaks.js";

export type GoalStatus = "completed" | "in_progress" | "not_started";

export interface WeeklyProgress {
  habitId: string;
  habitName: string;
  completed: number;
  target: number;
  /**
   * 0 to 100
   */
  percentage: number;
  status: GoalStatus;
}

export interface LedgerSummary {
  totalCompletions: number;
  uniqueHabits: number;
  daysActive: number;
  totalStreakDays: number;
  completionsByCategory: Record<string, number>;
  currentStreaks: StreakTable;
  longestStreaks: StreakTable;
  weeklyProgress: WeeklyProgress[];
  achievements: Achievement[];
  dailyActivity: DailyCount[];
  weekdayActivity: WeekdayCount[];
  suggestions: HabitSuggestions;
}

export interface SummaryOptions extends DayOptions {
  /**
   * Source of habit suggestions; the built-in catalog when omitted
   */
  catalog?: HabitCatalog;
}

function goalStatus(completed: number, target: number): GoalStatus {
  if (completed >= target) return "completed";
  return completed > 0 ? "in_progress" : "not_started";
}

/**
 * Completions this week (from Monday) for every habit with a weekly goal,
 * in registry order.
 */
export function weeklyProgress(
  entries: JournalEntry[],
  habits: HabitDefinition[],
  now: Date,
  options: DayOptions = {},
): WeeklyProgress[] {
  const start = weekStart(now, options.utcOffsetMinutes).getTime();
  const end = addDays(new Date(start), 7).getTime();

  const counts = new Map<string, number>();
  for (const { event } of entries) {
    if (event.habitId === null) continue;
    const at = Date.parse(event.occurredAt);
    if (at < start || at >= end) continue;
    counts.set(event.habitId, (counts.get(event.habitId) ?? 0) + 1);
  }

  return habits.flatMap((habit) => {
    if (habit.weeklyGoal === undefined) return [];
    const completed = counts.get(habit.id) ?? 0;
    const target = habit.weeklyGoal;
    return [
      {
        habitId: habit.id,
        habitName: habit.name,
        completed,
        target,
        percentage: target > 0 ? Math.min(100, (completed / target) * 100) : 0,
        status: goalStatus(completed, target),
      },
    ];
  });
}

export function summarize(
  entries: JournalEntry[],
  habits: HabitDefinition[],
  now: Date,
  options: SummaryOptions = {},
): LedgerSummary {
  const current = currentStreaks(entries, now, options);
  const habitIds = new Set<string>();
  const days = new Set<string>();
  const byCategory: Record<string, number> = {};
  for (const { event } of entries) {
    if (event.habitId !== null) habitIds.add(event.habitId);
    days.add(dayKey(event.occurredAt, options.utcOffsetMinutes));
    const category = categoryOf(habits.find((h) => h.id === event.habitId));
    byCategory[category] = (byCategory[category] ?? 0) + 1;
  }

  const totals = {
    totalCompletions: entries.length,
    uniqueHabits: habitIds.size,
    daysActive: days.size,
    currentStreaks: current,
  };

  return {
    ...totals,
    totalStreakDays: Object.values(current).reduce((sum, n) => sum + n, 0),
    completionsByCategory: byCategory,
    longestStreaks: longestStreaks(entries, options),
    weeklyProgress: weeklyProgress(entries, habits, now, options),
    achievements: unlockedAchievements(totals),
    dailyActivity: dailyActivity(entries, options),
    weekdayActivity: weekdayActivity(entries, options),
    suggestions: suggestHabits(entries, habits, options.catalog ?? loadDefaultCatalog()),
  };
}
