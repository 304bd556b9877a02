import type { HabitDefinition } from "@habitvoice/interpreter";
import type { JournalEntry } from "../journal/event-journal.js";
import type { HabitCatalog } from "../registry/catalog.js";
import { dayKey } from "./days.js";
import type { DayOptions, StreakTable } from "./streaks.js";

export type AchievementMetric = "completions" | "habits" | "days_active" | "streak";

export interface Achievement {
  id: string;
  title: string;
  metric: AchievementMetric;
  threshold: number;
}

export const ACHIEVEMENTS: readonly Achievement[] = [
  { id: "completions-10", title: "Completed 10+ habits", metric: "completions", threshold: 10 },
  { id: "completions-50", title: "Habit Champion", metric: "completions", threshold: 50 },
  { id: "completions-100", title: "Habit Master", metric: "completions", threshold: 100 },
  { id: "habits-5", title: "Multi-tasker", metric: "habits", threshold: 5 },
  { id: "habits-10", title: "Diverse Tracker", metric: "habits", threshold: 10 },
  { id: "days-7", title: "Week Warrior", metric: "days_active", threshold: 7 },
  { id: "days-30", title: "Monthly Master", metric: "days_active", threshold: 30 },
  { id: "streak-7", title: "Week Streak", metric: "streak", threshold: 7 },
  { id: "streak-21", title: "Habit Formation", metric: "streak", threshold: 21 },
  { id: "streak-66", title: "Diamond Streak", metric: "streak", threshold: 66 },
];

export interface AchievementInput {
  totalCompletions: number;
  uniqueHabits: number;
  daysActive: number;
  currentStreaks: StreakTable;
}

/**
 * Milestones reached, in table order. Streak milestones use the best live streak.
 */
export function unlockedAchievements(input: AchievementInput): Achievement[] {
  const bestStreak = Math.max(0, ...Object.values(input.currentStreaks));
  const values: Record<AchievementMetric, number> = {
    completions: input.totalCompletions,
    habits: input.uniqueHabits,
    days_active: input.daysActive,
    streak: bestStreak,
  };
  return ACHIEVEMENTS.filter((a) => values[a.metric] >= a.threshold);
}

export interface DailyCount {
  date: string;
  count: number;
}

export const WEEKDAYS = ["Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday", "Sunday"] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export interface WeekdayCount {
  weekday: Weekday;
  count: number;
}

/**
 * Completions per local day, oldest first. Days without completions are left out.
 */
export function dailyActivity(entries: JournalEntry[], options: DayOptions = {}): DailyCount[] {
  const counts = new Map<string, number>();
  for (const { event } of entries) {
    const day = dayKey(event.occurredAt, options.utcOffsetMinutes);
    counts.set(day, (counts.get(day) ?? 0) + 1);
  }
  return [...counts.entries()].sort(([a], [b]) => a.localeCompare(b)).map(([date, count]) => ({ date, count }));
}

/**
 * Completions per weekday, Monday first, zeros included.
 */
export function weekdayActivity(entries: JournalEntry[], options: DayOptions = {}): WeekdayCount[] {
  const counts = WEEKDAYS.map(() => 0);
  for (const { event } of entries) {
    const day = dayKey(event.occurredAt, options.utcOffsetMinutes);
    const index = (new Date(`${day}T00:00:00.000Z`).getUTCDay() + 6) % 7;
    counts[index]++;
  }
  return WEEKDAYS.map((weekday, i) => ({ weekday, count: counts[i] }));
}

export interface HabitSuggestions {
  suggestions: string[];
  reason: string;
}

const MAX_SUGGESTIONS = 5;
const MAX_CATEGORY_SUGGESTIONS = 3;

/**
 * Catalog habits not yet logged: first from the categories already being
 * tracked, then from the popular list.
 */
export function suggestHabits(entries: JournalEntry[], habits: HabitDefinition[], catalog: HabitCatalog): HabitSuggestions {
  const nameOf = new Map(catalog.habits.map((h) => [h.id, h.name]));
  const popular = catalog.popularHabitIds.filter((id) => nameOf.has(id));

  const logged = new Set<string>();
  for (const { event } of entries) {
    if (event.habitId !== null) logged.add(event.habitId);
  }
  if (logged.size === 0) {
    return {
      suggestions: popular.slice(0, MAX_SUGGESTIONS).flatMap((id) => nameOf.get(id) ?? []),
      reason: "Popular habits for beginners",
    };
  }

  const trackedCategories = new Set<string>();
  for (const id of logged) {
    const category = habits.find((h) => h.id === id)?.category ?? catalog.habits.find((h) => h.id === id)?.category;
    if (category !== undefined) trackedCategories.add(category);
  }

  const picked: string[] = [];
  const consider = (id: string, limit: number) => {
    if (picked.length < limit && !logged.has(id) && !picked.includes(id)) picked.push(id);
  };
  for (const category of catalog.categories) {
    if (!trackedCategories.has(category.name)) continue;
    for (const id of category.habitIds) consider(id, MAX_CATEGORY_SUGGESTIONS);
  }
  for (const id of popular) consider(id, MAX_SUGGESTIONS);

  return { suggestions: picked.flatMap((id) => nameOf.get(id) ?? []), reason: "Based on your habits" };
}
