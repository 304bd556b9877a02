import type { JournalEntry } from "../journal/event-journal.js";
import { dayKey, shiftDay } from "./days.js";

export interface DayOptions {
  utcOffsetMinutes?: number;
}

export type StreakTable = Record<string, number>;

/**
 * Distinct local days each habit was done on, keyed by habit id.
 */
export function habitDays(entries: JournalEntry[], options: DayOptions = {}): Map<string, Set<string>> {
  const days = new Map<string, Set<string>>();
  for (const { event } of entries) {
    if (event.habitId === null) continue;
    const set = days.get(event.habitId) ?? new Set<string>();
    set.add(dayKey(event.occurredAt, options.utcOffsetMinutes));
    days.set(event.habitId, set);
  }
  return days;
}

/**
 * Consecutive days up to today per habit. A streak not yet continued today
 * still counts from yesterday. Habits without a live streak are left out.
 */
export function currentStreaks(entries: JournalEntry[], today: Date, options: DayOptions = {}): StreakTable {
  const streaks: StreakTable = {};
  const todayKey = dayKey(today, options.utcOffsetMinutes);

  for (const [habitId, days] of habitDays(entries, options)) {
    let cursor = days.has(todayKey) ? todayKey : shiftDay(todayKey, -1);
    let streak = 0;
    while (days.has(cursor)) {
      streak++;
      cursor = shiftDay(cursor, -1);
    }
    if (streak > 0) streaks[habitId] = streak;
  }
  return streaks;
}

/**
 * Longest run of consecutive days per habit.
 */
export function longestStreaks(entries: JournalEntry[], options: DayOptions = {}): StreakTable {
  const streaks: StreakTable = {};

  for (const [habitId, days] of habitDays(entries, options)) {
    const sorted = [...days].sort();
    let best = 0;
    let run = 0;
    let previous: string | undefined;
    for (const day of sorted) {
      run = previous !== undefined && shiftDay(previous, 1) === day ? run + 1 : 1;
      best = Math.max(best, run);
      previous = day;
    }
    streaks[habitId] = best;
  }
  return streaks;
}
