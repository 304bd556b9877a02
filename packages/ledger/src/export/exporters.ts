import type { HabitDefinition } from "@habitvoice/interpreter";
import { currentStreaks, longestStreaks, type StreakTable } from "../analytics/streaks.js";
import { summarize, weeklyProgress } from "../analytics/progress.js";
import type { JournalEntry } from "../journal/event-journal.js";

export interface ExportMeta {
  user?: string;
  now: Date;
  utcOffsetMinutes?: number;
}

const CSV_COLUMNS = [
  "id",
  "recordedAt",
  "occurredAt",
  "habitId",
  "habitName",
  "quantity",
  "unit",
  "confidence",
  "status",
  "rawSpan",
] as const;

function csvField(value: string | number | null): string {
  if (value === null) return "";
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * One row per journal entry, after a header row.
 */
export function exportCsv(entries: JournalEntry[]): string {
  const rows = entries.map(({ id, recordedAt, event }) => {
    const record = {
      id,
      recordedAt,
      occurredAt: event.occurredAt,
      habitId: event.habitId,
      habitName: event.habitName,
      quantity: event.quantity,
      unit: event.unit,
      confidence: event.confidence,
      status: event.status,
      rawSpan: event.rawSpan,
    };
    return CSV_COLUMNS.map((column) => csvField(record[column])).join(",");
  });
  return [CSV_COLUMNS.join(","), ...rows].join("\n") + "\n";
}

export function exportJson(entries: JournalEntry[], habits: HabitDefinition[], meta: ExportMeta): string {
  const options = { utcOffsetMinutes: meta.utcOffsetMinutes };
  const summary = summarize(entries, habits, meta.now, options);
  return JSON.stringify(
    {
      user: meta.user ?? null,
      exportedAt: meta.now.toISOString(),
      habits,
      entries,
      summary: {
        totalCompletions: summary.totalCompletions,
        uniqueHabits: summary.uniqueHabits,
        currentStreaks: summary.currentStreaks,
      },
    },
    null,
    2,
  );
}

function titleCase(text: string): string {
  return text.replace(/\b\p{L}/gu, (c) => c.toUpperCase());
}

function nameOf(habits: HabitDefinition[], id: string): string {
  return titleCase(habits.find((h) => h.id === id)?.name ?? id);
}

function streakLines(table: StreakTable, habits: HabitDefinition[], empty: string): string[] {
  const rows = Object.entries(table).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
  if (rows.length === 0) return [empty];
  return rows.map(([id, days]) => `${nameOf(habits, id)}: ${days} ${days === 1 ? "day" : "days"}`);
}

function section(title: string): string {
  return `==================== ${title} ====================`;
}

/**
 * Plain-text progress report: totals, current and longest streaks, and this
 * week's goals.
 */
export function progressReport(entries: JournalEntry[], habits: HabitDefinition[], meta: ExportMeta): string {
  const options = { utcOffsetMinutes: meta.utcOffsetMinutes };
  const summary = summarize(entries, habits, meta.now, options);
  const goals = weeklyProgress(entries, habits, meta.now, options);

  const lines = [
    "HABITVOICE PROGRESS REPORT",
    ...(meta.user ? [`User: ${titleCase(meta.user)}`] : []),
    `Generated: ${meta.now.toISOString()}`,
    "",
    section("SUMMARY"),
    `Total Completions: ${summary.totalCompletions}`,
    `Unique Habits: ${summary.uniqueHabits}`,
    `Days Active: ${summary.daysActive}`,
    `Total Streak Days: ${summary.totalStreakDays}`,
    "",
    section("CURRENT STREAKS"),
    ...streakLines(currentStreaks(entries, meta.now, options), habits, "No active streaks"),
    "",
    section("LONGEST STREAKS"),
    ...streakLines(longestStreaks(entries, options), habits, "No streak records yet"),
    "",
    section("WEEKLY PROGRESS"),
    ...(goals.length > 0
      ? goals.map((g) => `${titleCase(g.habitName)}: ${g.completed}/${g.target} (${g.percentage.toFixed(0)}%)`)
      : ["No weekly goals set"]),
  ];
  return lines.join("\n") + "\n";
}
