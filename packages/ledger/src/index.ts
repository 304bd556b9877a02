/**
 * HabitVoice Ledger
 *
 * Persistence and analytics around the interpreter:
 * - Habit registry (JSON file) seeded from the built-in catalog
 * - Append-only event journal (JSONL)
 * - Streaks, weekly goal progress, achievements and habit suggestions
 * - CSV / JSON export and a plain-text progress report
 * - runHabitVoice: one utterance in, one command carried out
 */

export { RegistryError, JournalError } from "./errors.js";

// Storage
export { resolveHabitVoiceRoot, resolveLedgerPath, type LedgerFile } from "./storage/files.js";

// Registry
export {
  loadDefaultCatalog,
  findCatalogHabit,
  categoryOf,
  habitSlug,
  OTHER_CATEGORY,
  type HabitCatalog,
  type HabitCategory,
} from "./registry/catalog.js";
export { HabitRegistryStore, assertConsistent, type NewHabit, type HabitPatch } from "./registry/registry-store.js";

// Journal
export {
  EventJournal,
  isJournalable,
  type JournalEntry,
  type AppendOptions,
  type AppendResult,
} from "./journal/event-journal.js";

// Analytics
export { dayKey, weekStart } from "./analytics/days.js";
export { currentStreaks, longestStreaks, habitDays, type StreakTable, type DayOptions } from "./analytics/streaks.js";
export {
  weeklyProgress,
  summarize,
  type WeeklyProgress,
  type GoalStatus,
  type LedgerSummary,
  type SummaryOptions,
} from "./analytics/progress.js";
export {
  ACHIEVEMENTS,
  WEEKDAYS,
  unlockedAchievements,
  dailyActivity,
  weekdayActivity,
  suggestHabits,
  type Achievement,
  type AchievementMetric,
  type AchievementInput,
  type DailyCount,
  type Weekday,
  type WeekdayCount,
  type HabitSuggestions,
} from "./analytics/insights.js";

// Export
export { exportCsv, exportJson, progressReport, type ExportMeta } from "./export/exporters.js";

// Pipeline
export {
  runHabitVoice,
  HELP_EXAMPLES,
  DEFAULT_PENDING_TTL_MS,
  type RunConfig,
  type RunDeps,
  type RunInput,
  type RunOutcome,
  type RunResult,
} from "./pipeline/run.js";
