import { nanoid } from "nanoid";
import { z } from "zod";
import {
  log,
  parseCommand,
  type HabitCommand,
  type HabitDefinition,
  type HabitReference,
  type InterpretationLog,
  type InterpreterConfigInput,
  type ParsedEvent,
  type SemanticClassifier,
  type UtteranceSource,
} from "@habitvoice/interpreter";
import { summarize, type LedgerSummary } from "../analytics/progress.js";
import { currentStreaks, longestStreaks, type StreakTable } from "../analytics/streaks.js";
import { JournalError } from "../errors.js";
import { exportCsv, exportJson, progressReport } from "../export/exporters.js";
import { EventJournal, ParsedEventSchema, type JournalEntry } from "../journal/event-journal.js";
import { findCatalogHabit, loadDefaultCatalog } from "../registry/catalog.js";
import { HabitRegistryStore } from "../registry/registry-store.js";
import {
  appendJsonLines,
  readTextIfExists,
  removeIfExists,
  resolveLedgerPath,
  writeJsonAtomic,
} from "../storage/files.js";

export interface RunConfig {
  workspaceDir: string;
  interpreter?: InterpreterConfigInput;

  /**
   * Start a fresh registry from the built-in catalog (default true)
   */
  seedDefaults?: boolean;

  /**
   * Journal low-confidence events immediately instead of holding them
   */
  includePending?: boolean;

  user?: string;

  /**
   * How long low-confidence events wait for a yes or no (default 300 s)
   */
  pendingTtlMs?: number;
}

export interface RunDeps {
  classifier?: SemanticClassifier;
  clock?: () => Date;
  signal?: AbortSignal;

  /**
   * Receives a failure to write run logs after the run itself has failed
   */
  onLogWriteError?: (error: unknown) => void;
}

export interface RunInput {
  text: string;
  source?: UtteranceSource;
  receivedAt?: string;
}

export type RunOutcome =
  | { kind: "logged"; appended: JournalEntry[]; pending: ParsedEvent[]; unresolved: ParsedEvent[]; warnings: number }
  | { kind: "confirmed"; appended: JournalEntry[]; expired: boolean }
  | { kind: "cancelled"; discarded: number; expired: boolean }
  | { kind: "habits_added"; added: HabitDefinition[]; existing: string[] }
  | { kind: "habits_removed"; removed: string[]; unknown: string[] }
  | { kind: "goal_set"; habit: HabitDefinition; created: boolean }
  | { kind: "streak"; habitId: string | null; current: StreakTable; longest: StreakTable }
  | { kind: "history"; habit: HabitReference; total: number; recent: JournalEntry[] }
  | { kind: "summary"; summary: LedgerSummary; report: string }
  | { kind: "exported"; json: string; csv: string }
  | { kind: "help"; examples: string[] };

export interface RunResult {
  runId: string;
  command: HabitCommand;
  outcome: RunOutcome;
  logs: InterpretationLog[];
}

export const HELP_EXAMPLES = [
  "I ran 3 miles and meditated for 10 minutes",
  "did yoga this morning",
  "add reading and journaling",
  "set goal for running to 4 times per week",
  "what's my reading streak",
  "show my reading logs",
  "how am i doing",
  "show my dashboard",
  "export my data",
];

export const DEFAULT_PENDING_TTL_MS = 300_000;
const HISTORY_LIMIT = 5;

const PendingStateSchema = z.object({
  runId: z.string(),
  createdAt: z.string(),
  events: z.array(ParsedEventSchema),
});

type PendingState = z.infer<typeof PendingStateSchema>;

async function readPendingFile(workspaceDir: string): Promise<PendingState | null> {
  const text = await readTextIfExists(resolveLedgerPath(workspaceDir, "pending"));
  if (text === null) return null;

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new JournalError("Pending confirmation state is not valid JSON", { cause: err });
  }
  const parsed = PendingStateSchema.safeParse(json);
  if (!parsed.success) {
    throw new JournalError("Pending confirmation state has the wrong shape", { cause: parsed.error });
  }
  return parsed.data;
}

type PendingLookup = { state: PendingState; expired: false } | { state: null; expired: boolean };

/**
 * Held events of the last log run. A state older than the TTL is deleted and
 * reported as expired.
 */
async function readPending(ctx: RunContext): Promise<PendingLookup> {
  const state = await readPendingFile(ctx.config.workspaceDir);
  if (!state) return { state: null, expired: false };

  const ttl = ctx.config.pendingTtlMs ?? DEFAULT_PENDING_TTL_MS;
  const age = ctx.now.getTime() - Date.parse(state.createdAt);
  if (age > ttl) {
    await removeIfExists(resolveLedgerPath(ctx.config.workspaceDir, "pending"));
    log(ctx.logs, "info", "Pending confirmation expired", { fromRun: state.runId, ageMs: age });
    return { state: null, expired: true };
  }
  return { state, expired: false };
}

interface RunContext {
  config: RunConfig;
  registry: HabitRegistryStore;
  journal: EventJournal;
  now: Date;
  runId: string;
  logs: InterpretationLog[];
}

async function addHabits(ctx: RunContext, references: HabitReference[]): Promise<RunOutcome> {
  const added: HabitDefinition[] = [];
  const existing: string[] = [];

  for (const ref of references) {
    if (ref.habitId !== null || ctx.registry.get(ref.phrase)) {
      existing.push(ref.phrase);
      continue;
    }
    const known = findCatalogHabit(ref.phrase);
    const habit = await ctx.registry.add(known ?? { name: ref.phrase });
    log(ctx.logs, "info", "Habit added", { habitId: habit.id, fromCatalog: known !== undefined });
    added.push(habit);
  }
  return { kind: "habits_added", added, existing };
}

async function removeHabits(ctx: RunContext, references: HabitReference[]): Promise<RunOutcome> {
  const removed: string[] = [];
  const unknown: string[] = [];

  for (const ref of references) {
    const id = ref.habitId ?? ctx.registry.get(ref.phrase)?.id;
    if (id !== undefined && (await ctx.registry.remove(id))) {
      removed.push(id);
    } else {
      unknown.push(ref.phrase);
    }
  }
  log(ctx.logs, "info", "Habits removed", { removed: removed.length, unknown: unknown.length });
  return { kind: "habits_removed", removed, unknown };
}

async function setGoal(ctx: RunContext, ref: HabitReference, target: number): Promise<RunOutcome> {
  const id = ref.habitId ?? ctx.registry.get(ref.phrase)?.id;
  if (id !== undefined) {
    const habit = await ctx.registry.setWeeklyGoal(id, target);
    log(ctx.logs, "info", "Weekly goal set", { habitId: habit.id, target });
    return { kind: "goal_set", habit, created: false };
  }

  const known = findCatalogHabit(ref.phrase);
  const habit = await ctx.registry.add({ ...(known ?? { name: ref.phrase }), weeklyGoal: target });
  log(ctx.logs, "info", "Habit added with weekly goal", { habitId: habit.id, target });
  return { kind: "goal_set", habit, created: true };
}

async function logEvents(ctx: RunContext, command: Extract<HabitCommand, { kind: "log" }>): Promise<RunOutcome> {
  const { events, warnings } = command.report;
  const result = await ctx.journal.appendReport(command.report, { includePending: ctx.config.includePending });
  const pending = result.skipped.filter((e) => e.status === "needs_confirmation");
  const unresolved = result.skipped.filter((e) => e.unresolved);

  const pendingPath = resolveLedgerPath(ctx.config.workspaceDir, "pending");
  if (pending.length > 0) {
    await writeJsonAtomic(pendingPath, { runId: ctx.runId, createdAt: ctx.now.toISOString(), events: pending });
  } else {
    await removeIfExists(pendingPath);
  }

  log(ctx.logs, "info", "Events journaled", {
    events: events.length,
    appended: result.appended.length,
    pending: pending.length,
    unresolved: unresolved.length,
  });
  return { kind: "logged", appended: result.appended, pending, unresolved, warnings: warnings.length };
}

async function confirmPending(ctx: RunContext): Promise<RunOutcome> {
  const { state, expired } = await readPending(ctx);
  if (!state) {
    log(ctx.logs, "info", "Nothing to confirm");
    return { kind: "confirmed", appended: [], expired };
  }
  const confirmed = state.events.map((e): ParsedEvent => ({ ...e, status: "resolved", needsConfirmation: false }));
  const result = await ctx.journal.append(confirmed);
  await removeIfExists(resolveLedgerPath(ctx.config.workspaceDir, "pending"));
  log(ctx.logs, "info", "Pending events confirmed", { fromRun: state.runId, appended: result.appended.length });
  return { kind: "confirmed", appended: result.appended, expired };
}

async function cancelPending(ctx: RunContext): Promise<RunOutcome> {
  const { state, expired } = await readPending(ctx);
  await removeIfExists(resolveLedgerPath(ctx.config.workspaceDir, "pending"));
  const discarded = state?.events.length ?? 0;
  log(ctx.logs, "info", "Pending events discarded", { discarded });
  return { kind: "cancelled", discarded, expired };
}

function habitHistory(entries: JournalEntry[], habit: HabitReference): RunOutcome {
  const matching = habit.habitId === null ? [] : entries.filter((e) => e.event.habitId === habit.habitId);
  return { kind: "history", habit, total: matching.length, recent: matching.slice(-HISTORY_LIMIT) };
}

async function execute(ctx: RunContext, command: HabitCommand): Promise<RunOutcome> {
  switch (command.kind) {
    case "log":
      return logEvents(ctx, command);
    case "confirm":
      return confirmPending(ctx);
    case "cancel":
      return cancelPending(ctx);
    case "add_habit":
      return addHabits(ctx, command.habits);
    case "delete_habit":
      return removeHabits(ctx, command.habits);
    case "set_goal":
      return setGoal(ctx, command.habit, command.target);
    case "help":
      return { kind: "help", examples: HELP_EXAMPLES };
  }

  const entries = await ctx.journal.readAll();
  const habits = ctx.registry.list();
  const offset = { utcOffsetMinutes: ctx.config.interpreter?.utcOffsetMinutes };
  const meta = { user: ctx.config.user, now: ctx.now, ...offset };

  switch (command.kind) {
    case "streak_query": {
      const current = currentStreaks(entries, ctx.now, offset);
      const longest = longestStreaks(entries, offset);
      const habitId = command.habit?.habitId ?? null;
      return {
        kind: "streak",
        habitId,
        current: habitId === null ? current : { [habitId]: current[habitId] ?? 0 },
        longest: habitId === null ? longest : { [habitId]: longest[habitId] ?? 0 },
      };
    }
    case "query":
      return habitHistory(entries, command.habit);
    case "progress_query":
    case "dashboard":
      return {
        kind: "summary",
        summary: summarize(entries, habits, ctx.now, offset),
        report: progressReport(entries, habits, meta),
      };
    case "export":
      return { kind: "exported", json: exportJson(entries, habits, meta), csv: exportCsv(entries) };
  }
}

async function writeRunLogs(workspaceDir: string, runId: string, logs: InterpretationLog[]): Promise<void> {
  await appendJsonLines(
    resolveLedgerPath(workspaceDir, "runs"),
    logs.map((entry) => ({ runId, ...entry })),
  );
}

/**
 * Runs one utterance against the ledger in `workspaceDir`: loads the registry,
 * parses the command and carries it out. Run logs are appended to
 * `.habitvoice/logs/runs.jsonl` whether or not the run succeeds; when that
 * write fails after the run failed, the run's error is still the one thrown.
 */
export const runHabitVoice = async (config: RunConfig, input: RunInput, deps: RunDeps = {}): Promise<RunResult> => {
  const clock = deps.clock ?? (() => new Date());
  const now = clock();
  const runId = nanoid();
  const logs: InterpretationLog[] = [];

  try {
    log(logs, "info", "Starting HabitVoice run", { runId, source: input.source ?? "text" });

    const registry = new HabitRegistryStore(resolveLedgerPath(config.workspaceDir, "registry"));
    const habits = await registry.load({ seed: config.seedDefaults === false ? [] : loadDefaultCatalog().habits });
    const journal = new EventJournal(resolveLedgerPath(config.workspaceDir, "journal"), clock);
    log(logs, "info", "Registry loaded", { habits: habits.length });

    const command = await parseCommand(
      { text: input.text, source: input.source ?? "text", receivedAt: input.receivedAt ?? now.toISOString() },
      habits,
      config.interpreter,
      { classifier: deps.classifier, signal: deps.signal },
    );
    if (command.kind === "log") logs.push(...command.report.logs);
    log(logs, "info", "Command parsed", { kind: command.kind });

    const outcome = await execute({ config, registry, journal, now, runId, logs }, command);
    log(logs, "info", "Run complete", { outcome: outcome.kind });

    await writeRunLogs(config.workspaceDir, runId, logs);
    return { runId, command, outcome, logs };
  } catch (err) {
    log(logs, "error", "Run failed", { error: String(err) });
    // The run's own error is the one callers see.
    await writeRunLogs(config.workspaceDir, runId, logs).catch((writeError: unknown) => deps.onLogWriteError?.(writeError));
    throw err;
  }
};
