import { resolveInterpreterConfig, type InterpreterConfigInput } from "../config.js";
import { EmptyInputError } from "../errors.js";
import { buildAliasIndex, matchAliases, type AliasIndex, type FuzzySettings } from "../matching/alias-matcher.js";
import { interpretWithReport, type InterpretationReport, type InterpretOptions } from "../orchestrator/interpret.js";
import { hasWords, tokenize } from "../segmentation/tokens.js";
import type { HabitDefinition, RawUtterance } from "../types.js";

export type HabitReference = {
  phrase: string;
  habitId: string | null;
};

export type HabitCommand =
  | { kind: "log"; report: InterpretationReport }
  | { kind: "add_habit"; habits: HabitReference[] }
  | { kind: "delete_habit"; habits: HabitReference[] }
  | { kind: "set_goal"; habit: HabitReference; target: number }
  | { kind: "streak_query"; habit: HabitReference | null }
  | { kind: "query"; habit: HabitReference }
  | { kind: "progress_query" }
  | { kind: "dashboard" }
  | { kind: "help" }
  | { kind: "export" }
  | { kind: "confirm" }
  | { kind: "cancel" };

export type HabitCommandKind = HabitCommand["kind"];

const GOAL_PATTERNS = [
  /^set (?:a )?goal (?:for )?(.+?) (?:to )?(\d+) times? (?:per|a|each) week$/,
  /^i want to do (.+?) (\d+) times? (?:per|a|each) week$/,
  /^goal for (.+?) is (\d+)(?: times?)? (?:per|a|each) week$/,
  /^(.+?) goal (\d+) times? weekly$/,
  /^target (.+?) (\d+) times? (?:per|a) week$/,
];

const QUERY = /^(?:show|check|view|list)(?: me)? (?:my )?(.+?) (?:logs?|history|entries|records)$/;

const STREAK_KEYWORDS = ["streak", "how many days", "consecutive", "in a row"];
const PROGRESS_KEYWORDS = ["how am i doing", "weekly progress", "this week's progress", "my progress", "progress report"];
const DASHBOARD_KEYWORDS = ["dashboard", "stats", "analytics", "show my", "report"];

const CONFIRM = /^(?:yes|yep|yeah|confirm|correct|that's right)(?:,? (?:please|thanks|do it))?$/;
const CANCEL = /^(?:no|nope|cancel|wrong|not correct)(?:,? (?:thanks|cancel it))?$/;
const HELP = /^(?:help|how do i use this|instructions)\b|\bwhat can i say\b/;
const EXPORT = /^(?:export|download|backup|back up)\b|\bsave (?:my )?data\b/;
const ADD = /^(?:please )?(?:add|create|start tracking) (?:a )?(?:new )?(.+?)(?: habits?)?$/;
const DELETE = /^(?:please )?(?:delete|remove|stop tracking) (?:the )?(.+?)(?: habits?)?$/;

function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/’/g, "'")
    .replace(/[.!?]+$/, "")
    .replace(/\s+/g, " ")
    .trim();
}

function containsKeyword(text: string, keywords: string[]): boolean {
  return keywords.some((k) => new RegExp(`\\b${k}\\b`).test(text));
}

function referenceHabit(phrase: string, index: AliasIndex, fuzzy: FuzzySettings): HabitReference {
  const outcome = matchAliases(tokenize(phrase), phrase, index, fuzzy);
  const habitId = outcome.kind === "exact" || outcome.kind === "fuzzy" ? outcome.match.habit.id : null;
  return { phrase, habitId };
}

function splitHabitList(phrase: string): string[] {
  return phrase
    .split(/\s*(?:,|\band\b)\s*/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/**
 * Recognises whole-utterance commands; anything else is a log statement and is
 * interpreted into events.
 */
export async function parseCommand(
  utterance: RawUtterance,
  knownHabits: Iterable<HabitDefinition>,
  configInput: InterpreterConfigInput = {},
  options: InterpretOptions = {},
): Promise<HabitCommand> {
  const text = normalize(utterance.text);
  if (!hasWords(text)) throw new EmptyInputError();

  const habits = Array.from(knownHabits);
  const index = buildAliasIndex(habits);
  const fuzzy = resolveInterpreterConfig(configInput);

  for (const pattern of GOAL_PATTERNS) {
    const match = pattern.exec(text);
    if (match) {
      return { kind: "set_goal", habit: referenceHabit(match[1], index, fuzzy), target: Number(match[2]) };
    }
  }

  if (containsKeyword(text, STREAK_KEYWORDS)) {
    const outcome = matchAliases(tokenize(text), text, index, fuzzy);
    return {
      kind: "streak_query",
      habit: outcome.kind === "exact" || outcome.kind === "fuzzy"
        ? { phrase: outcome.match.phrase, habitId: outcome.match.habit.id }
        : null,
    };
  }

  const query = QUERY.exec(text);
  if (query) return { kind: "query", habit: referenceHabit(query[1], index, fuzzy) };

  if (containsKeyword(text, PROGRESS_KEYWORDS)) return { kind: "progress_query" };
  if (containsKeyword(text, DASHBOARD_KEYWORDS)) return { kind: "dashboard" };
  if (CONFIRM.test(text)) return { kind: "confirm" };
  if (CANCEL.test(text)) return { kind: "cancel" };
  if (HELP.test(text)) return { kind: "help" };
  if (EXPORT.test(text)) return { kind: "export" };

  const add = ADD.exec(text);
  if (add) {
    return { kind: "add_habit", habits: splitHabitList(add[1]).map((p) => referenceHabit(p, index, fuzzy)) };
  }

  const remove = DELETE.exec(text);
  if (remove) {
    return { kind: "delete_habit", habits: splitHabitList(remove[1]).map((p) => referenceHabit(p, index, fuzzy)) };
  }

  return { kind: "log", report: await interpretWithReport(utterance, habits, configInput, options) };
}
