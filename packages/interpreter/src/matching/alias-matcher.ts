import type { InterpreterConfig } from "../config.js";
import { normalizePhrase, type Token } from "../segmentation/tokens.js";
import type { HabitDefinition } from "../types.js";
import { editDistance } from "./edit-distance.js";

export interface AliasEntry {
  habit: HabitDefinition;
  alias: string; // normalized, space-joined
  words: string[];
}

export interface AliasIndex {
  habits: HabitDefinition[];
  entries: AliasEntry[];
  byPhrase: Map<string, HabitDefinition[]>;
}

export interface AliasMatch {
  habit: HabitDefinition;
  alias: string;
  phrase: string; // text as it appears in the utterance
  distance: number;
  tokenStart: number;
  tokenEnd: number;
}

export type MatchOutcome =
  | { kind: "exact"; match: AliasMatch }
  | { kind: "fuzzy"; match: AliasMatch }
  | { kind: "ambiguous"; candidates: AliasMatch[] }
  | { kind: "none" };

export function buildAliasIndex(habits: Iterable<HabitDefinition>): AliasIndex {
  const list = Array.from(habits);
  const entries: AliasEntry[] = [];
  const byPhrase = new Map<string, HabitDefinition[]>();

  for (const habit of list) {
    const seen = new Set<string>();
    for (const raw of [habit.name, ...habit.aliases]) {
      const alias = normalizePhrase(raw);
      if (!alias || seen.has(alias)) continue;
      seen.add(alias);
      entries.push({ habit, alias, words: alias.split(" ") });

      const owners = byPhrase.get(alias) ?? [];
      owners.push(habit);
      byPhrase.set(alias, owners);
    }
  }

  return { habits: list, entries, byPhrase };
}

/**
 * Registry habits whose name or alias equals `name` (case-insensitive).
 */
export function resolveHabitName(index: AliasIndex, name: string): HabitDefinition[] {
  return index.byPhrase.get(normalizePhrase(name)) ?? [];
}

export type FuzzySettings = Pick<InterpreterConfig, "fuzzyTolerance" | "minFuzzyAliasLength">;

/**
 * Aliases shorter than `minFuzzyAliasLength` only match exactly; the others
 * take the configured tolerance.
 */
export function effectiveTolerance(alias: string, fuzzy: FuzzySettings): number {
  return alias.length < fuzzy.minFuzzyAliasLength ? 0 : fuzzy.fuzzyTolerance;
}

const NUMERIC = /\d/;

function collectMatches(
  tokens: Token[],
  source: string,
  index: AliasIndex,
  settings: FuzzySettings,
): { exact: AliasMatch[]; fuzzy: AliasMatch[] } {
  const exact: AliasMatch[] = [];
  const fuzzy: AliasMatch[] = [];

  for (const entry of index.entries) {
    const width = entry.words.length;
    const limit = effectiveTolerance(entry.alias, settings);

    for (let start = 0; start + width <= tokens.length; start++) {
      const window = tokens.slice(start, start + width);
      const match = (distance: number): AliasMatch => ({
        habit: entry.habit,
        alias: entry.alias,
        phrase: source.slice(window[0].start, window[width - 1].end),
        distance,
        tokenStart: start,
        tokenEnd: start + width,
      });

      if (window.every((t, k) => t.lower === entry.words[k])) {
        exact.push(match(0));
        continue;
      }
      if (limit === 0 || window.some((t) => NUMERIC.test(t.lower))) continue;

      const distance = editDistance(window.map((t) => t.lower).join(" "), entry.alias, limit);
      if (distance <= limit) fuzzy.push(match(distance));
    }
  }

  return { exact, fuzzy };
}

function bestPerHabit(matches: AliasMatch[], better: (a: AliasMatch, b: AliasMatch) => boolean): AliasMatch[] {
  const best = new Map<string, AliasMatch>();
  for (const m of matches) {
    const current = best.get(m.habit.id);
    if (!current || better(m, current)) best.set(m.habit.id, m);
  }
  return Array.from(best.values());
}

function registryOrder(index: AliasIndex, matches: AliasMatch[]): AliasMatch[] {
  const position = new Map(index.habits.map((h, i) => [h.id, i]));
  return [...matches].sort((a, b) => (position.get(a.habit.id) ?? 0) - (position.get(b.habit.id) ?? 0));
}

/**
 * Exact beats fuzzy. Among exact hits the longest alias wins; among fuzzy
 * hits the lowest distance wins. Different habits left tied are ambiguous.
 */
export function matchAliases(
  tokens: Token[],
  source: string,
  index: AliasIndex,
  settings: FuzzySettings,
): MatchOutcome {
  const { exact, fuzzy } = collectMatches(tokens, source, index, settings);

  if (exact.length > 0) {
    const perHabit = bestPerHabit(
      exact,
      (a, b) => a.alias.length > b.alias.length || (a.alias.length === b.alias.length && a.tokenStart < b.tokenStart),
    );
    const longest = Math.max(...perHabit.map((m) => m.alias.length));
    const tied = perHabit.filter((m) => m.alias.length === longest);
    return tied.length === 1
      ? { kind: "exact", match: tied[0] }
      : { kind: "ambiguous", candidates: registryOrder(index, tied) };
  }

  if (fuzzy.length > 0) {
    const perHabit = bestPerHabit(
      fuzzy,
      (a, b) =>
        a.distance < b.distance ||
        (a.distance === b.distance && a.alias.length > b.alias.length) ||
        (a.distance === b.distance && a.alias.length === b.alias.length && a.tokenStart < b.tokenStart),
    );
    const lowest = Math.min(...perHabit.map((m) => m.distance));
    const tied = perHabit.filter((m) => m.distance === lowest);
    return tied.length === 1
      ? { kind: "fuzzy", match: tied[0] }
      : { kind: "ambiguous", candidates: registryOrder(index, tied) };
  }

  return { kind: "none" };
}
