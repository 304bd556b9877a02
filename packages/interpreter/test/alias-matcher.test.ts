import { describe, it, expect } from "vitest";
import {
  buildAliasIndex,
  effectiveTolerance,
  matchAliases,
  resolveHabitName,
} from "../src/matching/alias-matcher.js";
import { editDistance } from "../src/matching/edit-distance.js";
import { tokenize } from "../src/segmentation/tokens.js";
import type { HabitDefinition } from "../src/types.js";
import { HABITS } from "./fixtures.js";

const match = (text: string, habits: HabitDefinition[] = HABITS, fuzzyTolerance: 0 | 1 | 2 = 1) =>
  matchAliases(tokenize(text), text, buildAliasIndex(habits), { fuzzyTolerance, minFuzzyAliasLength: 4 });

describe("editDistance", () => {
  it("counts edits", () => {
    expect(editDistance("yoga", "yoga")).toBe(0);
    expect(editDistance("kitten", "sitting")).toBe(3);
    expect(editDistance("", "run")).toBe(3);
  });

  it("stops once the limit is exceeded", () => {
    expect(editDistance("meditation", "running", 1)).toBe(2);
  });
});

describe("effectiveTolerance", () => {
  it("keeps short aliases exact", () => {
    expect(effectiveTolerance("run", { fuzzyTolerance: 2, minFuzzyAliasLength: 4 })).toBe(0);
    expect(effectiveTolerance("run", { fuzzyTolerance: 2, minFuzzyAliasLength: 3 })).toBe(2);
  });

  it("applies the configured tolerance to longer aliases", () => {
    expect(effectiveTolerance("yoga", { fuzzyTolerance: 2, minFuzzyAliasLength: 4 })).toBe(2);
    expect(effectiveTolerance("meditation", { fuzzyTolerance: 1, minFuzzyAliasLength: 4 })).toBe(1);
    expect(effectiveTolerance("meditation", { fuzzyTolerance: 0, minFuzzyAliasLength: 4 })).toBe(0);
  });
});

describe("matchAliases", () => {
  it("matches case-insensitively", () => {
    const outcome = match("Did YOGA");
    expect(outcome.kind).toBe("exact");
    if (outcome.kind === "exact") {
      expect(outcome.match.habit.id).toBe("yoga");
      expect(outcome.match.phrase).toBe("YOGA");
    }
  });

  it("prefers the longest exact alias across habits", () => {
    const habits: HabitDefinition[] = [
      { id: "water", name: "water", aliases: [], unit: "count" },
      { id: "sparkling", name: "sparkling water", aliases: [], unit: "count" },
    ];
    const outcome = match("drank sparkling water", habits);
    expect(outcome.kind === "exact" && outcome.match.habit.id).toBe("sparkling");
  });

  it("reports equally long exact aliases of different habits as ambiguous", () => {
    const habits: HabitDefinition[] = [
      { id: "a", name: "stretch", aliases: [], unit: "duration" },
      { id: "b", name: "pilates", aliases: [], unit: "duration" },
    ];
    const outcome = match("pilates stretch", habits);
    expect(outcome.kind).toBe("ambiguous");
    if (outcome.kind === "ambiguous") {
      expect(outcome.candidates.map((c) => c.habit.id)).toEqual(["a", "b"]);
    }
  });

  it("never fuzzy-matches windows containing digits", () => {
    const habits: HabitDefinition[] = [{ id: "k", name: "5km run", aliases: [], unit: "count" }];
    expect(match("6km run", habits, 2).kind).toBe("none");
  });

  it("honours a tolerance of two on short habit names", () => {
    expect(match("did yoag").kind).toBe("none");
    const outcome = match("did yoag", HABITS, 2);
    expect(outcome.kind === "fuzzy" && [outcome.match.habit.id, outcome.match.distance]).toEqual(["yoga", 2]);
  });

  it("returns none when nothing is close", () => {
    expect(match("went to the pool").kind).toBe("none");
  });
});

describe("resolveHabitName", () => {
  it("finds habits by name or alias", () => {
    const index = buildAliasIndex(HABITS);
    expect(resolveHabitName(index, "Drinking  Water").map((h) => h.id)).toEqual(["water"]);
    expect(resolveHabitName(index, "drank water").map((h) => h.id)).toEqual(["water"]);
    expect(resolveHabitName(index, "swimming")).toEqual([]);
  });
});
