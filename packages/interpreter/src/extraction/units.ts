import { readFileSync } from "node:fs";
import { z } from "zod";

export type UnitFamily = "duration" | "distance" | "volume" | "weight" | "count";

export interface UnitEntry {
  unit: string;
  family: UnitFamily;
}

const FAMILIES: UnitFamily[] = ["duration", "distance", "volume", "weight", "count"];

const UnitGroupSchema = z.record(z.string(), z.array(z.string().min(1))).default({});

const UnitLexiconSchema = z.object({
  duration: UnitGroupSchema,
  distance: UnitGroupSchema,
  volume: UnitGroupSchema,
  weight: UnitGroupSchema,
  count: UnitGroupSchema,
});

function loadLexicon(): Map<string, UnitEntry> {
  const raw = readFileSync(new URL("../../data/units.json", import.meta.url), "utf-8");
  const parsed = UnitLexiconSchema.parse(JSON.parse(raw));
  const lexicon = new Map<string, UnitEntry>();
  for (const family of FAMILIES) {
    for (const [unit, words] of Object.entries(parsed[family])) {
      for (const word of words) {
        lexicon.set(word.toLowerCase(), { unit, family });
      }
    }
  }
  return lexicon;
}

const LEXICON = loadLexicon();

export function lookupUnit(word: string): UnitEntry | undefined {
  return LEXICON.get(word.toLowerCase());
}

export function isUnitWord(word: string): boolean {
  return LEXICON.has(word.toLowerCase());
}
