import type { Token } from "../segmentation/tokens.js";
import { parseNumberWord } from "./numbers.js";
import { lookupUnit, type UnitEntry } from "./units.js";

export interface QuantityMatch {
  value: number;
  unit: UnitEntry | null;
  tokenStart: number;
  tokenEnd: number; // exclusive
}

const GLUED_UNIT = /^(\d+(?:\.\d+)?)([a-z]+)$/;
const ARTICLES = new Set(["a", "an"]);

function readAmount(tokens: Token[], i: number): { value: number; next: number; fractional: boolean } | null {
  const word = tokens[i]?.lower;
  const following = tokens[i + 1]?.lower;
  if (word === undefined) return null;

  if (word === "half") return { value: 0.5, next: i + 1, fractional: true };
  if (word === "quarter") return { value: 0.25, next: i + 1, fractional: true };
  if (ARTICLES.has(word) && following === "half") return { value: 0.5, next: i + 2, fractional: true };
  if (word === "a" && following === "quarter") return { value: 0.25, next: i + 2, fractional: true };

  const value = parseNumberWord(word);
  if (value === undefined) return null;

  // "two and a half"
  if (followsWithHalf(tokens, i + 1)) {
    return { value: value + 0.5, next: i + 4, fractional: false };
  }
  return { value, next: i + 1, fractional: false };
}

function readUnit(tokens: Token[], j: number, allowArticle: boolean): { unit: UnitEntry; next: number } | null {
  const word = tokens[j]?.lower;
  if (word === undefined) return null;

  // "half an hour"
  if (allowArticle && ARTICLES.has(word)) {
    const after = tokens[j + 1];
    const unit = after ? lookupUnit(after.lower) : undefined;
    return unit ? { unit, next: j + 2 } : null;
  }

  const unit = lookupUnit(word);
  return unit ? { unit, next: j + 1 } : null;
}

function followsWithHalf(tokens: Token[], j: number): boolean {
  return tokens[j]?.lower === "and" && tokens[j + 1]?.lower === "a" && tokens[j + 2]?.lower === "half";
}

// "an hour and a half", "2 miles and a half"
function extendWithHalf(tokens: Token[], match: QuantityMatch): QuantityMatch {
  if (!match.unit || !followsWithHalf(tokens, match.tokenEnd)) return match;
  return { ...match, value: match.value + 0.5, tokenEnd: match.tokenEnd + 3 };
}

/**
 * Matches a quantity phrase starting exactly at token `i`.
 */
export function matchQuantityAt(tokens: Token[], i: number): QuantityMatch | null {
  const token = tokens[i];
  if (!token) return null;

  const glued = GLUED_UNIT.exec(token.lower);
  if (glued) {
    const unit = lookupUnit(glued[2]);
    if (unit) return extendWithHalf(tokens, { value: Number(glued[1]), unit, tokenStart: i, tokenEnd: i + 1 });
  }

  // "an hour", "a lap"
  if (ARTICLES.has(token.lower)) {
    const next = tokens[i + 1];
    const unit = next ? lookupUnit(next.lower) : undefined;
    if (unit) return extendWithHalf(tokens, { value: 1, unit, tokenStart: i, tokenEnd: i + 2 });
  }

  const amount = readAmount(tokens, i);
  if (!amount) return null;

  const unit = readUnit(tokens, amount.next, amount.fractional);
  if (!unit) return { value: amount.value, unit: null, tokenStart: i, tokenEnd: amount.next };

  const match = { value: amount.value, unit: unit.unit, tokenStart: i, tokenEnd: unit.next };
  return amount.fractional ? match : extendWithHalf(tokens, match);
}

/**
 * First quantity phrase left to right whose tokens are not already consumed.
 */
export function extractQuantity(tokens: Token[], consumed: ReadonlySet<number> = new Set()): QuantityMatch | null {
  for (let i = 0; i < tokens.length; i++) {
    if (consumed.has(i)) continue;
    const match = matchQuantityAt(tokens, i);
    if (!match) continue;

    let overlaps = false;
    for (let k = match.tokenStart; k < match.tokenEnd; k++) {
      if (consumed.has(k)) overlaps = true;
    }
    if (!overlaps) return match;
  }
  return null;
}
