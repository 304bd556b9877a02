import { matchQuantityAt, type QuantityMatch } from "../extraction/quantity.js";
import { tokenize, type Token } from "./tokens.js";

export interface Clause {
  text: string;
  start: number;
  end: number;
  tokens: Token[]; // offsets are into the full utterance
}

export interface SegmentOptions {
  /**
   * Normalized multi-word phrases (usually habit aliases) that must never be
   * split, e.g. "salt and vinegar"
   */
  protectedPhrases?: string[];
}

interface Separator {
  charStart: number;
  charEnd: number;
  before: number; // tokens before the separator end here (exclusive)
  after: number; // first token after the separator
}

const SENTENCE_BREAK = /[.!?;]+(?=\s|$)|\n+/g;

const CONJUNCTIONS: string[][] = [["as", "well", "as"], ["and", "then"], ["and"], ["then"], ["also"], ["plus"]];

export const CONJUNCTION_WORDS = new Set(CONJUNCTIONS.flat());

const FILLER = new Set([
  "i",
  "i'm",
  "i've",
  "we",
  "me",
  "my",
  "and",
  "also",
  "then",
  "plus",
  "just",
  "so",
  "well",
  "too",
  "ok",
  "okay",
  "um",
  "uh",
  "today",
  "yesterday",
  "tonight",
  "this",
  "morning",
  "afternoon",
  "evening",
  "night",
  "last",
  "earlier",
  "ago",
  "in",
  "the",
]);

function splitSentences(text: string): Array<[number, number]> {
  const ranges: Array<[number, number]> = [];
  let start = 0;
  for (const match of text.matchAll(SENTENCE_BREAK)) {
    const index = match.index ?? 0;
    ranges.push([start, index]);
    start = index + match[0].length;
  }
  ranges.push([start, text.length]);
  return ranges;
}

function findConjunctions(tokens: Token[]): Separator[] {
  const found: Separator[] = [];
  let i = 0;
  while (i < tokens.length) {
    const words = CONJUNCTIONS.find((c) => c.every((w, k) => tokens[i + k]?.lower === w));
    if (!words) {
      i++;
      continue;
    }
    const last = tokens[i + words.length - 1];
    found.push({ charStart: tokens[i].start, charEnd: last.end, before: i, after: i + words.length });
    i += words.length;
  }
  return found;
}

function findCommas(text: string, start: number, end: number, tokens: Token[]): Separator[] {
  const found: Separator[] = [];
  for (let c = start; c < end; c++) {
    if (text[c] !== ",") continue;
    if (/\d/.test(text[c - 1] ?? "") && /\d/.test(text[c + 1] ?? "")) continue; // 1,000
    const after = tokens.findIndex((t) => t.start > c);
    const index = after === -1 ? tokens.length : after;
    found.push({ charStart: c, charEnd: c + 1, before: index, after: index });
  }
  return found;
}

/**
 * Commas directly followed by a conjunction (", and then") act as one separator.
 */
function mergeSeparators(commas: Separator[], conjunctions: Separator[]): Separator[] {
  const all = [...commas, ...conjunctions].sort((a, b) => a.charStart - b.charStart);
  const merged: Separator[] = [];
  for (const sep of all) {
    const prev = merged[merged.length - 1];
    if (prev && prev.after === sep.before && prev.charEnd <= sep.charStart) {
      merged[merged.length - 1] = { charStart: prev.charStart, charEnd: sep.charEnd, before: prev.before, after: sep.after };
      continue;
    }
    merged.push(sep);
  }
  return merged;
}

function protectedRanges(tokens: Token[], phrases: string[]): Array<[number, number]> {
  const ranges: Array<[number, number]> = [];
  for (const phrase of phrases) {
    const words = phrase.split(" ");
    for (let i = 0; i + words.length <= tokens.length; i++) {
      if (words.every((w, k) => tokens[i + k].lower === w)) ranges.push([i, i + words.length]);
    }
  }
  return ranges;
}

function trailingQuantity(tokens: Token[]): QuantityMatch | null {
  for (let i = tokens.length - 1; i >= 0; i--) {
    const match = matchQuantityAt(tokens, i);
    if (match && match.tokenEnd === tokens.length) return match;
  }
  return null;
}

function shouldSplit(left: Token[], right: Token[], sep: Separator, tokens: Token[], guarded: Array<[number, number]>): boolean {
  if (guarded.some(([from, to]) => sep.before >= from && sep.after <= to && sep.after > sep.before)) return false;

  // "two and a half", "an hour and a half"
  if (tokens[sep.before]?.lower === "and" && right[0]?.lower === "a" && right[1]?.lower === "half") {
    if (trailingQuantity(left)) return false;
  }

  // "1 hour and 30 minutes"; "30 minutes and 2 sets" splits
  const leading = matchQuantityAt(right, 0);
  if (leading?.unit) {
    const before = trailingQuantity(left);
    if (before?.unit && before.unit.family === leading.unit.family) return false;
  }

  return true;
}

function isFillerOnly(tokens: Token[]): boolean {
  return tokens.every((t) => FILLER.has(t.lower));
}

function segmentSentence(text: string, start: number, end: number, options: SegmentOptions): Array<[number, number]> {
  const tokens = tokenize(text.slice(start, end), start);
  if (tokens.length === 0) return [];

  const separators = mergeSeparators(findCommas(text, start, end, tokens), findConjunctions(tokens));
  const guarded = protectedRanges(tokens, options.protectedPhrases ?? []);

  const pieces: Array<[number, number]> = [];
  let pieceStart = 0;
  separators.forEach((sep, k) => {
    const rightEnd = separators[k + 1]?.before ?? tokens.length;
    const left = tokens.slice(pieceStart, sep.before);
    const right = tokens.slice(sep.after, Math.max(sep.after, rightEnd));
    if (shouldSplit(left, right, sep, tokens, guarded)) {
      pieces.push([pieceStart, sep.before]);
      pieceStart = sep.after;
    }
  });
  pieces.push([pieceStart, tokens.length]);

  const nonEmpty = pieces.filter(([a, b]) => b > a);

  // Filler-only pieces ("this morning", "I") attach to a neighbour instead of
  // becoming clauses of their own.
  const merged: Array<[number, number]> = [];
  let carry: number | null = null;
  for (const [a, b] of nonEmpty) {
    const from: number = carry ?? a;
    carry = null;
    if (isFillerOnly(tokens.slice(a, b)) && nonEmpty.length > 1) {
      const prev = merged[merged.length - 1];
      if (prev) {
        prev[1] = b;
      } else {
        carry = from;
      }
      continue;
    }
    merged.push([from, b]);
  }
  if (carry !== null) merged.push([carry, tokens.length]);

  return merged.map(([a, b]) => [tokens[a].start, tokens[b - 1].end]);
}

/**
 * Splits an utterance into clauses on sentence boundaries, commas and
 * coordinating conjunctions, in utterance order.
 */
export function segmentUtterance(text: string, options: SegmentOptions = {}): Clause[] {
  const clauses: Clause[] = [];
  for (const [start, end] of splitSentences(text)) {
    for (const [from, to] of segmentSentence(text, start, end, options)) {
      clauses.push({ text: text.slice(from, to), start: from, end: to, tokens: tokenize(text.slice(from, to), from) });
    }
  }
  return clauses;
}
