import type { PartOfDayHours } from "../config.js";
import type { Token } from "../segmentation/tokens.js";
import { parseNumberWord } from "./numbers.js";

export interface TimeContext {
  reference: Date;
  utcOffsetMinutes: number;
  partOfDayHours: PartOfDayHours;
}

export interface TimeMatch {
  occurredAt: string;
  phrase: string;
  tokenStart: number;
  tokenEnd: number; // exclusive
}

type PartOfDay = keyof PartOfDayHours;

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

const AGO_UNITS = new Map<string, number>([
  ["minute", MINUTE_MS],
  ["minutes", MINUTE_MS],
  ["min", MINUTE_MS],
  ["mins", MINUTE_MS],
  ["hour", HOUR_MS],
  ["hours", HOUR_MS],
  ["hr", HOUR_MS],
  ["hrs", HOUR_MS],
  ["day", DAY_MS],
  ["days", DAY_MS],
]);

function partOfDay(word: string | undefined): PartOfDay | undefined {
  switch (word) {
    case "morning":
    case "afternoon":
    case "evening":
    case "night":
      return word;
    default:
      return undefined;
  }
}

/**
 * Wall-clock `hour` on the local calendar day of `reference`, shifted by
 * `dayShift` days.
 */
function atLocalHour(ctx: TimeContext, dayShift: number, hour: number): string {
  const offsetMs = ctx.utcOffsetMinutes * MINUTE_MS;
  const local = new Date(ctx.reference.getTime() + offsetMs);
  const utcMs =
    Date.UTC(local.getUTCFullYear(), local.getUTCMonth(), local.getUTCDate() + dayShift, hour) - offsetMs;
  return new Date(utcMs).toISOString();
}

function shifted(ctx: TimeContext, deltaMs: number): string {
  return new Date(ctx.reference.getTime() + deltaMs).toISOString();
}

function span(tokens: Token[], start: number, end: number, occurredAt: string): TimeMatch {
  return {
    occurredAt,
    phrase: tokens
      .slice(start, end)
      .map((t) => t.lower)
      .join(" "),
    tokenStart: start,
    tokenEnd: end,
  };
}

export function matchTimeAt(tokens: Token[], i: number, ctx: TimeContext): TimeMatch | null {
  const w0 = tokens[i]?.lower;
  const w1 = tokens[i + 1]?.lower;
  const w2 = tokens[i + 2]?.lower;
  if (w0 === undefined) return null;
  const hours = ctx.partOfDayHours;

  if (w0 === "yesterday") {
    const part = partOfDay(w1);
    return part
      ? span(tokens, i, i + 2, atLocalHour(ctx, -1, hours[part]))
      : span(tokens, i, i + 1, shifted(ctx, -DAY_MS));
  }

  if (w0 === "last" && w1 === "night") {
    return span(tokens, i, i + 2, atLocalHour(ctx, -1, hours.night));
  }

  if (w0 === "this") {
    const part = partOfDay(w1);
    if (part && part !== "night") return span(tokens, i, i + 2, atLocalHour(ctx, 0, hours[part]));
  }

  if (w0 === "in" && w1 === "the") {
    const part = partOfDay(w2);
    if (part) return span(tokens, i, i + 3, atLocalHour(ctx, 0, hours[part]));
  }

  if (w0 === "tonight") return span(tokens, i, i + 1, atLocalHour(ctx, 0, hours.night));
  if (w0 === "earlier" && w1 === "today") return span(tokens, i, i + 2, shifted(ctx, 0));
  if (w0 === "today") return span(tokens, i, i + 1, shifted(ctx, 0));

  // "20 minutes ago", "an hour ago", "two days ago"
  const amount = w0 === "a" || w0 === "an" ? 1 : parseNumberWord(w0);
  const unitMs = w1 === undefined ? undefined : AGO_UNITS.get(w1);
  if (amount !== undefined && unitMs !== undefined && w2 === "ago") {
    return span(tokens, i, i + 3, shifted(ctx, -amount * unitMs));
  }

  return null;
}

/**
 * First relative-time phrase in the clause, or null when the clause has none.
 */
export function extractOccurrence(tokens: Token[], ctx: TimeContext): TimeMatch | null {
  for (let i = 0; i < tokens.length; i++) {
    const match = matchTimeAt(tokens, i, ctx);
    if (match) return match;
  }
  return null;
}
