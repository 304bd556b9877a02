import { callClassifier } from "../classification/classifier.js";
import { resolveInterpreterConfig, type InterpreterConfig, type InterpreterConfigInput } from "../config.js";
import {
  EmptyInputError,
  ExternalServiceError,
  InterpretationAbortedError,
  InvalidUtteranceError,
} from "../errors.js";
import { decideConfirmation } from "../execution/confirmation-gate.js";
import { extractQuantity, type QuantityMatch } from "../extraction/quantity.js";
import { extractOccurrence } from "../extraction/time.js";
import { lookupUnit } from "../extraction/units.js";
import { log } from "../log.js";
import {
  buildAliasIndex,
  matchAliases,
  resolveHabitName,
  type AliasIndex,
  type AliasMatch,
  type MatchOutcome,
} from "../matching/alias-matcher.js";
import { CONJUNCTION_WORDS, segmentUtterance, type Clause } from "../segmentation/clauses.js";
import { hasWords } from "../segmentation/tokens.js";
import type {
  ClassificationResponse,
  EventIssue,
  HabitDefinition,
  InterpretationLog,
  MatchOrigin,
  ParsedEvent,
  RawUtterance,
  SemanticClassifier,
} from "../types.js";

export interface InterpretOptions {
  classifier?: SemanticClassifier;

  /**
   * Reference time for relative phrases; defaults to `utterance.receivedAt`
   */
  now?: string;

  signal?: AbortSignal;

  onWarning?: (warning: ExternalServiceError) => void;
}

export interface InterpretationReport {
  events: ParsedEvent[];
  warnings: ExternalServiceError[];
  logs: InterpretationLog[];
}

interface ClauseDraft {
  clause: Clause;
  occurredAt: string;
  quantity: QuantityMatch | null;
  outcome: MatchOutcome;
}

type Fallback =
  | { kind: "answered"; response: ClassificationResponse }
  | { kind: "failed"; error: ExternalServiceError };

function parseInstant(value: string, label: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidUtteranceError(`${label} is not a valid timestamp: "${value}"`);
  }
  return date;
}

function draftClause(clause: Clause, index: AliasIndex, config: InterpreterConfig, received: Date, reference: Date): ClauseDraft {
  const time = extractOccurrence(clause.tokens, {
    reference,
    utcOffsetMinutes: config.utcOffsetMinutes,
    partOfDayHours: config.partOfDayHours,
  });

  const consumed = new Set<number>();
  if (time) {
    for (let i = time.tokenStart; i < time.tokenEnd; i++) consumed.add(i);
  }

  return {
    clause,
    occurredAt: time ? time.occurredAt : received.toISOString(),
    quantity: extractQuantity(clause.tokens, consumed),
    outcome: matchAliases(reindex(clause), clause.text, index, config),
  };
}

// Alias matching slices phrases out of the clause text, so token offsets are
// made clause-relative.
function reindex(clause: Clause): Clause["tokens"] {
  return clause.tokens.map((t) => ({ ...t, start: t.start - clause.start, end: t.end - clause.start }));
}

function validate(habit: HabitDefinition, quantity: number | null, unit: string | null): EventIssue[] {
  const issues: EventIssue[] = [];
  if (habit.unit === "boolean" && quantity !== null) issues.push("unexpected_quantity");
  if (habit.unit === "duration" && quantity !== null && unit !== null && lookupUnit(unit)?.family !== "duration") {
    issues.push("unit_mismatch");
  }
  return issues;
}

function fuzzyConfidence(distance: number): number {
  return Math.max(0, Number((1 - 0.15 * distance).toFixed(2)));
}

function needsFallback(outcome: MatchOutcome): boolean {
  return outcome.kind === "none" || outcome.kind === "ambiguous";
}

function groundingNames(outcome: MatchOutcome, index: AliasIndex): string[] {
  const tied = outcome.kind === "ambiguous" ? outcome.candidates.map((c) => c.habit.name) : [];
  const rest = index.habits.map((h) => h.name).filter((name) => !tied.includes(name));
  return [...tied, ...rest];
}

async function mapWithConcurrency<T, R>(items: T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let next = 0;
  const worker = async () => {
    while (next < items.length) {
      const i = next++;
      results[i] = await fn(items[i]);
    }
  };
  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, worker));
  return results;
}

interface EventParts {
  habit: HabitDefinition | null;
  confidence: number;
  origin: MatchOrigin;
  matchedPhrase: string | null;
  quantity: number | null;
  unit: string | null;
  issues: EventIssue[];
  candidates: AliasMatch[];
}

function buildEvent(draft: ClauseDraft, parts: EventParts, config: InterpreterConfig): ParsedEvent {
  const confidence = parts.habit ? parts.confidence : 0;
  const decision = decideConfirmation(config, { habit: parts.habit, confidence, origin: parts.origin });
  const issues = parts.habit ? [...parts.issues, ...validate(parts.habit, parts.quantity, parts.unit)] : parts.issues;

  return {
    habitId: parts.habit?.id ?? null,
    habitName: parts.habit?.name ?? null,
    quantity: parts.quantity,
    unit: parts.unit,
    occurredAt: draft.occurredAt,
    confidence,
    rawSpan: draft.clause.text,
    status: decision.status,
    needsConfirmation: decision.needsConfirmation,
    unresolved: decision.unresolved,
    matchedPhrase: parts.matchedPhrase,
    candidates: parts.candidates.map((c) => c.habit.id),
    origin: parts.origin,
    issues,
  };
}

function localParts(draft: ClauseDraft): Pick<EventParts, "quantity" | "unit"> {
  return {
    quantity: draft.quantity?.value ?? null,
    unit: draft.quantity?.unit?.unit ?? null,
  };
}

function eventFromMatch(draft: ClauseDraft, config: InterpreterConfig): ParsedEvent {
  const { outcome } = draft;
  const local = localParts(draft);

  if (outcome.kind === "exact" || outcome.kind === "fuzzy") {
    return buildEvent(
      draft,
      {
        ...local,
        habit: outcome.match.habit,
        confidence: outcome.kind === "exact" ? 1 : fuzzyConfidence(outcome.match.distance),
        origin: outcome.kind === "exact" ? "alias" : "fuzzy",
        matchedPhrase: outcome.match.phrase,
        issues: [],
        candidates: [],
      },
      config,
    );
  }

  const candidates = outcome.kind === "ambiguous" ? outcome.candidates : [];
  return buildEvent(
    draft,
    {
      ...local,
      habit: null,
      confidence: 0,
      origin: "none",
      matchedPhrase: candidates[0]?.phrase ?? null,
      issues: candidates.length > 0 ? ["ambiguous_match"] : [],
      candidates,
    },
    config,
  );
}

function eventFromFallback(draft: ClauseDraft, fallback: Fallback, index: AliasIndex, config: InterpreterConfig): ParsedEvent {
  const candidates = draft.outcome.kind === "ambiguous" ? draft.outcome.candidates : [];
  const ambiguity: EventIssue[] = candidates.length > 0 ? ["ambiguous_match"] : [];
  const local = localParts(draft);

  if (fallback.kind === "failed") {
    return buildEvent(
      draft,
      {
        ...local,
        habit: null,
        confidence: 0,
        origin: "none",
        matchedPhrase: candidates[0]?.phrase ?? null,
        issues: [...ambiguity, "classifier_unavailable"],
        candidates,
      },
      config,
    );
  }

  const { response } = fallback;
  const owners = response.habitName ? resolveHabitName(index, response.habitName) : [];
  const habit = owners.length === 1 ? owners[0] : null;
  const unitWord = response.unit ?? null;

  return buildEvent(
    draft,
    {
      quantity: local.quantity ?? response.quantity,
      unit: local.unit ?? (unitWord ? lookupUnit(unitWord)?.unit ?? unitWord.toLowerCase() : null),
      habit,
      confidence: Math.min(response.confidence ?? config.externalConfidenceCap, config.externalConfidenceCap),
      origin: "classifier",
      matchedPhrase: response.habitName,
      issues: ambiguity,
      candidates,
    },
    config,
  );
}

/**
 * Interprets one utterance into habit events, one per clause, in clause order.
 *
 * Classifier failures never reject: the clause comes back unresolved with
 * confidence 0 and the error is reported in `warnings`.
 *
 * @throws EmptyInputError when the text is blank or punctuation only
 * @throws InvalidUtteranceError when `receivedAt` or `now` cannot be parsed
 * @throws InterpretationAbortedError when `options.signal` fires mid-call
 */
export const interpretWithReport = async (
  utterance: RawUtterance,
  knownHabits: Iterable<HabitDefinition>,
  configInput: InterpreterConfigInput = {},
  options: InterpretOptions = {},
): Promise<InterpretationReport> => {
  const logs: InterpretationLog[] = [];
  const warnings: ExternalServiceError[] = [];

  if (!hasWords(utterance.text)) throw new EmptyInputError();
  const received = parseInstant(utterance.receivedAt, "receivedAt");
  const reference = options.now === undefined ? received : parseInstant(options.now, "now");
  if (options.signal?.aborted) throw new InterpretationAbortedError(options.signal.reason);

  const config = resolveInterpreterConfig(configInput);
  const index = buildAliasIndex(knownHabits);
  const protectedPhrases = index.entries
    .filter((e) => e.words.length > 1 && e.words.some((w) => CONJUNCTION_WORDS.has(w)))
    .map((e) => e.alias);

  log(logs, "info", "Interpreting utterance", {
    source: utterance.source,
    length: utterance.text.length,
    knownHabits: index.habits.length,
  });

  const clauses = segmentUtterance(utterance.text, { protectedPhrases });
  const drafts = clauses.map((clause) => draftClause(clause, index, config, received, reference));
  log(logs, "debug", "Segmented utterance", { clauses: clauses.map((c) => c.text) });

  const { classifier } = options;
  const pending = classifier ? drafts.filter((d) => needsFallback(d.outcome)) : [];
  const fallbacks = new Map<ClauseDraft, Fallback>();

  if (classifier && pending.length > 0) {
    log(logs, "info", "Delegating clauses to classifier", { clauses: pending.length });

    const answers = await mapWithConcurrency(pending, config.maxConcurrentClassifications, async (draft): Promise<Fallback> => {
      try {
        const response = await callClassifier(
          classifier,
          { clause: draft.clause.text, knownHabitNames: groundingNames(draft.outcome, index) },
          { timeoutMs: config.classifierTimeoutMs, signal: options.signal },
        );
        return { kind: "answered", response };
      } catch (err) {
        if (err instanceof ExternalServiceError) return { kind: "failed", error: err };
        throw err;
      }
    });

    pending.forEach((draft, i) => fallbacks.set(draft, answers[i]));
  }

  const events = drafts.map((draft) => {
    const fallback = fallbacks.get(draft);
    if (!fallback) return eventFromMatch(draft, config);

    if (fallback.kind === "failed") {
      warnings.push(fallback.error);
      options.onWarning?.(fallback.error);
      log(logs, "warn", "Classifier unavailable, clause left unresolved", {
        clause: draft.clause.text,
        reason: fallback.error.reason,
      });
    }
    return eventFromFallback(draft, fallback, index, config);
  });

  log(logs, "info", "Interpretation complete", {
    events: events.length,
    resolved: events.filter((e) => e.status === "resolved").length,
    needsConfirmation: events.filter((e) => e.status === "needs_confirmation").length,
    unresolved: events.filter((e) => e.unresolved).length,
  });

  return { events, warnings, logs };
};

export const interpret = async (
  utterance: RawUtterance,
  knownHabits: Iterable<HabitDefinition>,
  config: InterpreterConfigInput = {},
  options: InterpretOptions = {},
): Promise<ParsedEvent[]> => {
  const report = await interpretWithReport(utterance, knownHabits, config, options);
  return report.events;
};
