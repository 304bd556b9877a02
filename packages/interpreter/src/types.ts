/**
 * HabitVoice Interpreter - Types and Interfaces
 *
 * Architecture Overview:
 * - Segmenter: Splits an utterance into candidate clauses
 * - AliasMatcher: Resolves clauses against the habit registry (exact, then fuzzy)
 * - Extractors: Pull quantity/unit and occurrence time out of a clause
 * - ConfirmationGate: Decides resolved / needs_confirmation / unresolved
 * - SemanticClassifier: External language-model fallback for unmatched clauses
 */

/**
 * What a habit is measured in
 */
export type HabitUnit = "count" | "duration" | "boolean";

/**
 * A habit the user tracks
 */
export interface HabitDefinition {
  /**
   * Stable identifier
   */
  id: string;

  /**
   * Canonical display name (also matched as an alias)
   */
  name: string;

  /**
   * Alternative phrases, matched case-insensitively
   */
  aliases: string[];

  /**
   * Expected measurement
   */
  unit: HabitUnit;

  /**
   * Target completions per week
   */
  weeklyGoal?: number;

  /**
   * Free-form grouping used by the ledger
   */
  category?: string;
}

export type UtteranceSource = "voice" | "text";

/**
 * One unit of raw user input
 */
export interface RawUtterance {
  text: string;
  source: UtteranceSource;

  /**
   * ISO-8601 timestamp of when the input was received
   */
  receivedAt: string;
}

export type EventStatus = "resolved" | "needs_confirmation" | "unresolved";

/**
 * Which step produced the habit match
 */
export type MatchOrigin = "alias" | "fuzzy" | "classifier" | "none";

export type EventIssue =
  | "unit_mismatch"
  | "unexpected_quantity"
  | "ambiguous_match"
  | "classifier_unavailable";

/**
 * Structured habit event produced from one clause
 */
export interface ParsedEvent {
  /**
   * Registry id, null when unresolved
   */
  habitId: string | null;

  habitName: string | null;

  quantity: number | null;

  /**
   * Canonical unit ("miles", "minutes", ...), null when no unit word was found
   */
  unit: string | null;

  /**
   * ISO-8601 timestamp the habit happened at
   */
  occurredAt: string;

  /**
   * Trust in the match, 0 to 1
   */
  confidence: number;

  /**
   * The clause text this event was read from
   */
  rawSpan: string;

  status: EventStatus;

  needsConfirmation: boolean;

  unresolved: boolean;

  /**
   * The phrase that matched (alias text, fuzzy window or classifier guess)
   */
  matchedPhrase: string | null;

  /**
   * Tied habit ids when the match was ambiguous
   */
  candidates: string[];

  origin: MatchOrigin;

  /**
   * Validation notes; these never change confidence
   */
  issues: EventIssue[];
}

/**
 * Request sent to the semantic-classification collaborator
 */
export interface ClassificationRequest {
  clause: string;

  /**
   * Habit names to ground the guess in, tied candidates first
   */
  knownHabitNames: string[];
}

export interface ClassificationResponse {
  habitName: string | null;
  quantity: number | null;
  unit?: string | null;

  /**
   * Self-reported confidence; capped by the interpreter
   */
  confidence?: number;
}

export interface ClassifyOptions {
  signal: AbortSignal;
}

/**
 * External language-model fallback. Untrusted and best-effort.
 */
export interface SemanticClassifier {
  classify(request: ClassificationRequest, options: ClassifyOptions): Promise<ClassificationResponse>;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Structured log record kept with a run
 */
export interface InterpretationLog {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
}
