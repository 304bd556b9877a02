/**
 * HabitVoice Interpreter
 *
 * Turns voice-transcribed or typed habit statements into structured events.
 *
 * Exports:
 * - Types and interfaces
 * - Configuration and errors
 * - interpret / interpretWithReport
 * - Command parser
 * - Classifier seam and the OpenAI-backed classifier
 */

// Types
export type {
  HabitUnit,
  HabitDefinition,
  UtteranceSource,
  RawUtterance,
  EventStatus,
  MatchOrigin,
  EventIssue,
  ParsedEvent,
  ClassificationRequest,
  ClassificationResponse,
  ClassifyOptions,
  SemanticClassifier,
  LogLevel,
  InterpretationLog,
} from "./types.js";

// Configuration
export {
  DEFAULT_INTERPRETER_CONFIG,
  MAX_EXTERNAL_CONFIDENCE,
  resolveInterpreterConfig,
  loadInterpreterConfigFromEnv,
  loadClassifierSettingsFromEnv,
  type InterpreterConfig,
  type InterpreterConfigInput,
  type FuzzyTolerance,
  type PartOfDayHours,
  type ClassifierSettings,
} from "./config.js";

// Errors
export {
  HabitVoiceError,
  EmptyInputError,
  InvalidUtteranceError,
  ExternalServiceError,
  InterpretationAbortedError,
  ConfigError,
  isHabitVoiceError,
  type HabitVoiceErrorCode,
  type ExternalServiceFailure,
} from "./errors.js";

// Interpretation
export {
  interpret,
  interpretWithReport,
  type InterpretOptions,
  type InterpretationReport,
} from "./orchestrator/interpret.js";
export { segmentUtterance, type Clause } from "./segmentation/clauses.js";
export { normalizePhrase } from "./segmentation/tokens.js";
export { buildAliasIndex, resolveHabitName, type AliasIndex, type FuzzySettings } from "./matching/alias-matcher.js";
export { decideConfirmation, type ConfirmationDecision } from "./execution/confirmation-gate.js";
export { lookupUnit, type UnitFamily } from "./extraction/units.js";

// Commands
export { parseCommand, type HabitCommand, type HabitCommandKind, type HabitReference } from "./commands/command-parser.js";

// Classifiers
export { callClassifier, createStaticClassifier, type StaticClassification } from "./classification/classifier.js";
export {
  createOpenAIClassifier,
  buildClassifierPrompt,
  parseClassifierReply,
  type OpenAIClassifierOptions,
  type ChatCompletionsClient,
} from "./classification/openai-classifier.js";

export { log } from "./log.js";

// Convenience wrapper
import { createOpenAIClassifier } from "./classification/openai-classifier.js";
import { loadClassifierSettingsFromEnv, loadInterpreterConfigFromEnv } from "./config.js";
import { parseCommand } from "./commands/command-parser.js";
import type { HabitCommand } from "./commands/command-parser.js";
import type { HabitDefinition, UtteranceSource } from "./types.js";

export interface ParseHabitTextOptions {
  text: string;
  habits: HabitDefinition[];
  source?: UtteranceSource;
  receivedAt?: string;
  env?: Record<string, string | undefined>;
  signal?: AbortSignal;
}

/**
 * Parses text with settings taken from the environment; the language-model
 * fallback is enabled only when OPENAI_API_KEY is set.
 */
export async function parseHabitText(options: ParseHabitTextOptions): Promise<HabitCommand> {
  const env = options.env ?? process.env;
  const config = loadInterpreterConfigFromEnv(env);
  const settings = loadClassifierSettingsFromEnv(env);

  return parseCommand(
    {
      text: options.text,
      source: options.source ?? "text",
      receivedAt: options.receivedAt ?? new Date().toISOString(),
    },
    options.habits,
    config,
    {
      classifier: settings ? createOpenAIClassifier(settings) : undefined,
      signal: options.signal,
    },
  );
}
