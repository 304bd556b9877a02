import { z } from "zod";
import { ConfigError } from "./errors.js";

export type FuzzyTolerance = 0 | 1 | 2;

export interface PartOfDayHours {
  morning: number;
  afternoon: number;
  evening: number;
  night: number;
}

export interface InterpreterConfig {
  acceptanceThreshold: number; // below this an event needs confirmation
  fuzzyTolerance: FuzzyTolerance; // max edit distance for alias matching
  minFuzzyAliasLength: number; // shorter aliases only match exactly
  classifierTimeoutMs: number;
  externalConfidenceCap: number; // ceiling for classifier-sourced confidence, at most 0.7
  maxConcurrentClassifications: number;
  utcOffsetMinutes: number; // local wall clock used for "this morning", "yesterday", ...
  partOfDayHours: PartOfDayHours;
}

export type InterpreterConfigInput = Partial<Omit<InterpreterConfig, "partOfDayHours">> & {
  partOfDayHours?: Partial<PartOfDayHours>;
};

export const MAX_EXTERNAL_CONFIDENCE = 0.7;

export const DEFAULT_INTERPRETER_CONFIG: InterpreterConfig = {
  acceptanceThreshold: 0.9,
  fuzzyTolerance: 1,
  minFuzzyAliasLength: 4,
  classifierTimeoutMs: 5000,
  externalConfidenceCap: MAX_EXTERNAL_CONFIDENCE,
  maxConcurrentClassifications: 4,
  utcOffsetMinutes: 0,
  partOfDayHours: {
    morning: 8,
    afternoon: 14,
    evening: 19,
    night: 21,
  },
};

const hour = z.number().int().min(0).max(23);

const InterpreterConfigSchema = z.object({
  acceptanceThreshold: z.number().min(0).max(1),
  fuzzyTolerance: z.union([z.literal(0), z.literal(1), z.literal(2)]),
  minFuzzyAliasLength: z.number().int().min(1),
  classifierTimeoutMs: z.number().int().positive(),
  externalConfidenceCap: z.number().min(0).max(MAX_EXTERNAL_CONFIDENCE),
  maxConcurrentClassifications: z.number().int().min(1),
  utcOffsetMinutes: z.number().int().min(-14 * 60).max(14 * 60),
  partOfDayHours: z.object({
    morning: hour,
    afternoon: hour,
    evening: hour,
    night: hour,
  }),
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`).join("; ");
}

export function resolveInterpreterConfig(input: InterpreterConfigInput = {}): InterpreterConfig {
  const merged = {
    ...DEFAULT_INTERPRETER_CONFIG,
    ...input,
    partOfDayHours: { ...DEFAULT_INTERPRETER_CONFIG.partOfDayHours, ...input.partOfDayHours },
  };
  const parsed = InterpreterConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid interpreter config: ${describeIssues(parsed.error)}`, parsed.error);
  }
  return parsed.data;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string): number | undefined {
  const raw = env[key]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function readTolerance(env: Env, key: string): FuzzyTolerance | undefined {
  const value = readNumber(env, key);
  if (value === undefined) return undefined;
  if (value === 0 || value === 1 || value === 2) return value;
  throw new ConfigError(`${key} must be 0, 1 or 2, got ${value}`);
}

/**
 * Reads HABITVOICE_* overrides and validates them against the defaults.
 */
export function loadInterpreterConfigFromEnv(env: Env = process.env): InterpreterConfig {
  const input: InterpreterConfigInput = {};

  const threshold = readNumber(env, "HABITVOICE_ACCEPTANCE_THRESHOLD");
  if (threshold !== undefined) input.acceptanceThreshold = threshold;

  const tolerance = readTolerance(env, "HABITVOICE_FUZZY_TOLERANCE");
  if (tolerance !== undefined) input.fuzzyTolerance = tolerance;

  const minLength = readNumber(env, "HABITVOICE_MIN_FUZZY_ALIAS_LENGTH");
  if (minLength !== undefined) input.minFuzzyAliasLength = minLength;

  const timeout = readNumber(env, "HABITVOICE_CLASSIFIER_TIMEOUT_MS");
  if (timeout !== undefined) input.classifierTimeoutMs = timeout;

  const offset = readNumber(env, "HABITVOICE_UTC_OFFSET_MINUTES");
  if (offset !== undefined) input.utcOffsetMinutes = offset;

  return resolveInterpreterConfig(input);
}

export interface ClassifierSettings {
  apiKey: string;
  model: string;
  baseUrl: string;
}

export const DEFAULT_CLASSIFIER_MODEL = "gpt-3.5-turbo";
export const DEFAULT_CLASSIFIER_BASE_URL = "https://api.openai.com/v1";

/**
 * Returns null when no API key is set; interpretation then runs without the
 * language-model fallback.
 */
export function loadClassifierSettingsFromEnv(env: Env = process.env): ClassifierSettings | null {
  const apiKey = env.OPENAI_API_KEY?.trim();
  if (!apiKey) return null;
  return {
    apiKey,
    model: env.OPENAI_MODEL?.trim() || DEFAULT_CLASSIFIER_MODEL,
    baseUrl: (env.OPENAI_BASE_URL?.trim() || DEFAULT_CLASSIFIER_BASE_URL).replace(/\/+$/, ""),
  };
}
