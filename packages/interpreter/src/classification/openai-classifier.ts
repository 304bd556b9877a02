import axios from "axios";
import { z } from "zod";
import { DEFAULT_CLASSIFIER_BASE_URL, DEFAULT_CLASSIFIER_MODEL, type ClassifierSettings } from "../config.js";
import { ExternalServiceError } from "../errors.js";
import type { ClassificationRequest, ClassificationResponse, ClassifyOptions, SemanticClassifier } from "../types.js";

/**
 * The slice of an HTTP client the classifier uses; `axios` satisfies it.
 */
export interface ChatCompletionsClient {
  post(
    url: string,
    body: unknown,
    config: { headers: Record<string, string>; signal: AbortSignal },
  ): Promise<{ data: unknown }>;
}

export interface OpenAIClassifierOptions extends Partial<ClassifierSettings> {
  apiKey: string;
  http?: ChatCompletionsClient;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

const GuessSchema = z.object({
  habit: z.string().nullable().optional(),
  quantity: z.coerce.number().nullable().optional(),
  unit: z.string().nullable().optional(),
  confidence: z.number().min(0).max(1).optional(),
});

const SYSTEM_PROMPT = "You are a habit tracking assistant. Always respond with valid JSON only.";

export function buildClassifierPrompt(request: ClassificationRequest): string {
  return [
    `Identify the habit in this statement from a habit tracker: "${request.clause}"`,
    "",
    `Known habits: ${request.knownHabitNames.join(", ") || "(none)"}`,
    "",
    "Return JSON with these fields:",
    "- habit: one of the known habits, or null if none applies",
    "- quantity: number mentioned for the habit, or null",
    '- unit: unit of the quantity (e.g. "minutes", "miles", "glasses"), or null',
    "- confidence: how sure you are, from 0 to 1",
    "",
    'Example: {"habit": "reading", "quantity": 30, "unit": "minutes", "confidence": 0.8}',
  ].join("\n");
}

/**
 * Strips markdown code fences the model sometimes wraps JSON in.
 */
export function extractJson(text: string): string {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  return (fenced ? fenced[1] : text).trim();
}

export function parseClassifierReply(text: string): ClassificationResponse {
  let json: unknown;
  try {
    json = JSON.parse(extractJson(text));
  } catch (err) {
    throw new ExternalServiceError("invalid_response", "Classifier reply is not JSON", { cause: err });
  }

  const guess = GuessSchema.safeParse(json);
  if (!guess.success) {
    throw new ExternalServiceError("invalid_response", "Classifier reply has the wrong shape", { cause: guess.error });
  }

  const habit = guess.data.habit?.trim();
  return {
    habitName: habit ? habit : null,
    quantity: guess.data.quantity ?? null,
    unit: guess.data.unit?.trim() || null,
    confidence: guess.data.confidence,
  };
}

export function createOpenAIClassifier(options: OpenAIClassifierOptions): SemanticClassifier {
  const http: ChatCompletionsClient = options.http ?? axios;
  const model = options.model ?? DEFAULT_CLASSIFIER_MODEL;
  const baseUrl = (options.baseUrl ?? DEFAULT_CLASSIFIER_BASE_URL).replace(/\/+$/, "");

  return {
    async classify(request: ClassificationRequest, { signal }: ClassifyOptions): Promise<ClassificationResponse> {
      let data: unknown;
      try {
        const response = await http.post(
          `${baseUrl}/chat/completions`,
          {
            model,
            temperature: 0.1,
            max_tokens: 200,
            messages: [
              { role: "system", content: SYSTEM_PROMPT },
              { role: "user", content: buildClassifierPrompt(request) },
            ],
          },
          {
            headers: { Authorization: `Bearer ${options.apiKey}` },
            signal,
          },
        );
        data = response.data;
      } catch (err) {
        if (axios.isAxiosError(err) && err.response) {
          throw new ExternalServiceError("http_status", `Classifier endpoint returned ${err.response.status}`, {
            clause: request.clause,
            cause: err,
          });
        }
        throw new ExternalServiceError("unreachable", "Classifier endpoint is unreachable", {
          clause: request.clause,
          cause: err,
        });
      }

      const completion = ChatCompletionSchema.safeParse(data);
      if (!completion.success) {
        throw new ExternalServiceError("invalid_response", "Unexpected chat completion payload", {
          clause: request.clause,
          cause: completion.error,
        });
      }
      return parseClassifierReply(completion.data.choices[0].message.content ?? "");
    },
  };
}
