import { z } from "zod";
import { ExternalServiceError, HabitVoiceError, InterpretationAbortedError } from "../errors.js";
import type { ClassificationRequest, ClassificationResponse, SemanticClassifier } from "../types.js";

const ClassificationResponseSchema = z.object({
  habitName: z.string().trim().min(1).nullable(),
  quantity: z.number().finite().nonnegative().nullable(),
  unit: z.string().trim().min(1).nullable().optional(),
  confidence: z.number().min(0).max(1).optional(),
});

export interface ClassifierCallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Runs one classifier request under a timeout. The classifier's own signal is
 * aborted on timeout or when `options.signal` fires.
 *
 * @throws ExternalServiceError on timeout, transport failure or a malformed reply
 * @throws InterpretationAbortedError when the caller cancelled
 */
export async function callClassifier(
  classifier: SemanticClassifier,
  request: ClassificationRequest,
  options: ClassifierCallOptions,
): Promise<ClassificationResponse> {
  const { signal: parent, timeoutMs } = options;
  if (parent?.aborted) throw new InterpretationAbortedError(parent.reason);

  const controller = new AbortController();
  let interrupt: (reason: unknown) => void = () => {};
  const interrupted = new Promise<never>((_, reject) => {
    interrupt = reject;
  });

  // Settle the race before aborting, so the classifier's own abort rejection
  // never wins it.
  const timer = setTimeout(() => {
    interrupt(new ExternalServiceError("timeout", `Classifier timed out after ${timeoutMs}ms`, { clause: request.clause }));
    controller.abort();
  }, timeoutMs);

  const onParentAbort = () => {
    interrupt(new InterpretationAbortedError(parent?.reason));
    controller.abort(parent?.reason);
  };
  parent?.addEventListener("abort", onParentAbort, { once: true });

  try {
    const raw = await Promise.race([classifier.classify(request, { signal: controller.signal }), interrupted]);
    const parsed = ClassificationResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ExternalServiceError("invalid_response", "Classifier returned a malformed response", {
        clause: request.clause,
        cause: parsed.error,
      });
    }
    return parsed.data;
  } catch (err) {
    if (parent?.aborted) {
      throw err instanceof InterpretationAbortedError ? err : new InterpretationAbortedError(err);
    }
    if (err instanceof ExternalServiceError) {
      throw err.clause === undefined ? err.withClause(request.clause) : err;
    }
    if (err instanceof HabitVoiceError) throw err;
    throw new ExternalServiceError("unreachable", `Classifier failed: ${String(err)}`, {
      clause: request.clause,
      cause: err,
    });
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

export type StaticClassification = ClassificationResponse | ((request: ClassificationRequest) => ClassificationResponse);

/**
 * Deterministic classifier keyed by clause text (case-insensitive). Clauses
 * without an entry get `{ habitName: null, quantity: null }`.
 */
export function createStaticClassifier(responses: Record<string, StaticClassification>): SemanticClassifier {
  const table = new Map(Object.entries(responses).map(([clause, reply]) => [clause.trim().toLowerCase(), reply]));

  return {
    async classify(request: ClassificationRequest): Promise<ClassificationResponse> {
      const reply = table.get(request.clause.trim().toLowerCase());
      if (reply === undefined) return { habitName: null, quantity: null };
      return typeof reply === "function" ? reply(request) : reply;
    },
  };
}
