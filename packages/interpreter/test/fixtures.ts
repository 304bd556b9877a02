import type { ClassificationResponse, HabitDefinition, RawUtterance, SemanticClassifier } from "../src/types.js";

export const RECEIVED_AT = "2024-05-06T12:00:00.000Z"; // a Monday

export const HABITS: HabitDefinition[] = [
  { id: "running", name: "running", aliases: ["ran", "run", "jog"], unit: "count" },
  { id: "yoga", name: "yoga", aliases: [], unit: "duration" },
  { id: "water", name: "drinking water", aliases: ["water", "drank water"], unit: "count" },
  { id: "meditation", name: "meditation", aliases: ["meditated", "meditate"], unit: "duration" },
  { id: "reading", name: "reading", aliases: ["read"], unit: "duration" },
  { id: "journal", name: "journaling", aliases: ["journaled"], unit: "boolean" },
];

export function utterance(text: string, receivedAt = RECEIVED_AT): RawUtterance {
  return { text, source: "text", receivedAt };
}

/**
 * Never answers; rejects only once its signal is aborted.
 */
export function hangingClassifier(): SemanticClassifier {
  return {
    classify: (_request, { signal }) =>
      new Promise<ClassificationResponse>((_, reject) => {
        signal.addEventListener("abort", () => reject(new Error("classifier aborted")), { once: true });
      }),
  };
}
