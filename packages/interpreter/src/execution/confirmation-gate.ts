import type { InterpreterConfig } from "../config.js";
import type { EventStatus, HabitDefinition, MatchOrigin } from "../types.js";

export type ConfirmationInput = {
  habit: HabitDefinition | null;
  confidence: number;
  origin: MatchOrigin;
};

export type ConfirmationDecision = {
  status: EventStatus;
  needsConfirmation: boolean;
  unresolved: boolean;
  reason: string;
};

export function decideConfirmation(
  config: Pick<InterpreterConfig, "acceptanceThreshold">,
  input: ConfirmationInput,
): ConfirmationDecision {
  if (!input.habit) {
    return {
      status: "unresolved",
      needsConfirmation: input.confidence < config.acceptanceThreshold,
      unresolved: true,
      reason: input.origin === "classifier" ? "classifier-no-registry-match" : "no-registry-match",
    };
  }

  if (input.confidence < config.acceptanceThreshold) {
    return {
      status: "needs_confirmation",
      needsConfirmation: true,
      unresolved: false,
      reason: `${input.origin}-below-threshold`,
    };
  }

  return {
    status: "resolved",
    needsConfirmation: false,
    unresolved: false,
    reason: `${input.origin}-accepted`,
  };
}
