import type { ParsedEvent } from "@habitvoice/interpreter";
import type { JournalEntry } from "../src/journal/event-journal.js";

export function makeEvent(overrides: Partial<ParsedEvent> = {}): ParsedEvent {
  return {
    habitId: "running",
    habitName: "running",
    quantity: null,
    unit: null,
    occurredAt: "2024-05-06T12:00:00.000Z",
    confidence: 1,
    rawSpan: "ran",
    status: "resolved",
    needsConfirmation: false,
    unresolved: false,
    matchedPhrase: "ran",
    candidates: [],
    origin: "alias",
    issues: [],
    ...overrides,
  };
}

let counter = 0;

export function entry(habitId: string, occurredAt: string, overrides: Partial<ParsedEvent> = {}): JournalEntry {
  counter++;
  return {
    id: `entry-${counter}`,
    batchId: "batch-1",
    recordedAt: occurredAt,
    event: makeEvent({ habitId, habitName: habitId, occurredAt, ...overrides }),
  };
}
