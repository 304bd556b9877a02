import { nanoid } from "nanoid";
import { z } from "zod";
import type { InterpretationReport, ParsedEvent } from "@habitvoice/interpreter";
import { JournalError } from "../errors.js";
import { appendJsonLines, readTextIfExists } from "../storage/files.js";

/**
 * One accepted event as stored in the journal
 */
export interface JournalEntry {
  /**
   * Entry identifier (nanoid)
   */
  id: string;

  /**
   * Shared by every entry written by the same append
   */
  batchId: string;

  /**
   * ISO-8601 time the entry was written
   */
  recordedAt: string;

  event: ParsedEvent;
}

export interface AppendOptions {
  /**
   * Also journal events that still need confirmation. Unresolved events are
   * never journaled.
   */
  includePending?: boolean;
}

export interface AppendResult {
  batchId: string | null;
  appended: JournalEntry[];
  skipped: ParsedEvent[];
}

export const ParsedEventSchema = z.object({
  habitId: z.string().nullable(),
  habitName: z.string().nullable(),
  quantity: z.number().nullable(),
  unit: z.string().nullable(),
  occurredAt: z.string().datetime({ offset: true }),
  confidence: z.number().min(0).max(1),
  rawSpan: z.string(),
  status: z.enum(["resolved", "needs_confirmation", "unresolved"]),
  needsConfirmation: z.boolean(),
  unresolved: z.boolean(),
  matchedPhrase: z.string().nullable(),
  candidates: z.array(z.string()),
  origin: z.enum(["alias", "fuzzy", "classifier", "none"]),
  issues: z.array(z.enum(["unit_mismatch", "unexpected_quantity", "ambiguous_match", "classifier_unavailable"])),
});

const JournalEntrySchema = z.object({
  id: z.string().min(1),
  batchId: z.string().min(1),
  recordedAt: z.string().datetime({ offset: true }),
  event: ParsedEventSchema,
});

export function isJournalable(event: ParsedEvent, options: AppendOptions = {}): boolean {
  if (event.habitId === null || event.unresolved) return false;
  if (event.status === "resolved") return true;
  return options.includePending === true && event.status === "needs_confirmation";
}

/**
 * Append-only JSONL log of accepted habit events.
 */
export class EventJournal {
  constructor(
    readonly filePath: string,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async append(events: ParsedEvent[], options: AppendOptions = {}): Promise<AppendResult> {
    const accepted = events.filter((e) => isJournalable(e, options));
    const skipped = events.filter((e) => !isJournalable(e, options));
    if (accepted.length === 0) return { batchId: null, appended: [], skipped };

    const batchId = nanoid();
    const recordedAt = this.clock().toISOString();
    const appended = accepted.map((event) => ({ id: nanoid(), batchId, recordedAt, event }));

    try {
      await appendJsonLines(this.filePath, appended);
    } catch (err) {
      throw new JournalError(`Could not append to journal ${this.filePath}`, { cause: err });
    }
    return { batchId, appended, skipped };
  }

  async appendReport(report: InterpretationReport, options: AppendOptions = {}): Promise<AppendResult> {
    return this.append(report.events, options);
  }

  /**
   * Every entry in write order; an empty list when the journal does not exist.
   *
   * @throws JournalError naming the first line that is not a valid entry
   */
  async readAll(): Promise<JournalEntry[]> {
    const text = await readTextIfExists(this.filePath);
    if (text === null) return [];

    const entries: JournalEntry[] = [];
    const lines = text.split("\n");
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (!line) continue;

      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch (err) {
        throw new JournalError(`Journal line ${i + 1} is not valid JSON`, { line: i + 1, cause: err });
      }
      const parsed = JournalEntrySchema.safeParse(json);
      if (!parsed.success) {
        throw new JournalError(`Journal line ${i + 1} is not a journal entry`, { line: i + 1, cause: parsed.error });
      }
      entries.push(parsed.data);
    }
    return entries;
  }
}
