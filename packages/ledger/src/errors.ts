import { HabitVoiceError } from "@habitvoice/interpreter";

/**
 * The habit registry file is unreadable or a change would break it
 * (duplicate id, an alias claimed by two habits, unknown habit).
 */
export class RegistryError extends HabitVoiceError {
  constructor(message: string, cause?: unknown) {
    super("REGISTRY", message, { cause });
  }
}

export class JournalError extends HabitVoiceError {
  readonly line?: number;

  constructor(message: string, options: { line?: number; cause?: unknown } = {}) {
    super("JOURNAL", message, { cause: options.cause });
    this.line = options.line;
  }
}
