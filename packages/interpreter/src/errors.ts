export type HabitVoiceErrorCode =
  | "EMPTY_INPUT"
  | "INVALID_INPUT"
  | "EXTERNAL_SERVICE"
  | "ABORTED"
  | "INVALID_CONFIG"
  | "REGISTRY"
  | "JOURNAL";

export class HabitVoiceError extends Error {
  readonly code: HabitVoiceErrorCode;
  readonly retryable: boolean;

  constructor(code: HabitVoiceErrorCode, message: string, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = options.retryable ?? false;
  }
}

/**
 * Utterance was empty after trimming. The caller should re-prompt.
 */
export class EmptyInputError extends HabitVoiceError {
  constructor() {
    super("EMPTY_INPUT", "Utterance text is empty");
  }
}

/**
 * Utterance or reference time could not be read (e.g. an unparseable timestamp).
 */
export class InvalidUtteranceError extends HabitVoiceError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
  }
}

export type ExternalServiceFailure = "timeout" | "unreachable" | "invalid_response" | "http_status";

/**
 * The semantic classifier could not answer. Reported as a warning; the
 * affected clause is emitted unresolved.
 */
export class ExternalServiceError extends HabitVoiceError {
  readonly reason: ExternalServiceFailure;
  readonly clause?: string;

  constructor(
    reason: ExternalServiceFailure,
    message: string,
    options: { clause?: string; cause?: unknown } = {},
  ) {
    super("EXTERNAL_SERVICE", message, { retryable: true, cause: options.cause });
    this.reason = reason;
    this.clause = options.clause;
  }

  withClause(clause: string): ExternalServiceError {
    return new ExternalServiceError(this.reason, this.message, { clause, cause: this.cause });
  }
}

export class InterpretationAbortedError extends HabitVoiceError {
  constructor(cause?: unknown) {
    super("ABORTED", "Interpretation was cancelled", { cause });
  }
}

export class ConfigError extends HabitVoiceError {
  constructor(message: string, cause?: unknown) {
    super("INVALID_CONFIG", message, { cause });
  }
}

export function isHabitVoiceError(err: unknown): err is HabitVoiceError {
  return err instanceof HabitVoiceError;
}
