import type { InterpretationLog, LogLevel } from "./types.js";

export const log = (
  logs: InterpretationLog[],
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>,
) => {
  logs.push({ level, message, data, timestamp: new Date().toISOString() });
};
