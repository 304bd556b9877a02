import fs from "node:fs/promises";
import path from "node:path";

export type LedgerFile = "registry" | "journal" | "runs" | "pending";

export function resolveHabitVoiceRoot(workspaceDir: string) {
  return path.join(workspaceDir, ".habitvoice");
}

export function resolveLedgerPath(workspaceDir: string, file: LedgerFile) {
  const root = resolveHabitVoiceRoot(workspaceDir);
  switch (file) {
    case "registry":
      return path.join(root, "habits.json");
    case "journal":
      return path.join(root, "events.jsonl");
    case "runs":
      return path.join(root, "logs", "runs.jsonl");
    case "pending":
      return path.join(root, "state", "pending.json");
  }
}

async function ensureDirForFile(filePath: string) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * File contents, or null when the file does not exist.
 */
export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
}

export async function appendJsonLines(filePath: string, payloads: unknown[]): Promise<void> {
  if (payloads.length === 0) return;
  await ensureDirForFile(filePath);
  await fs.appendFile(filePath, payloads.map((p) => JSON.stringify(p) + "\n").join(""), "utf-8");
}

export async function writeJsonAtomic(filePath: string, payload: unknown): Promise<void> {
  await ensureDirForFile(filePath);
  const tmpPath = `${filePath}.tmp`;
  await fs.writeFile(tmpPath, JSON.stringify(payload, null, 2) + "\n", "utf-8");
  await fs.rename(tmpPath, filePath);
}

export async function removeIfExists(filePath: string): Promise<void> {
  await fs.rm(filePath, { force: true });
}
