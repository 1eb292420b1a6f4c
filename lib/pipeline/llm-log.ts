import fs from "node:fs";
import path from "node:path";
import type { Message, TokenUsage } from "./core/types";

export interface LlmLogEntry {
  timestamp: string;
  taskType: string;
  promptName: string;
  chapterNumber?: number;
  modelId: string;
  cacheHit: boolean;
  durationMs: number;
  usage?: TokenUsage;
  error?: string;
  system?: string;
  messages: Message[];
  /** Response text, truncated. */
  response?: string;
}

const MAX_LOG_ENTRIES = 250;
const MAX_LOGGED_CHARS = 4000;

export function llmLogPath(outputDir: string): string {
  return path.join(outputDir, "llm-log.jsonl");
}

/** Shorten long prompt and response bodies before they hit the log. */
export function truncateForLog(text: string): string {
  if (text.length <= MAX_LOGGED_CHARS) return text;
  return `${text.slice(0, MAX_LOGGED_CHARS)}… [${text.length - MAX_LOGGED_CHARS} more chars]`;
}

/**
 * Append a log entry to a run's JSONL log file, keeping at most
 * MAX_LOG_ENTRIES entries (oldest are dropped).
 */
export function appendLogEntry(filePath: string, entry: LlmLogEntry): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.appendFileSync(filePath, JSON.stringify(entry) + "\n");

  const lines = fs.readFileSync(filePath, "utf-8").split("\n").filter(Boolean);
  if (lines.length > MAX_LOG_ENTRIES) {
    fs.writeFileSync(filePath, lines.slice(lines.length - MAX_LOG_ENTRIES).join("\n") + "\n");
  }
}
