import fs from "node:fs";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { appendLogEntry, llmLogPath, truncateForLog, type LlmLogEntry } from "../llm-log";
import { tempDir } from "./fakes";

function entry(n: number): LlmLogEntry {
  return {
    timestamp: "2026-01-01T00:00:00.000Z",
    taskType: "chapter",
    promptName: "chapter",
    chapterNumber: n,
    modelId: "fake",
    cacheHit: false,
    durationMs: 1,
    messages: [{ role: "user", content: "hi" }],
  };
}

describe("truncateForLog", () => {
  it("keeps short text", () => {
    expect(truncateForLog("short")).toBe("short");
  });

  it("cuts long text and counts the rest", () => {
    expect(truncateForLog("a".repeat(4010))).toBe(`${"a".repeat(4000)}… [10 more chars]`);
  });
});

describe("appendLogEntry", () => {
  it("appends JSON lines and keeps the newest 250", () => {
    const file = llmLogPath(path.join(tempDir(), "run"));
    for (let n = 1; n <= 252; n++) appendLogEntry(file, entry(n));

    const lines = fs.readFileSync(file, "utf-8").trim().split("\n");
    expect(lines).toHaveLength(250);
    expect(JSON.parse(lines[0]).chapterNumber).toBe(3);
    expect(JSON.parse(lines[249]).chapterNumber).toBe(252);
  });
});
