import { describe, it, expect } from "vitest";
import { from, throwError, concat } from "rxjs";
import type { GenerationEvent } from "../../pipeline/node";
import { formatDuration, runWithProgress } from "../progress";

function recorder() {
  const chunks: string[] = [];
  return { chunks, stream: { write: (chunk: string) => chunks.push(chunk) } };
}

const stripAnsi = (s: string) => s.replace(/\x1b\[[0-9;?]*[A-Za-z]/g, "");

describe("runWithProgress", () => {
  it("resolves with the done value and marks finished phases", async () => {
    const { chunks, stream } = recorder();
    const events: GenerationEvent<string>[] = [
      { type: "progress", phase: "research", message: "Researching topic" },
      { type: "progress", phase: "chapters", message: "Writing", completed: 1, total: 2 },
      { type: "done", value: "bundle" },
    ];

    await expect(runWithProgress(from(events), { stream, barWidth: 4 })).resolves.toBe("bundle");

    const output = stripAnsi(chunks.join(""));
    expect(output).toContain("✔ research  Researching topic\n");
    expect(output).toContain("✔ chapters  Writing  ██░░  1/2\n");
    expect(output).toMatch(/✔ Done in \d+s\n$/);
  });

  it("rejects when the generation fails", async () => {
    const { chunks, stream } = recorder();
    const source = concat(
      from<GenerationEvent<string>[]>([{ type: "progress", phase: "outline", message: "Creating outline" }]),
      throwError(() => new Error("outline: timeout"))
    );

    await expect(runWithProgress(source, { stream })).rejects.toThrow("outline: timeout");
    expect(stripAnsi(chunks.join(""))).toContain("✗ outline  Creating outline\n");
  });

  it("rejects when no value arrives", async () => {
    const { stream } = recorder();
    await expect(runWithProgress(from<GenerationEvent<string>[]>([]), { stream })).rejects.toThrow(
      "Generation finished without a result"
    );
  });
});

describe("formatDuration", () => {
  it("formats seconds, minutes and hours", () => {
    expect(formatDuration(5_400)).toBe("5s");
    expect(formatDuration(125_000)).toBe("2m 5s");
    expect(formatDuration(3_780_000)).toBe("1h 3m");
  });
});
