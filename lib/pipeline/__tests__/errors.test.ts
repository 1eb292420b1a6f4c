import { describe, it, expect } from "vitest";
import { ClassificationParseError, PipelineError, errorMessage, redactSecrets } from "../errors";

describe("PipelineError", () => {
  it("names the phase", () => {
    expect(new PipelineError("research", "empty").message).toBe("research: empty");
  });

  it("names the chapter and step", () => {
    const err = new PipelineError("chapters", "timeout", { chapterNumber: 3, step: "translation" });
    expect(err.message).toBe("chapters (chapter 3, translation): timeout");
    expect(err.phase).toBe("chapters");
    expect(err.chapterNumber).toBe(3);
  });

  it("keeps the cause", () => {
    const cause = new Error("socket hang up");
    expect(new PipelineError("outline", "failed", { cause }).cause).toBe(cause);
  });

  it("builds classification parse errors", () => {
    const err = new ClassificationParseError("English", "bad json");
    expect(err).toBeInstanceOf(PipelineError);
    expect(err.message).toBe("classification: could not parse English classification: bad json");
    expect(err.language).toBe("English");
  });
});

describe("errorMessage", () => {
  it("reads errors and other values", () => {
    expect(errorMessage(new Error("x"))).toBe("x");
    expect(errorMessage(42)).toBe("42");
  });
});

describe("redactSecrets", () => {
  it("removes configured secrets", () => {
    expect(redactSecrets("auth failed for test-secret", ["test-secret"])).toBe("auth failed for [redacted]");
  });

  it("ignores very short secrets", () => {
    expect(redactSecrets("abc", ["ab"])).toBe("abc");
  });

  it("removes key-shaped tokens", () => {
    expect(redactSecrets("key sk-test-placeholder rejected")).toBe("key [redacted] rejected");
    expect(redactSecrets("header Bearer test-token.value")).toBe("header [redacted]");
  });
});
