import { describe, it, expect } from "vitest";
import { parseClassification } from "../classify-pdf";

describe("parseClassification", () => {
  it("reads a fenced classification and fills optional fields", () => {
    const outcome = parseClassification(
      '```json\n{"title": "Book", "chapters": [{"number": 1, "title": "One", "summary": null}]}\n```'
    );
    expect(outcome).toEqual({
      kind: "ok",
      value: {
        title: "Book",
        description: "",
        cover_image_prompt: "",
        chapters: [{ number: 1, title: "One", summary: "", image_prompt: "", blocks: [] }],
      },
    });
  });

  it("is fatal when there are no chapters", () => {
    const outcome = parseClassification('{"title": "Book", "chapters": []}');
    expect(outcome.kind).toBe("fatal");
    if (outcome.kind === "fatal") expect(outcome.reason).toMatch(/^chapters: /);
  });

  it("is fatal when there is no JSON", () => {
    expect(parseClassification("The PDF was empty.")).toEqual({
      kind: "fatal",
      reason: "response contains no JSON object",
    });
  });
});
