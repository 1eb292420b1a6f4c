import { describe, it, expect } from "vitest";
import type { ClassifiedChapter } from "../classification-schema";
import { pairChapters } from "../pair-chapters";

function chapter(number: number, title = `C${number}`): ClassifiedChapter {
  return { number, title, summary: "", image_prompt: "", blocks: [] };
}

describe("pairChapters", () => {
  it("pairs matching numbers in ascending order", () => {
    const { pairs, notices } = pairChapters([chapter(2), chapter(1)], [chapter(1), chapter(2)]);
    expect(pairs.map((p) => [p.number, p.en.number, p.pt?.number])).toEqual([
      [1, 1, 1],
      [2, 2, 2],
    ]);
    expect(notices).toEqual([]);
  });

  it("leaves a gap where Portuguese is missing and drops Portuguese-only chapters", () => {
    const { pairs, notices } = pairChapters([chapter(1), chapter(2)], [chapter(1), chapter(3)]);
    expect(pairs.map((p) => p.number)).toEqual([1, 2]);
    expect(pairs[1].pt).toBeNull();
    expect(notices).toEqual([
      "Portuguese chapter 2 is missing; using the English title and empty Portuguese content",
      "Portuguese chapter 3 has no English counterpart and was dropped",
    ]);
  });

  it("keeps the first of duplicated numbers", () => {
    const { pairs, notices } = pairChapters([chapter(1, "First"), chapter(1, "Second")], [chapter(1)]);
    expect(pairs).toHaveLength(1);
    expect(pairs[0].en.title).toBe("First");
    expect(notices).toEqual(["English chapter 1 appears more than once; kept the first"]);
  });
});
