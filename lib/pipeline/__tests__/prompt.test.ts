import fs from "node:fs";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { createPromptEngine, loadPrompt, parseMessages, renderPrompt, renderPromptText } from "../prompt";
import { tempDir } from "./fakes";

describe("renderPrompt", () => {
  it("renders the chapter template with the persona as system message", async () => {
    const messages = await renderPrompt("chapter", {
      topic: "Sleep and recovery",
      chapter_number: 2,
      chapter_title: "Deep Sleep",
      summary: "Why it matters",
      key_points: ["Cool rooms", "Fixed wake time"],
      research: "Notes",
    });

    expect(messages.map((m) => m.role)).toEqual(["system", "user"]);
    expect(messages[0].content).toMatch(/^You are a seasoned nonfiction author/);
    expect(messages[1].content).toContain('Write chapter 2 of the ebook "Sleep and recovery".');
    expect(messages[1].content).toContain("Key points to cover:\n- Cool rooms\n- Fixed wake time\n");
  });

  it("omits the key point list when there are none", async () => {
    const messages = await renderPrompt("chapter", {
      topic: "t",
      chapter_number: 1,
      chapter_title: "c",
      summary: "s",
      key_points: [],
      research: "r",
    });
    expect(messages[1].content).not.toContain("Key points to cover");
  });
});

describe("loadPrompt", () => {
  it("splits the system message from the conversation", async () => {
    const prompt = await loadPrompt("translate_chapter", { content: "<p>Hello</p>" });

    expect(prompt.system).toMatch(/^You are a seasoned nonfiction author/);
    expect(prompt.messages).toHaveLength(1);
    expect(prompt.messages[0].role).toBe("user");
    expect(prompt.messages[0].content.endsWith("<p>Hello</p>")).toBe(true);
  });

  it("leaves system undefined when the template has none", async () => {
    const prompt = await loadPrompt("research", { topic: "Cold exposure" });
    expect(prompt.system).toBeUndefined();
    expect(prompt.messages[0].content).toContain('"Cold exposure"');
  });

  it("rejects a template without a user message", async () => {
    const root = tempDir("prompts-");
    fs.writeFileSync(path.join(root, "only_system.liquid"), '{% chat role: "system" %}Hi{% endchat %}');

    await expect(loadPrompt("only_system", {}, createPromptEngine(root))).rejects.toThrow(
      'Prompt "only_system" has no user message'
    );
  });
});

describe("renderPromptText", () => {
  it("collapses whitespace into a single line", async () => {
    const text = await renderPromptText("cover", { title: "Iron Will" });
    expect(text).toBe(
      'Book cover artwork for "Iron Will". Bold symbolic central image, dramatic cinematic lighting, dark background with warm amber highlights, generous empty space at the top for the title, no text, no letters, portrait 2:3 composition.'
    );
  });

  it("leaves out the summary clause when it is blank", async () => {
    const text = await renderPromptText("pdf_chapter_image", { title: "Rest", summary: "" });
    expect(text).toBe(
      'Cinematic editorial illustration for a book chapter titled "Rest". Symbolic rather than literal, low-key lighting with warm amber accents, no text, no letters, 16:9 composition.'
    );
  });
});

describe("parseMessages", () => {
  it("skips empty and unknown-role sections", () => {
    const raw = "\x01CHAT:user\x01  \x01ENDCHAT\x01\x01CHAT:tool\x01x\x01ENDCHAT\x01\x01CHAT:assistant\x01 ok \x01ENDCHAT\x01";
    expect(parseMessages(raw)).toEqual([{ role: "assistant", content: "ok" }]);
  });
});
