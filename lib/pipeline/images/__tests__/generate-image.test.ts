import fs from "node:fs";
import path from "node:path";
import sharp from "sharp";
import { describe, it, expect } from "vitest";
import { generateImageFile, imageReference } from "../generate-image";
import { fakeImageModel, testContext } from "../../__tests__/fakes";
import type { ImageModel } from "../../core/types";

function ctxWith(image: ImageModel = fakeImageModel()) {
  return testContext({ mode: "topic", topic: "Topic for images", chapterCount: 1 }, { models: { image } });
}

describe("generateImageFile", () => {
  it("writes a PNG under images/", async () => {
    const ctx = ctxWith();
    const outcome = await generateImageFile(ctx, "a lighthouse", "cover.png");

    expect(outcome).toEqual({ kind: "ok", value: "images/cover.png" });
    const meta = await sharp(fs.readFileSync(path.join(ctx.outputDir, "images", "cover.png"))).metadata();
    expect(meta.format).toBe("png");
    expect(meta.width).toBe(2);
  });

  it("recovers with the reference when generation fails", async () => {
    const ctx = ctxWith(fakeImageModel(() => true));
    expect(await generateImageFile(ctx, "a lighthouse", "chapter_2.png")).toEqual({
      kind: "recovered",
      value: "images/chapter_2.png",
      reason: "image chapter_2.png: image backend unavailable",
    });
  });

  it("treats an empty image as a failure", async () => {
    const ctx = ctxWith({
      modelId: "empty",
      async generateImage() {
        return { data: new Uint8Array(), mediaType: "image/png" };
      },
    });
    const outcome = await generateImageFile(ctx, "x", "cover.png");
    expect(outcome).toEqual({ kind: "recovered", value: "images/cover.png", reason: "image cover.png: empty response" });
  });
});

describe("imageReference", () => {
  it("records a notice for a placeholder", async () => {
    const ctx = ctxWith(fakeImageModel(() => true));
    expect(await imageReference(ctx, "x", "cover.png")).toBe("images/cover.png");
    expect(ctx.notices).toEqual(["Placeholder image used for image cover.png: image backend unavailable"]);
  });
});
