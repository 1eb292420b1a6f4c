import fs from "node:fs";
import path from "node:path";
import sharp from "sharp";
import { getTimeouts } from "@/lib/config";
import { ok, recovered, type Outcome } from "../core/outcome";
import { errorMessage } from "../errors";
import { addNotice, type PipelineContext } from "../node";

export function imagesDir(outputDir: string): string {
  return path.join(outputDir, "images");
}

/**
 * Generate an image and store it as `<outputDir>/images/<filename>` (PNG).
 *
 * The local reference `images/<filename>` is returned either way; when
 * generation fails it points at a file that was never written and acts as
 * a placeholder.
 */
export async function generateImageFile(
  ctx: PipelineContext,
  prompt: string,
  filename: string
): Promise<Outcome<string>> {
  const reference = `images/${filename}`;
  try {
    const image = await ctx.models.image.generateImage({
      prompt,
      timeoutMs: getTimeouts(ctx.config).imageMs,
    });
    if (image.data.byteLength === 0) {
      return recovered(reference, `image ${filename}: empty response`);
    }
    const png = await sharp(image.data).png().toBuffer();
    const dir = imagesDir(ctx.outputDir);
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, filename), png);
    return ok(reference);
  } catch (err) {
    return recovered(reference, `image ${filename}: ${errorMessage(err)}`);
  }
}

/** generateImageFile, recording a notice when the placeholder was used. */
export async function imageReference(
  ctx: PipelineContext,
  prompt: string,
  filename: string
): Promise<string> {
  const outcome = await generateImageFile(ctx, prompt, filename);
  switch (outcome.kind) {
    case "ok":
      return outcome.value;
    case "recovered":
      console.warn(`[${ctx.runId}] placeholder used for ${outcome.reason}`);
      addNotice(ctx, `Placeholder image used for ${outcome.reason}`);
      return outcome.value;
    case "fatal":
      throw new Error(outcome.reason);
  }
}
