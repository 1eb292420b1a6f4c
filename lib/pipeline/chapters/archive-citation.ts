import { getArchiveSettings } from "@/lib/config";
import type { PipelineContext } from "../node";

/**
 * Next sequential citation of the run, e.g.
 * "Archive: FIELD NOTES / Blueprint 101".
 */
export function nextArchiveCitation(ctx: PipelineContext): string {
  const { label, start } = getArchiveSettings(ctx.config);
  ctx.archiveCitations += 1;
  const number = String(start + ctx.archiveCitations).padStart(3, "0");
  return `Archive: ${label} / Blueprint ${number}`;
}
