export type PipelinePhase =
  | "research"
  | "outline"
  | "chapters"
  | "images"
  | "extract"
  | "classification"
  | "assembly"
  | "persistence";

export interface PipelineErrorOptions {
  chapterNumber?: number;
  step?: string;
  cause?: unknown;
}

/**
 * A fatal failure of a generation phase. The message names the phase, and
 * the chapter and step when one was involved.
 */
export class PipelineError extends Error {
  readonly phase: PipelinePhase;
  readonly chapterNumber?: number;
  readonly step?: string;

  constructor(phase: PipelinePhase, message: string, options: PipelineErrorOptions = {}) {
    super(formatMessage(phase, message, options), { cause: options.cause });
    this.name = "PipelineError";
    this.phase = phase;
    this.chapterNumber = options.chapterNumber;
    this.step = options.step;
  }
}

/** The classifier's response for a source PDF was not a usable document. */
export class ClassificationParseError extends PipelineError {
  readonly language: string;

  constructor(language: string, reason: string) {
    super("classification", `could not parse ${language} classification: ${reason}`);
    this.name = "ClassificationParseError";
    this.language = language;
  }
}

function formatMessage(
  phase: PipelinePhase,
  message: string,
  options: PipelineErrorOptions
): string {
  const where = [
    options.chapterNumber !== undefined ? `chapter ${options.chapterNumber}` : null,
    options.step ?? null,
  ].filter(Boolean);
  const prefix = where.length > 0 ? `${phase} (${where.join(", ")})` : phase;
  return `${prefix}: ${message}`;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const KEY_PATTERNS = [/sk-[A-Za-z0-9_-]{8,}/g, /Bearer\s+[A-Za-z0-9._~+/=-]+/gi];

/** Remove credential values and key-shaped tokens from a message. */
export function redactSecrets(message: string, secrets: readonly string[] = []): string {
  let out = message;
  for (const secret of secrets) {
    if (secret.length >= 4) out = out.split(secret).join("[redacted]");
  }
  for (const pattern of KEY_PATTERNS) {
    out = out.replace(pattern, "[redacted]");
  }
  return out;
}
