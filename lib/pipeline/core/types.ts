/**
 * Capability interfaces the pipeline depends on.
 *
 * Every external service (text LLM, image LLM, PDF text extraction) is
 * reached through one of these, so phases can be driven by fakes in tests.
 */

// ============================================================================
// Text generation
// ============================================================================

export interface Message {
  role: "user" | "assistant";
  content: string;
}

export interface GenerateTextOptions {
  system?: string;
  messages: Message[];
  temperature?: number;
  maxTokens?: number;
  /** Per-call timeout; a timeout is an ordinary failure of the call. */
  timeoutMs?: number;
  /** Logging context - optional but recommended for debugging */
  log?: {
    taskType: string;
    promptName: string;
    chapterNumber?: number;
  };
}

export interface TextModel {
  readonly modelId: string;
  generateText(options: GenerateTextOptions): Promise<string>;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

// ============================================================================
// Image generation
// ============================================================================

export interface GeneratedImage {
  data: Uint8Array;
  mediaType: string;
}

export interface ImageModel {
  readonly modelId: string;
  generateImage(options: { prompt: string; timeoutMs?: number }): Promise<GeneratedImage>;
}

// ============================================================================
// Roster + PDF text
// ============================================================================

export interface ModelRoster {
  /** Web-grounded research model. */
  research: TextModel;
  /** Outline, chapter prose, translation and PDF classification. */
  writer: TextModel;
  image: ImageModel;
}

export type PdfTextExtractor = (pdf: Uint8Array) => Promise<string>;
