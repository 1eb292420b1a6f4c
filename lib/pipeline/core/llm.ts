/**
 * LLM abstraction with caching support.
 *
 * This module provides the TextModel/ImageModel implementations that:
 * - Wrap the Vercel AI SDK
 * - Route "provider:model-id" specs to the right provider (OpenRouter included)
 * - Bound every call with a timeout
 * - Cache text responses on disk and log every call
 */

import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { generateText, type LanguageModel, type ModelMessage } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { createAnthropic } from "@ai-sdk/anthropic";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { z } from "zod/v4";
import { requireEnv } from "@/lib/env";
import type {
  GenerateTextOptions,
  GeneratedImage,
  ImageModel,
  Message,
  TextModel,
  TokenUsage,
} from "./types";
import { truncateForLog, type LlmLogEntry } from "../llm-log";

// ============================================================================
// Provider types and model resolution
// ============================================================================

export type LLMProvider = "openrouter" | "openai" | "anthropic" | "google";

const PROVIDERS: readonly LLMProvider[] = ["openrouter", "openai", "anthropic", "google"];

const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

const MODEL_FACTORIES: Record<LLMProvider, (id: string) => LanguageModel> = {
  openrouter: (id) =>
    createOpenAI({
      name: "openrouter",
      baseURL: OPENROUTER_BASE_URL,
      apiKey: requireEnv("OPENROUTER_API_KEY"),
    }).chat(id),
  openai: (id) => createOpenAI({ apiKey: requireEnv("OPENAI_API_KEY") })(id),
  anthropic: (id) => createAnthropic({ apiKey: requireEnv("ANTHROPIC_API_KEY") })(id),
  google: (id) =>
    createGoogleGenerativeAI({ apiKey: requireEnv("GOOGLE_GENERATIVE_AI_API_KEY") })(id),
};

export interface ModelSpec {
  provider: LLMProvider;
  modelId: string;
}

function isProvider(value: string): value is LLMProvider {
  return PROVIDERS.some((p) => p === value);
}

/**
 * Parse "provider:model-id". The model id may itself contain colons
 * (e.g. "openrouter:google/gemini-2.0-flash-exp:free"); a bare id is
 * routed through OpenRouter.
 */
export function parseModelSpec(spec: string): ModelSpec {
  const colonIdx = spec.indexOf(":");
  if (colonIdx !== -1) {
    const provider = spec.slice(0, colonIdx);
    if (isProvider(provider)) {
      return { provider, modelId: spec.slice(colonIdx + 1) };
    }
  }
  return { provider: "openrouter", modelId: spec };
}

export function resolveLanguageModel(spec: string): LanguageModel {
  const { provider, modelId } = parseModelSpec(spec);
  return MODEL_FACTORIES[provider](modelId);
}

// ============================================================================
// Text model factory
// ============================================================================

export interface CreateTextModelOptions {
  spec: string;
  cacheDir?: string;
  skipCache?: boolean;
  maxRetries?: number;
  defaultTimeoutMs?: number;
  onLog?: (entry: LlmLogEntry) => void;
}

const cachedResponseSchema = z.object({
  text: z.string(),
  usage: z.object({ inputTokens: z.number(), outputTokens: z.number() }).optional(),
});

/**
 * Create a TextModel with optional on-disk caching.
 *
 * The cache key covers the model, system prompt, messages, temperature and
 * token limit. Set RECACHE=1 to bypass existing entries.
 */
export function createTextModel(options: CreateTextModelOptions): TextModel {
  const { modelId } = parseModelSpec(options.spec);
  let languageModel: LanguageModel | undefined;
  const model = () => (languageModel ??= resolveLanguageModel(options.spec));

  return {
    modelId,
    async generateText(opts: GenerateTextOptions): Promise<string> {
      const t0 = Date.now();
      const hash = computeHash({
        modelId: options.spec,
        system: opts.system,
        messages: opts.messages,
        temperature: opts.temperature,
        maxTokens: opts.maxTokens,
      });
      const cacheFile = options.cacheDir ? path.join(options.cacheDir, `${hash}.json`) : null;

      const log = (fields: {
        cacheHit: boolean;
        usage?: TokenUsage;
        error?: string;
        response?: string;
      }) => {
        if (!opts.log) return;
        options.onLog?.({
          timestamp: new Date().toISOString(),
          taskType: opts.log.taskType,
          promptName: opts.log.promptName,
          chapterNumber: opts.log.chapterNumber,
          modelId,
          durationMs: Date.now() - t0,
          system: opts.system,
          messages: opts.messages.map((m) => ({ role: m.role, content: truncateForLog(m.content) })),
          ...fields,
          response: fields.response === undefined ? undefined : truncateForLog(fields.response),
        });
      };

      if (cacheFile && !options.skipCache && !process.env.RECACHE) {
        const cached = readCache(cacheFile);
        if (cached) {
          log({ cacheHit: true, usage: cached.usage, response: cached.text });
          return cached.text;
        }
      }

      try {
        const result = await generateText({
          model: model(),
          system: opts.system,
          messages: convertMessages(opts.messages),
          temperature: opts.temperature,
          maxOutputTokens: opts.maxTokens,
          maxRetries: options.maxRetries ?? 2,
          abortSignal: AbortSignal.timeout(opts.timeoutMs ?? options.defaultTimeoutMs ?? 120_000),
        });

        const usage: TokenUsage = {
          inputTokens: result.usage.inputTokens ?? 0,
          outputTokens: result.usage.outputTokens ?? 0,
        };

        if (cacheFile) {
          fs.mkdirSync(path.dirname(cacheFile), { recursive: true });
          fs.writeFileSync(cacheFile, JSON.stringify({ text: result.text, usage }, null, 2) + "\n");
        }

        log({ cacheHit: false, usage, response: result.text });
        return result.text;
      } catch (err) {
        log({ cacheHit: false, error: err instanceof Error ? err.message : String(err) });
        throw err;
      }
    },
  };
}

// ============================================================================
// Image model factory
// ============================================================================

export interface CreateImageModelOptions {
  spec: string;
  maxRetries?: number;
  defaultTimeoutMs?: number;
}

/**
 * Image generation through a multimodal Gemini model: the model is asked for
 * IMAGE output and the first generated image file is returned.
 */
export function createImageModel(options: CreateImageModelOptions): ImageModel {
  const { provider, modelId } = parseModelSpec(options.spec);
  if (provider !== "google") {
    throw new Error(`Image generation requires a google model, got "${options.spec}"`);
  }
  let languageModel: LanguageModel | undefined;
  const model = () => (languageModel ??= resolveLanguageModel(options.spec));

  return {
    modelId,
    async generateImage({ prompt, timeoutMs }): Promise<GeneratedImage> {
      const result = await generateText({
        model: model(),
        prompt,
        maxRetries: options.maxRetries ?? 2,
        abortSignal: AbortSignal.timeout(timeoutMs ?? options.defaultTimeoutMs ?? 90_000),
        providerOptions: {
          google: { responseModalities: ["TEXT", "IMAGE"] },
        },
      });

      const file = result.files.find((f) => f.mediaType.startsWith("image/"));
      if (!file) {
        throw new Error("Image model response contained no image");
      }
      return { data: file.uint8Array, mediaType: file.mediaType };
    },
  };
}

// ============================================================================
// Internal helpers
// ============================================================================

function computeHash(data: unknown): string {
  return crypto.createHash("sha256").update(JSON.stringify(data)).digest("hex");
}

function readCache(cacheFile: string): z.infer<typeof cachedResponseSchema> | null {
  if (!fs.existsSync(cacheFile)) return null;
  try {
    const parsed = cachedResponseSchema.safeParse(JSON.parse(fs.readFileSync(cacheFile, "utf-8")));
    return parsed.success ? parsed.data : null;
  } catch {
    // Unreadable entry: treat as a miss, it is rewritten after the call
    return null;
  }
}

function convertMessages(messages: Message[]): ModelMessage[] {
  return messages.map((m): ModelMessage =>
    m.role === "user"
      ? { role: "user", content: m.content }
      : { role: "assistant", content: m.content }
  );
}
