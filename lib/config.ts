import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";

const temperature = z.number().min(0).max(2).optional();
const positiveInt = z.number().int().min(1).optional();

export const configSchema = z.object({
  models: z
    .object({
      research: z.string().optional(),
      writer: z.string().optional(),
      image: z.string().optional(),
    })
    .optional(),
  temperatures: z
    .object({
      research: temperature,
      outline: temperature,
      chapter: temperature,
      translation: temperature,
      classification: temperature,
    })
    .optional(),
  max_tokens: z
    .object({
      chapter: positiveInt,
      translation: positiveInt,
      classification: positiveInt,
    })
    .optional(),
  timeouts: z
    .object({
      text_ms: positiveInt,
      large_context_ms: positiveInt,
      image_ms: positiveInt,
    })
    .optional(),
  max_retries: z.number().int().min(0).optional(),
  generation: z
    .object({
      default_chapters: z.number().int().min(1).max(20).optional(),
      chapter_concurrency: positiveInt,
    })
    .optional(),
  pricing: z
    .object({
      price_usd: z.number().int().min(0).optional(),
      price_brl: z.number().int().min(0).optional(),
    })
    .optional(),
  storage: z
    .object({
      bucket: z.string().min(1).optional(),
    })
    .optional(),
  archive: z
    .object({
      label: z.string().min(1).optional(),
      start: z.number().int().min(0).optional(),
    })
    .optional(),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Deep-merge two plain objects. Plain objects recurse;
 * arrays and primitives: override wins.
 */
export function deepMerge<T extends Record<string, unknown>>(
  base: T,
  overrides: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(overrides)) {
    const baseVal = result[key];
    const overVal = overrides[key];
    if (isPlainObject(baseVal) && isPlainObject(overVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else {
      result[key] = overVal;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function readYaml(filePath: string): Record<string, unknown> {
  const raw = yaml.load(fs.readFileSync(filePath, "utf-8"));
  if (raw === undefined || raw === null) return {};
  if (!isPlainObject(raw)) {
    throw new Error(`${filePath}: expected a mapping at the top level`);
  }
  return raw;
}

/**
 * config.yaml overlaid with config.local.yaml when present.
 */
export function loadAppConfig(root: string = process.cwd()): AppConfig {
  const basePath = path.join(root, "config.yaml");
  const base = fs.existsSync(basePath) ? readYaml(basePath) : {};
  const localPath = path.join(root, "config.local.yaml");
  if (!fs.existsSync(localPath)) return configSchema.parse(base);
  return configSchema.parse(deepMerge(base, readYaml(localPath)));
}

export interface ModelSpecs {
  research: string;
  writer: string;
  image: string;
}

export function getModelSpecs(cfg: AppConfig): ModelSpecs {
  return {
    research: cfg.models?.research ?? "openrouter:perplexity/sonar-pro",
    writer: cfg.models?.writer ?? "openrouter:anthropic/claude-sonnet-4",
    image: cfg.models?.image ?? "google:gemini-2.0-flash-preview-image-generation",
  };
}

export interface Temperatures {
  research: number;
  outline: number;
  chapter: number;
  translation: number;
  classification: number;
}

export function getTemperatures(cfg: AppConfig): Temperatures {
  const t = cfg.temperatures;
  return {
    research: t?.research ?? 0.3,
    outline: t?.outline ?? 0.8,
    chapter: t?.chapter ?? 0.7,
    translation: t?.translation ?? 0.7,
    classification: t?.classification ?? 0.3,
  };
}

export interface MaxTokens {
  chapter: number;
  translation: number;
  classification: number;
}

export function getMaxTokens(cfg: AppConfig): MaxTokens {
  return {
    chapter: cfg.max_tokens?.chapter ?? 6000,
    translation: cfg.max_tokens?.translation ?? 6000,
    classification: cfg.max_tokens?.classification ?? 64000,
  };
}

export interface Timeouts {
  textMs: number;
  largeContextMs: number;
  imageMs: number;
}

export function getTimeouts(cfg: AppConfig): Timeouts {
  return {
    textMs: cfg.timeouts?.text_ms ?? 120_000,
    largeContextMs: cfg.timeouts?.large_context_ms ?? 600_000,
    imageMs: cfg.timeouts?.image_ms ?? 90_000,
  };
}

export function getMaxRetries(cfg: AppConfig): number {
  return cfg.max_retries ?? 2;
}

export function getDefaultChapterCount(cfg: AppConfig): number {
  return cfg.generation?.default_chapters ?? 5;
}

export function getChapterConcurrency(cfg: AppConfig): number {
  return cfg.generation?.chapter_concurrency ?? 20;
}

export interface Pricing {
  priceUsd: number;
  priceBrl: number;
}

export function getPricing(cfg: AppConfig): Pricing {
  return {
    priceUsd: cfg.pricing?.price_usd ?? 1997,
    priceBrl: cfg.pricing?.price_brl ?? 9970,
  };
}

export function getStorageBucket(cfg: AppConfig): string {
  return cfg.storage?.bucket ?? "ebook-covers";
}

export interface ArchiveSettings {
  label: string;
  /** Citations are numbered from start + 1. */
  start: number;
}

export function getArchiveSettings(cfg: AppConfig): ArchiveSettings {
  return {
    label: cfg.archive?.label ?? "FIELD NOTES",
    start: cfg.archive?.start ?? 100,
  };
}
