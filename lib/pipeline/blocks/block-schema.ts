import { z } from "zod/v4";

// ============================================================================
// Block variants
// ============================================================================

export interface ParagraphBlock {
  type: "paragraph";
  text: string;
}

export interface HeadingBlock {
  type: "heading";
  /** Raw level as given; the renderer clamps it into 2..4. */
  level: number;
  text: string;
}

export interface ListBlock {
  type: "list";
  ordered: boolean;
  items: string[];
}

export interface TableBlock {
  type: "table";
  headers: string[];
  rows: string[][];
}

export interface CalloutBlock {
  type: "callout";
  style: string;
  title: string;
  content: string;
}

export interface AccordionBlock {
  type: "accordion";
  items: { title: string; content: string }[];
}

export interface TabsBlock {
  type: "tabs";
  tabs: { label?: string; content: string }[];
}

export interface CodeBlock {
  type: "code";
  language: string;
  filename?: string;
  code: string;
}

export interface QuoteBlock {
  type: "quote";
  text: string;
  author?: string;
}

export interface VideoBlock {
  type: "video";
  url: string;
  caption?: string;
}

export type Block =
  | ParagraphBlock
  | HeadingBlock
  | ListBlock
  | TableBlock
  | CalloutBlock
  | AccordionBlock
  | TabsBlock
  | CodeBlock
  | QuoteBlock
  | VideoBlock;

export type BlockType = Block["type"];

export const BLOCK_TYPES: readonly BlockType[] = [
  "paragraph",
  "heading",
  "list",
  "table",
  "callout",
  "accordion",
  "tabs",
  "code",
  "quote",
  "video",
];

/**
 * A raw block that could not be read as any known variant. Rendered as a
 * paragraph of `fallbackText`.
 */
export interface UnrecognizedBlock {
  type: "unrecognized";
  declaredType: string | null;
  reason: "unknown-type" | "invalid-payload";
  raw: unknown;
  fallbackText: string;
}

// ============================================================================
// Schemas
// ============================================================================

// Models sometimes emit numbers or booleans where text is expected.
const text = z.union([z.string(), z.number(), z.boolean()]).transform((v) => String(v));
const optionalText = text.optional();

const paragraphSchema = z.object({ text });

const headingSchema = z.object({
  level: z.number().optional(),
  text,
});

const listSchema = z.object({
  ordered: z.boolean().optional(),
  items: z.array(text),
});

const tableSchema = z.object({
  headers: z.array(text).optional(),
  rows: z.array(z.array(text)).optional(),
});

const calloutSchema = z.object({
  style: z.string().optional(),
  title: optionalText,
  content: optionalText,
});

const accordionSchema = z.object({
  items: z
    .array(z.object({ title: optionalText, content: optionalText }))
    .optional(),
});

const tabsSchema = z.object({
  tabs: z
    .array(z.object({ label: optionalText, content: optionalText }))
    .optional(),
});

const codeSchema = z.object({
  language: z.string().optional(),
  filename: z.string().optional(),
  code: optionalText,
});

const quoteSchema = z.object({
  text: optionalText,
  author: z.string().optional(),
});

const videoSchema = z.object({
  url: z.string(),
  caption: optionalText,
});

// ============================================================================
// Parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isBlockType(value: string): value is BlockType {
  return BLOCK_TYPES.some((t) => t === value);
}

function scalarText(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

/**
 * Text used when a block cannot be rendered as its own type: its `text`
 * field, else its `content` field, else the whole block serialized.
 */
export function fallbackText(raw: unknown): string {
  if (!isRecord(raw)) {
    return typeof raw === "string" ? raw : (JSON.stringify(raw) ?? String(raw));
  }
  return scalarText(raw.text) ?? scalarText(raw.content) ?? JSON.stringify(raw);
}

function unrecognized(
  raw: unknown,
  declaredType: string | null,
  reason: UnrecognizedBlock["reason"]
): UnrecognizedBlock {
  return { type: "unrecognized", declaredType, reason, raw, fallbackText: fallbackText(raw) };
}

/**
 * Read one raw block from model output. Never throws: anything that is not
 * a well-formed known variant comes back as an UnrecognizedBlock.
 *
 * A block without a `type` is read as a paragraph.
 */
export function parseBlock(raw: unknown): Block | UnrecognizedBlock {
  if (!isRecord(raw)) return unrecognized(raw, null, "invalid-payload");

  const declared = raw.type === undefined ? "paragraph" : raw.type;
  if (typeof declared !== "string") {
    return unrecognized(raw, String(declared), "unknown-type");
  }
  if (!isBlockType(declared)) return unrecognized(raw, declared, "unknown-type");

  const block = toBlock(declared, raw);
  return block ?? unrecognized(raw, declared, "invalid-payload");
}

function toBlock(type: BlockType, raw: Record<string, unknown>): Block | null {
  switch (type) {
    case "paragraph": {
      const r = paragraphSchema.safeParse(raw);
      return r.success ? { type, text: r.data.text } : null;
    }
    case "heading": {
      const r = headingSchema.safeParse(raw);
      return r.success ? { type, level: r.data.level ?? 2, text: r.data.text } : null;
    }
    case "list": {
      const r = listSchema.safeParse(raw);
      return r.success ? { type, ordered: r.data.ordered ?? false, items: r.data.items } : null;
    }
    case "table": {
      const r = tableSchema.safeParse(raw);
      return r.success ? { type, headers: r.data.headers ?? [], rows: r.data.rows ?? [] } : null;
    }
    case "callout": {
      const r = calloutSchema.safeParse(raw);
      if (!r.success) return null;
      return {
        type,
        style: r.data.style ?? "info",
        title: r.data.title ?? "",
        content: r.data.content ?? "",
      };
    }
    case "accordion": {
      const r = accordionSchema.safeParse(raw);
      if (!r.success) return null;
      return {
        type,
        items: (r.data.items ?? []).map((i) => ({ title: i.title ?? "", content: i.content ?? "" })),
      };
    }
    case "tabs": {
      const r = tabsSchema.safeParse(raw);
      if (!r.success) return null;
      return {
        type,
        tabs: (r.data.tabs ?? []).map((t) => ({ label: t.label, content: t.content ?? "" })),
      };
    }
    case "code": {
      const r = codeSchema.safeParse(raw);
      if (!r.success) return null;
      return {
        type,
        language: r.data.language ?? "",
        filename: r.data.filename,
        code: r.data.code ?? "",
      };
    }
    case "quote": {
      const r = quoteSchema.safeParse(raw);
      return r.success ? { type, text: r.data.text ?? "", author: r.data.author } : null;
    }
    case "video": {
      const r = videoSchema.safeParse(raw);
      return r.success ? { type, url: r.data.url, caption: r.data.caption } : null;
    }
  }
}
