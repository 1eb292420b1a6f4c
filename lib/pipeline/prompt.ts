import path from "node:path";
import { Liquid, Tag, type TagToken, type TopLevelToken, type Template } from "liquidjs";
import type { Context } from "liquidjs";
import type { Emitter } from "liquidjs";
import type { Message } from "./core/types";

export interface PromptMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

const ROLES: readonly PromptMessage["role"][] = ["system", "user", "assistant"];

function isRole(value: string): value is PromptMessage["role"] {
  return ROLES.some((r) => r === value);
}

/**
 * Custom {% chat role: "system"|"user"|"assistant" %} ... {% endchat %} tag.
 * Emits delimiters that renderPrompt splits on to produce PromptMessage[].
 */
class ChatTag extends Tag {
  private role: string;

  constructor(token: TagToken, remainTokens: TopLevelToken[], liquid: Liquid) {
    super(token, remainTokens, liquid);
    const match = token.args.match(/role:\s*"(\w+)"/);
    if (!match || !isRole(match[1])) {
      throw new Error(`{% chat %} requires role: "system"|"user"|"assistant"`);
    }
    this.role = match[1];
    this.templates = [];
    const stream = liquid.parser
      .parseStream(remainTokens)
      .on("tag:endchat", () => stream.stop())
      .on("template", (tpl: Template) => this.templates.push(tpl))
      .on("end", () => {
        throw new Error("{% chat %} missing {% endchat %}");
      });
    stream.start();
  }

  *render(ctx: Context, emitter: Emitter): Generator<unknown, void, unknown> {
    emitter.write(`\x01CHAT:${this.role}\x01`);
    yield this.liquid.renderer.renderTemplates(this.templates, ctx, emitter);
    emitter.write(`\x01ENDCHAT\x01`);
  }

  private templates: Template[];
}

export const PROMPTS_DIR = path.resolve(process.env.PROMPTS_DIR ?? path.join(process.cwd(), "prompts"));

export function createPromptEngine(root: string = PROMPTS_DIR): Liquid {
  const engine = new Liquid({
    root: [root],
    partials: [root],
    extname: ".liquid",
    strictVariables: false,
  });
  engine.registerTag("chat", ChatTag);
  return engine;
}

const engine = createPromptEngine();

/**
 * Render a .liquid prompt template and return structured PromptMessage[].
 * The template must use {% chat role: "..." %} blocks.
 */
export async function renderPrompt(
  templateName: string,
  context: Record<string, unknown>,
  liquid: Liquid = engine
): Promise<PromptMessage[]> {
  const raw = await liquid.renderFile(templateName, context);
  return parseMessages(raw);
}

/**
 * Load and render a prompt, splitting the system message from the
 * conversation as TextModel expects.
 */
export async function loadPrompt(
  templateName: string,
  context: Record<string, unknown>,
  liquid: Liquid = engine
): Promise<{ system?: string; messages: Message[] }> {
  const promptMessages = await renderPrompt(templateName, context, liquid);
  const system = promptMessages
    .filter((m) => m.role === "system")
    .map((m) => m.content)
    .join("\n\n");
  const messages: Message[] = [];
  for (const m of promptMessages) {
    if (m.role !== "system") messages.push({ role: m.role, content: m.content });
  }
  if (messages.length === 0) {
    throw new Error(`Prompt "${templateName}" has no user message`);
  }
  return { system: system || undefined, messages };
}

/** Render a template that is plain text rather than a chat (e.g. an image prompt). */
export async function renderPromptText(
  templateName: string,
  context: Record<string, unknown>,
  liquid: Liquid = engine
): Promise<string> {
  const raw = await liquid.renderFile(templateName, context);
  return raw.trim().replace(/\s+/g, " ");
}

export function parseMessages(raw: string): PromptMessage[] {
  const messages: PromptMessage[] = [];
  const chatRegex = /\x01CHAT:(\w+)\x01([\s\S]*?)\x01ENDCHAT\x01/g;
  let match;

  while ((match = chatRegex.exec(raw)) !== null) {
    const role = match[1];
    if (!isRole(role)) continue;
    const content = match[2].trim();
    if (content) messages.push({ role, content });
  }

  return messages;
}
