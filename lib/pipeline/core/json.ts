import { ok, fatal, type Outcome } from "./outcome";

/**
 * Locate and parse the first top-level `{...}` object in an LLM response.
 *
 * Models often wrap JSON in prose or a Markdown fence. Braces inside string
 * literals are skipped while matching. If the balanced span does not parse,
 * the widest candidate (first `{` to last `}`) is tried before giving up.
 */
export function extractJsonObject(text: string): Outcome<unknown> {
  const start = text.indexOf("{");
  if (start === -1) return fatal("response contains no JSON object");

  const end = findObjectEnd(text, start);
  const candidates: string[] = [];
  if (end !== -1) candidates.push(text.slice(start, end + 1));
  const last = text.lastIndexOf("}");
  if (last > start) {
    const widest = text.slice(start, last + 1);
    if (!candidates.includes(widest)) candidates.push(widest);
  }

  let lastError = "unterminated JSON object";
  for (const candidate of candidates) {
    try {
      return ok(JSON.parse(candidate));
    } catch (err) {
      lastError = err instanceof Error ? err.message : String(err);
    }
  }
  return fatal(`invalid JSON: ${lastError}`);
}

function findObjectEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** Strip a surrounding Markdown code fence (```html ... ```) if present. */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = trimmed.match(/^```[\w-]*\s*\n([\s\S]*?)\n?```$/);
  return match ? match[1].trim() : trimmed;
}
