import { parseDocument, DomUtils } from "htmlparser2";

type DomNode = ReturnType<typeof parseDocument>["children"][number];

const WORDS_PER_MINUTE = 200;
const EXEMPT_TAGS = new Set(["style", "script"]);

function collectText(nodes: DomNode[], out: string[]): void {
  for (const node of nodes) {
    if (DomUtils.isText(node)) {
      out.push(node.data);
    } else if (DomUtils.isTag(node)) {
      if (!EXEMPT_TAGS.has(node.name)) collectText(node.children, out);
    } else if (DomUtils.hasChildren(node)) {
      collectText(node.children, out);
    }
  }
}

/** Words in the visible text of an HTML fragment (or plain text). */
export function countWords(html: string): number {
  const parts: string[] = [];
  collectText(parseDocument(html).children, parts);
  return parts.join(" ").split(/\s+/).filter(Boolean).length;
}

/** Whole minutes at 200 words per minute, never less than 1. */
export function estimateReadTime(html: string): number {
  return Math.max(1, Math.floor(countWords(html) / WORDS_PER_MINUTE));
}
