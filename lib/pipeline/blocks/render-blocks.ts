import {
  parseBlock,
  fallbackText,
  type Block,
  type UnrecognizedBlock,
  type HeadingBlock,
  type ListBlock,
  type TableBlock,
  type CalloutBlock,
  type AccordionBlock,
  type TabsBlock,
  type CodeBlock,
  type QuoteBlock,
  type VideoBlock,
} from "./block-schema";

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => ESCAPES[ch] ?? ch);
}

// ============================================================================
// Variants
// ============================================================================

function renderParagraph(text: string): string {
  return `<p>${escapeHtml(text)}</p>`;
}

export function clampHeadingLevel(level: number): 2 | 3 | 4 {
  const rounded = Math.round(level);
  if (!(rounded > 2)) return 2;
  if (rounded >= 4) return 4;
  return 3;
}

function renderHeading(block: HeadingBlock): string {
  const level = clampHeadingLevel(block.level);
  return `<h${level}>${escapeHtml(block.text)}</h${level}>`;
}

function renderList(block: ListBlock): string {
  const tag = block.ordered ? "ol" : "ul";
  const items = block.items.map((item) => `  <li>${escapeHtml(item)}</li>`).join("\n");
  return `<${tag} class="my-4 pl-6 space-y-2">\n${items}\n</${tag}>`;
}

function renderTable(block: TableBlock): string {
  const headerCells = block.headers
    .map((h) => `        <th class="border border-neutral-700 px-4 py-2 text-left">${escapeHtml(h)}</th>`)
    .join("\n");
  const bodyRows = block.rows
    .map((row) => {
      const cells = row
        .map((cell) => `        <td class="border border-neutral-700 px-4 py-2">${escapeHtml(cell)}</td>`)
        .join("\n");
      return `      <tr>\n${cells}\n      </tr>`;
    })
    .join("\n");
  return [
    `<div data-block="table" class="my-6 overflow-x-auto">`,
    `  <table class="w-full border-collapse border border-neutral-700 text-sm">`,
    `    <thead class="bg-neutral-800">`,
    `      <tr>`,
    headerCells,
    `      </tr>`,
    `    </thead>`,
    `    <tbody>`,
    bodyRows,
    `    </tbody>`,
    `  </table>`,
    `</div>`,
  ]
    .filter((line) => line !== "")
    .join("\n");
}

export type CalloutStyle = "info" | "warning" | "tip" | "note";

const CALLOUT_STYLES: Record<CalloutStyle, { border: string; bg: string; icon: string }> = {
  info: { border: "border-blue-500", bg: "bg-blue-500/10", icon: "&#8505;&#65039;" },
  warning: { border: "border-yellow-500", bg: "bg-yellow-500/10", icon: "&#9888;&#65039;" },
  tip: { border: "border-green-500", bg: "bg-green-500/10", icon: "&#128161;" },
  note: { border: "border-purple-500", bg: "bg-purple-500/10", icon: "&#128221;" },
};

function isCalloutStyle(style: string): style is CalloutStyle {
  return Object.prototype.hasOwnProperty.call(CALLOUT_STYLES, style);
}

function renderCallout(block: CalloutBlock): string {
  const style: CalloutStyle = isCalloutStyle(block.style) ? block.style : "info";
  const cfg = CALLOUT_STYLES[style];
  // Unknown styles keep the requested value for later inspection
  const requested = style === block.style ? "" : ` data-callout-style="${escapeHtml(block.style)}"`;
  return [
    `<div data-block="callout" data-callout-type="${style}"${requested} class="my-6 p-4 rounded-lg border-l-4 ${cfg.border} ${cfg.bg}">`,
    `  <div class="flex gap-3">`,
    `    <span class="text-xl">${cfg.icon}</span>`,
    `    <div>`,
    `      <strong class="block mb-1">${escapeHtml(block.title)}</strong>`,
    `      <p class="text-gray-300 m-0">${escapeHtml(block.content)}</p>`,
    `    </div>`,
    `  </div>`,
    `</div>`,
  ].join("\n");
}

function renderAccordion(block: AccordionBlock): string {
  const items = block.items.map((item, i) =>
    [
      `  <div data-accordion-item="${i}" class="border border-neutral-700 rounded-lg mb-2 overflow-hidden">`,
      `    <div data-accordion-trigger class="px-4 py-3 bg-neutral-800 font-medium cursor-pointer flex justify-between items-center">`,
      `      <span>${escapeHtml(item.title)}</span>`,
      `      <span>&#9660;</span>`,
      `    </div>`,
      `    <div data-accordion-content class="px-4 py-3 border-t border-neutral-700">${escapeHtml(item.content)}</div>`,
      `  </div>`,
    ].join("\n")
  );
  return [`<div data-block="accordion" class="my-6">`, ...items, `</div>`].join("\n");
}

function renderTabs(block: TabsBlock): string {
  const buttons = block.tabs.map((tab, i) => {
    const label = tab.label ?? `Tab ${i + 1}`;
    const state = i === 0 ? "border-orange-500 text-orange-500" : "border-transparent text-gray-400";
    return `    <button data-tab-button="${i}" class="px-4 py-2 border-b-2 ${state}">${escapeHtml(label)}</button>`;
  });
  const panels = block.tabs.map((tab, i) => {
    const hidden = i === 0 ? "" : "hidden ";
    return `    <div data-tab-content="${i}" class="${hidden}p-4">${escapeHtml(tab.content)}</div>`;
  });
  return [
    `<div data-block="tabs" class="my-6 border border-neutral-700 rounded-lg overflow-hidden">`,
    `  <div class="flex border-b border-neutral-700 bg-neutral-800">`,
    ...buttons,
    `  </div>`,
    `  <div>`,
    ...panels,
    `  </div>`,
    `</div>`,
  ].join("\n");
}

function renderCode(block: CodeBlock): string {
  const filename = block.filename ?? "";
  const lines = [
    `<div data-block="code" data-language="${escapeHtml(block.language)}" data-filename="${escapeHtml(filename)}" class="my-6 rounded-lg overflow-hidden bg-neutral-900 border border-neutral-700">`,
  ];
  if (filename) {
    lines.push(
      `  <div class="px-4 py-2 bg-neutral-800 border-b border-neutral-700 text-xs text-gray-400 font-mono">${escapeHtml(filename)}</div>`
    );
  }
  lines.push(
    `  <pre class="p-4 overflow-x-auto m-0"><code class="text-sm font-mono text-gray-200">${escapeHtml(block.code)}</code></pre>`,
    `</div>`
  );
  return lines.join("\n");
}

function renderQuote(block: QuoteBlock): string {
  const author = block.author ?? "";
  const lines = [
    `<blockquote data-block="quote" data-author="${escapeHtml(author)}" class="my-8 pl-6 border-l-4 border-orange-500 py-4 pr-4 rounded-r-lg">`,
    `  <p class="text-lg italic text-gray-200 m-0">&ldquo;${escapeHtml(block.text)}&rdquo;</p>`,
  ];
  if (author) {
    lines.push(`  <footer class="mt-3 text-sm text-gray-400">&mdash; ${escapeHtml(author)}</footer>`);
  }
  lines.push(`</blockquote>`);
  return lines.join("\n");
}

export type VideoType = "youtube" | "vimeo" | "other";

export interface VideoTarget {
  type: VideoType;
  /** Null when no id could be located in the URL. */
  videoId: string | null;
  embedUrl: string;
}

function cutAt(value: string, stops: string): string {
  let end = value.length;
  for (const stop of stops) {
    const idx = value.indexOf(stop);
    if (idx !== -1 && idx < end) end = idx;
  }
  return value.slice(0, end);
}

/**
 * Classify a video URL by substring match and derive its embed URL.
 * Unsupported hosts pass through unchanged.
 */
export function classifyVideoUrl(url: string): VideoTarget {
  if (url.includes("youtube.com") || url.includes("youtu.be")) {
    let videoId: string | null = null;
    const shortIdx = url.indexOf("youtu.be/");
    const paramIdx = url.lastIndexOf("v=");
    if (shortIdx !== -1) {
      videoId = cutAt(url.slice(shortIdx + "youtu.be/".length), "?&#");
    } else if (paramIdx !== -1) {
      videoId = cutAt(url.slice(paramIdx + 2), "&#");
    }
    if (!videoId) return { type: "youtube", videoId: null, embedUrl: url };
    return {
      type: "youtube",
      videoId,
      embedUrl: `https://www.youtube.com/embed/${encodeURIComponent(videoId)}`,
    };
  }

  if (url.includes("vimeo.com")) {
    const segments = cutAt(url, "?#").split("/").filter(Boolean);
    const videoId = segments.length > 0 ? segments[segments.length - 1] : "";
    if (!videoId || videoId.includes("vimeo.com")) {
      return { type: "vimeo", videoId: null, embedUrl: url };
    }
    return {
      type: "vimeo",
      videoId,
      embedUrl: `https://player.vimeo.com/video/${encodeURIComponent(videoId)}`,
    };
  }

  return { type: "other", videoId: null, embedUrl: url };
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
}

function renderVideo(block: VideoBlock): string {
  const target = classifyVideoUrl(block.url);
  // Only http(s) targets are embedded
  if (!isHttpUrl(target.embedUrl)) {
    const text = block.caption ? `${block.caption}: ${block.url}` : block.url;
    return `<p data-block="video" data-video-type="${target.type}">${escapeHtml(text)}</p>`;
  }
  const lines = [
    `<div data-block="video" data-video-type="${target.type}" class="my-8">`,
    `  <div class="relative aspect-video rounded-lg overflow-hidden bg-neutral-800">`,
    `    <iframe src="${escapeHtml(target.embedUrl)}" title="Video" allow="accelerometer; autoplay; clipboard-write; encrypted-media; gyroscope; picture-in-picture" allowfullscreen class="absolute inset-0 w-full h-full"></iframe>`,
    `  </div>`,
  ];
  if (block.caption) {
    lines.push(`  <p class="mt-2 text-center text-sm text-gray-400">${escapeHtml(block.caption)}</p>`);
  }
  lines.push(`</div>`);
  return lines.join("\n");
}

function renderUnrecognized(block: UnrecognizedBlock): string {
  return `<p data-block-fallback="${block.reason}">${escapeHtml(block.fallbackText)}</p>`;
}

// ============================================================================
// Entry points
// ============================================================================

export function renderBlock(block: Block | UnrecognizedBlock): string {
  switch (block.type) {
    case "paragraph":
      return renderParagraph(block.text);
    case "heading":
      return renderHeading(block);
    case "list":
      return renderList(block);
    case "table":
      return renderTable(block);
    case "callout":
      return renderCallout(block);
    case "accordion":
      return renderAccordion(block);
    case "tabs":
      return renderTabs(block);
    case "code":
      return renderCode(block);
    case "quote":
      return renderQuote(block);
    case "video":
      return renderVideo(block);
    case "unrecognized":
      return renderUnrecognized(block);
  }
}

/**
 * Render model-produced blocks to HTML, one blank line between blocks.
 *
 * Total over its input: an entry that is not a known, well-formed block
 * becomes a fallback paragraph and never aborts the rest of the sequence.
 */
export function renderBlocks(blocks: readonly unknown[]): string {
  return blocks
    .map((raw) => {
      try {
        return renderBlock(parseBlock(raw));
      } catch {
        // Render failure of one block degrades to its text
        return `<p data-block-fallback="render-error">${escapeHtml(fallbackText(raw))}</p>`;
      }
    })
    .join("\n\n");
}
