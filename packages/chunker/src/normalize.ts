import type { DocumentFormat, DocumentMetadata } from "@ingestkit/types";

const NAMED_ENTITIES: Readonly<Record<string, string>> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: " ",
  ndash: "–",
  mdash: "—",
  hellip: "…",
  lsquo: "‘",
  rsquo: "’",
  ldquo: "“",
  rdquo: "”",
  copy: "©",
  reg: "®",
  trade: "™",
  deg: "°",
  middot: "·",
  bull: "•",
  euro: "€",
  pound: "£",
  yen: "¥",
  cent: "¢",
  sect: "§",
  para: "¶",
  times: "×",
  divide: "÷",
};

function decodeCodePoint(code: number, fallback: string): string {
  if (!Number.isFinite(code) || code < 0 || code > 0x10ffff) return fallback;
  return String.fromCodePoint(code);
}

export function decodeHtmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#[0-9]+|[a-z][a-z0-9]*);/gi, (match, body: string) => {
    if (body.startsWith("#x") || body.startsWith("#X")) {
      return decodeCodePoint(parseInt(body.slice(2), 16), match);
    }
    if (body.startsWith("#")) {
      return decodeCodePoint(parseInt(body.slice(1), 10), match);
    }
    return NAMED_ENTITIES[body] ?? NAMED_ENTITIES[body.toLowerCase()] ?? match;
  });
}

export function stripHtml(html: string): string {
  const withoutTags = html
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
    .replace(/<[^>]+>/g, " ");
  return decodeHtmlEntities(withoutTags);
}

/**
 * Reduce markdown to its prose: code fences and images go, inline code,
 * links and emphasis are unwrapped, heading markers dropped.
 */
export function stripMarkdown(markdown: string): string {
  return markdown
    .replace(/```[\s\S]*?```/g, "")
    .replace(/`([^`]+)`/g, "$1")
    .replace(/!\[([^\]]*)\]\([^)]+\)/g, "")
    .replace(/\[([^\]]+)\]\([^)]+\)/g, "$1")
    .replace(/^#{1,6}\s+/gm, "")
    .replace(/\*\*([^*]+)\*\*/g, "$1")
    .replace(/\*([^*]+)\*/g, "$1")
    .replace(/__([^_]+)__/g, "$1")
    .replace(/_([^_]+)_/g, "$1");
}

// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\x00-\x08\x0b\x0c\x0e-\x1f\x7f-\x9f]/g;

export function cleanText(text: string): string {
  return text.replace(/\s+/g, " ").replace(CONTROL_CHARS, "").trim();
}

export function normalizeText(text: string, format: DocumentFormat): string {
  switch (format) {
    case "html":
      return cleanText(stripHtml(text));
    case "markdown":
      return cleanText(stripMarkdown(text));
    case "text":
      return cleanText(text);
  }
}

/** Pick a format from the `extension` / `content_type` a source fetcher recorded. */
export function detectFormat(metadata: DocumentMetadata): DocumentFormat {
  const extension = String(metadata["extension"] ?? "").toLowerCase();
  if (extension === ".html" || extension === ".htm") return "html";
  if (extension === ".md" || extension === ".markdown") return "markdown";

  const contentType = String(metadata["content_type"] ?? "").toLowerCase();
  if (contentType.includes("html")) return "html";
  if (contentType.includes("markdown")) return "markdown";

  return "text";
}
