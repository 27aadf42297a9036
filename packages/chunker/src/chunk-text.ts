import type { ChunkingOptions } from "@ingestkit/types";

const DEFAULT_SEPARATOR = "\n\n";
const SENTENCE_BREAKS = [". ", "! ", "? ", "\n"];

/** Index of the last `needle` lying wholly inside `[start, end)`, or -1. */
function lastIndexWithin(text: string, needle: string, start: number, end: number): number {
  const from = end - needle.length;
  if (from < start) return -1;
  const idx = text.lastIndexOf(needle, from);
  return idx >= start ? idx : -1;
}

/**
 * Hard-split text that has no usable paragraph boundaries. Each piece ends
 * after the last sentence break in its window, else after the last space,
 * else at the window edge. Consecutive pieces share up to `overlap` characters.
 */
export function splitLongText(text: string, chunkSize: number, overlap: number): string[] {
  const pieces: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = start + chunkSize;

    if (end < text.length) {
      let bestBreak = -1;
      for (const punct of SENTENCE_BREAKS) {
        const idx = lastIndexWithin(text, punct, start, end);
        if (idx > bestBreak) {
          bestBreak = idx + punct.length;
        }
      }

      if (bestBreak <= start) {
        const spaceIdx = lastIndexWithin(text, " ", start, end);
        bestBreak = spaceIdx > start ? spaceIdx + 1 : end;
      }

      end = bestBreak;
    }

    const piece = text.slice(start, end).trim();
    if (piece.length > 0) {
      pieces.push(piece);
    }

    start = Math.max(start + 1, end - overlap);
  }

  return pieces;
}

/**
 * Split text into chunks of at most `chunkSize` characters, packing whole
 * paragraphs where they fit and carrying the last `overlap` characters of a
 * flushed chunk into the next one.
 */
export function chunkText(text: string, options: ChunkingOptions): string[] {
  const { chunkSize, overlap } = options;
  const separator = options.separator ?? DEFAULT_SEPARATOR;

  const trimmed = text.trim();
  if (trimmed.length === 0) return [];
  if (trimmed.length <= chunkSize) return [trimmed];

  const chunks: string[] = [];
  let current = "";

  for (const rawParagraph of trimmed.split(separator)) {
    const paragraph = rawParagraph.trim();
    if (paragraph.length === 0) continue;

    if (current.length + paragraph.length + separator.length > chunkSize) {
      if (current.length > 0) {
        chunks.push(current.trim());
        const seeded =
          overlap > 0 && current.length > overlap
            ? current.slice(-overlap) + separator + paragraph
            : paragraph;
        // The seed is dropped when it would push the paragraph past the limit.
        current = seeded.length <= chunkSize ? seeded : paragraph;
      } else {
        current = paragraph;
      }

      if (current.length > chunkSize) {
        const pieces = splitLongText(current, chunkSize, overlap);
        chunks.push(...pieces.slice(0, -1));
        current = pieces.at(-1) ?? "";
      }
    } else {
      current = current.length > 0 ? current + separator + paragraph : paragraph;
    }
  }

  if (current.length > 0) {
    chunks.push(current.trim());
  }

  return chunks.filter((chunk) => chunk.trim().length > 0);
}
