import type { Chunk, Document } from "./types";

export interface ChunkOptions {
  /** Maximum characters per chunk. */
  chunkSize: number;
  /** Characters of the previous chunk repeated at the start of the next. */
  chunkOverlap: number;
}

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  chunkSize: 200,
  chunkOverlap: 0,
};

// Cut candidates, strongest first. Each match ends where the next chunk begins.
const BOUNDARIES: readonly RegExp[] = [
  /\n[ \t]*\n\s*/, // paragraph
  /[.!?]["'”’)\]]*\s+/, // sentence
  /\n\s*/, // line
  /\s+/, // word
];

/**
 * Split text into chunks of at most `chunkSize` characters, cutting at the
 * strongest boundary available inside each window and falling back to a
 * hard cut only when the window holds no usable boundary.
 *
 * The output is deterministic and covers the input without gaps: the first
 * chunk starts at 0, the last ends at `text.length`, and every chunk starts
 * at or before the end of its predecessor.
 *
 * @throws {RangeError} If `chunkSize` is not a positive integer or
 * `chunkOverlap` is not an integer in `[0, chunkSize)`.
 */
export function chunkText(text: string, options: Partial<ChunkOptions> = {}): Chunk[] {
  // An explicit undefined means the default.
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_OPTIONS.chunkSize;
  const chunkOverlap = options.chunkOverlap ?? DEFAULT_CHUNK_OPTIONS.chunkOverlap;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new RangeError(
      `chunkOverlap must be an integer in [0, ${chunkSize}), got ${chunkOverlap}`,
    );
  }

  const chunks: Chunk[] = [];
  const minLength = Math.max(1, Math.ceil(chunkSize / 4));
  let start = 0;

  while (start < text.length) {
    if (start + chunkSize >= text.length) {
      chunks.push(makeChunk(text, chunks.length, start, text.length));
      break;
    }

    const end = start + findCut(text.slice(start, start + chunkSize), text, start, minLength);
    chunks.push(makeChunk(text, chunks.length, start, end));

    let next =
      chunkOverlap > 0 ? overlapStart(text, Math.max(start + 1, end - chunkOverlap), end) : end;
    if (next <= start) next = end;
    start = next;
  }

  return chunks;
}

/** {@link chunkText} over a loaded document. */
export function chunkDocument(document: Document, options: Partial<ChunkOptions> = {}): Chunk[] {
  return chunkText(document.text, options);
}

function makeChunk(text: string, index: number, start: number, end: number): Chunk {
  return { index, text: text.slice(start, end), start, end };
}

/** Length of the chunk starting at `offset`, given its full-size window. */
function findCut(window: string, text: string, offset: number, minLength: number): number {
  for (const pattern of BOUNDARIES) {
    const cut = lastBoundary(window, pattern, minLength);
    if (cut > 0) return cut;
  }
  // Hard cut; never separate a surrogate pair.
  let cut = window.length;
  if (cut > 1 && isHighSurrogate(text.charCodeAt(offset + cut - 1))) cut -= 1;
  return cut;
}

function lastBoundary(window: string, pattern: RegExp, minLength: number): number {
  const re = new RegExp(pattern.source, "g");
  let cut = -1;
  let match: RegExpExecArray | null;
  while ((match = re.exec(window)) !== null) {
    const end = match.index + match[0].length;
    if (end >= minLength) cut = end;
  }
  return cut;
}

/** First word start in `[from, end)`, or `from` when there is none. */
function overlapStart(text: string, from: number, end: number): number {
  if (from >= end) return end;
  if (from === 0 || /\s/.test(text.charAt(from - 1))) return from;
  const at = text.slice(from, end).search(/\s\S/);
  if (at !== -1) return from + at + 1;
  return isLowSurrogate(text.charCodeAt(from)) ? from + 1 : from;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}
