import { ConfigurationError } from "../domain/errors.js";
import { Chunk } from "../domain/types.js";

export const DEFAULT_CHUNK_SIZE = 4000;
export const DEFAULT_CHUNK_OVERLAP = 400;

// A boundary is only taken if the chunk reaches this share of the size bound.
const MIN_FILL_RATIO = 0.5;

interface BoundaryTier {
  name: "paragraph" | "line" | "sentence" | "word";
  separators: string[];
}

const BOUNDARY_TIERS: readonly BoundaryTier[] = [
  { name: "paragraph", separators: ["\n\n"] },
  { name: "line", separators: ["\n"] },
  { name: "sentence", separators: [". ", "! ", "? ", "; "] },
  { name: "word", separators: [" "] },
];

export interface ChunkingOptions {
  chunkSize?: number;
  chunkOverlap?: number;
}

/**
 * Splits text into overlapping pieces of at most `chunkSize` characters.
 *
 * Every piece is an exact substring of `text`, and piece i+1 starts with the
 * last `chunkOverlap` characters of piece i, so
 * `pieces[0] + pieces.slice(1).map((p) => p.slice(overlap)).join("")` is the
 * original text. Ends prefer paragraph breaks, then line breaks, sentence
 * ends and spaces, and fall back to a hard cut at the size bound.
 */
export function splitIntoChunks(text: string, options: ChunkingOptions = {}): string[] {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const overlap = options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;
  assertChunkingOptions(chunkSize, overlap);

  if (!text.trim()) {
    return [];
  }

  const chunks: string[] = [];
  let start = 0;

  while (text.length - start > chunkSize) {
    const end = findChunkEnd(text, start, chunkSize, overlap);
    chunks.push(text.slice(start, end));
    start = end - overlap;
  }
  chunks.push(text.slice(start));

  return chunks;
}

export function assertChunkingOptions(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(
      "INVALID_CHUNK_SIZE",
      `Chunk size must be a positive integer, got ${chunkSize}.`,
    );
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new ConfigurationError(
      "INVALID_CHUNK_OVERLAP",
      `Chunk overlap must be an integer in [0, ${chunkSize}), got ${overlap}.`,
    );
  }
}

export function createChunkRecords(
  pieces: string[],
  input: { source: string; docHash: string },
): Chunk[] {
  return pieces.map((content, index) => ({
    content,
    index,
    metadata: {
      source: input.source,
      docHash: input.docHash,
      chunkIndex: index,
      chunkCount: pieces.length,
      charCount: content.length,
    },
  }));
}

function findChunkEnd(text: string, start: number, chunkSize: number, overlap: number): number {
  const windowEnd = start + chunkSize;
  const minEnd = Math.max(start + overlap + 1, start + Math.ceil(chunkSize * MIN_FILL_RATIO));

  for (const tier of BOUNDARY_TIERS) {
    let best = -1;
    for (const separator of tier.separators) {
      const idx = text.lastIndexOf(separator, windowEnd - separator.length);
      if (idx < 0) {
        continue;
      }
      const end = idx + separator.length;
      if (end >= minEnd && end > best) {
        best = end;
      }
    }
    if (best > 0) {
      return best;
    }
  }

  return windowEnd;
}
