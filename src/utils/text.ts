import { createHash } from "node:crypto";

const PUNCTUATION_REGEX = /[^\p{L}\p{N}_\s]/gu;
const COMBINING_MARKS_REGEX = /\p{M}+/gu;

export function normalizeText(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\t/g, " ").trim();
}

/** Lowercases and strips diacritics so "Capítulo" and "capitulo" compare equal. */
export function foldAccents(text: string): string {
  return text.normalize("NFD").replace(COMBINING_MARKS_REGEX, "").normalize("NFC").toLowerCase();
}

export function foldQuery(query: string): string {
  return foldAccents(query).replace(/\s+/g, " ").trim();
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Position of `phrase` in `text` where it is not glued to surrounding
 * letters or digits, or -1.
 */
export function findPhrase(text: string, phrase: string): number {
  if (!phrase) {
    return -1;
  }
  const pattern = new RegExp(
    `(?<![\\p{L}\\p{N}])${escapeRegExp(phrase)}(?![\\p{L}\\p{N}])`,
    "u",
  );
  const match = pattern.exec(text);
  return match ? match.index : -1;
}

/** Non-overlapping occurrences of `term`. */
export function countOccurrences(text: string, term: string): number {
  if (!term) {
    return 0;
  }
  let count = 0;
  let from = text.indexOf(term);
  while (from >= 0) {
    count += 1;
    from = text.indexOf(term, from + term.length);
  }
  return count;
}

export function extractKeywords(query: string, stopwords: Set<string>): string[] {
  return query
    .toLowerCase()
    .replace(PUNCTUATION_REGEX, "")
    .split(/\s+/)
    .filter((word) => word.length > 2 && !stopwords.has(word));
}

export function estimateTokens(text: string): number {
  return Math.floor(text.length / 4);
}

export function computeContentHash(text: string): string {
  return createHash("md5").update(text, "utf8").digest("hex");
}

export function formatCount(value: number): string {
  return String(value).replace(/\B(?=(\d{3})+(?!\d))/g, ",");
}

/**
 * Head, middle and tail of a long document joined by `[...]` markers,
 * splitting the budget 50/25/25.
 */
export function buildDocumentPreview(text: string, maxChars: number): string {
  if (text.length <= maxChars) {
    return text;
  }

  const headSize = Math.floor(maxChars / 2);
  const middleSize = Math.floor(maxChars / 4);
  const tailSize = Math.floor(maxChars / 4);

  const head = text.slice(0, headSize);
  const middlePosition = Math.floor(text.length / 2);
  const middleStart = Math.max(0, middlePosition - Math.floor(middleSize / 2));
  const middleEnd = Math.min(text.length, middlePosition + Math.floor(middleSize / 2));
  const middle = text.slice(middleStart, middleEnd);
  const tail = tailSize > 0 ? text.slice(-tailSize) : "";

  return `${head}\n\n[...]\n\n${middle}\n\n[...]\n\n${tail}`;
}
