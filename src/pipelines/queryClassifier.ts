import { getDefaultLexicon, Lexicon, OrdinalValue } from "../config/lexicon.js";
import { ChapterReference, QueryCategory, StructuralIndex } from "../domain/types.js";
import { escapeRegExp, findPhrase, foldAccents, foldQuery } from "../utils/text.js";

/**
 * First match wins: structure phrases, then chapter references, then
 * free-text content.
 */
export function classifyQuery(
  query: string,
  lexicon: Lexicon = getDefaultLexicon(),
): QueryCategory {
  const folded = foldQuery(query);

  if (lexicon.structurePhrases.some((phrase) => findPhrase(folded, foldAccents(phrase)) >= 0)) {
    return "general-structure";
  }

  if (findOrdinalReference(folded, lexicon) !== null || findNumericReference(folded, lexicon) !== null) {
    return "specific-chapter";
  }

  return "specific-content";
}

export function isPageCountQuery(query: string, lexicon: Lexicon = getDefaultLexicon()): boolean {
  const folded = foldQuery(query);
  return lexicon.pageCountPhrases.some((phrase) => findPhrase(folded, foldAccents(phrase)) >= 0);
}

/**
 * Ordinal words ("segundo capítulo", "last chapter") take precedence over
 * digits. "Last" resolves against the chapters detected in the document.
 */
export function resolveChapterNumber(
  query: string,
  structure: StructuralIndex,
  lexicon: Lexicon = getDefaultLexicon(),
): ChapterReference {
  const folded = foldQuery(query);

  const ordinal = findOrdinalReference(folded, lexicon);
  if (ordinal === "last") {
    if (structure.chapters.length === 0) {
      return { status: "indeterminate", reason: "no_chapters_detected" };
    }
    return {
      status: "resolved",
      chapterNumber: structure.chapters.reduce(
        (highest, chapter) => Math.max(highest, chapter.number),
        0,
      ),
      via: "ordinal",
    };
  }
  if (ordinal !== null) {
    return { status: "resolved", chapterNumber: ordinal, via: "ordinal" };
  }

  const numeric = findNumericReference(folded, lexicon);
  if (numeric !== null) {
    return { status: "resolved", chapterNumber: numeric, via: "numeric" };
  }

  return { status: "indeterminate", reason: "no_chapter_reference" };
}

function findOrdinalReference(folded: string, lexicon: Lexicon): OrdinalValue | null {
  const chapterWords = lexicon.chapterWords.map(foldAccents);
  let best: { position: number; value: OrdinalValue } | null = null;

  for (const [word, value] of lexicon.ordinals) {
    const ordinal = foldAccents(word);
    for (const chapterWord of chapterWords) {
      for (const phrase of [`${ordinal} ${chapterWord}`, `${chapterWord} ${ordinal}`]) {
        const position = findPhrase(folded, phrase);
        if (position >= 0 && (!best || position < best.position)) {
          best = { position, value };
        }
      }
    }
  }

  return best ? best.value : null;
}

function findNumericReference(folded: string, lexicon: Lexicon): number | null {
  const words = lexicon.chapterWords.map((word) => escapeRegExp(foldAccents(word))).join("|");
  const patterns = [
    new RegExp(`(?:${words})\\s+(\\d+)`, "u"),
    new RegExp(`(?<!\\d)(\\d+)(?:º|ª|°|st|nd|rd|th)?\\s+(?:${words})`, "u"),
  ];

  for (const pattern of patterns) {
    const match = pattern.exec(folded);
    if (match) {
      return Number.parseInt(match[1], 10);
    }
  }
  return null;
}
