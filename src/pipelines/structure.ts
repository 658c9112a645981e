import { getDefaultLexicon, Lexicon } from "../config/lexicon.js";
import { ChapterExtraction, StructuralIndex } from "../domain/types.js";

export const CHAPTER_CONTEXT_LINES = 20;
export const PAGE_CONTEXT_LINES = 10;
export const TOC_CONTEXT_LINES = 50;

const CHARS_PER_PAGE = 3000;

export type StructureTag = "chapter" | "page";

export interface StructurePattern {
  tag: StructureTag;
  pattern: RegExp;
}

/**
 * Evaluated top to bottom against each trimmed line; the first hit decides
 * the line. Chapter patterns capture (number, title), the page marker
 * captures the page number.
 */
export const STRUCTURE_PATTERNS: readonly StructurePattern[] = [
  { tag: "chapter", pattern: /cap[íÍiI]tulo\s+(\d+)[\s:.-]+(.+)$/i },
  { tag: "chapter", pattern: /chapter\s+(\d+)[\s:.-]+(.+)$/i },
  { tag: "chapter", pattern: /^\s*(\d+)\s*[-–—.]\s*(.+)$/ },
  { tag: "page", pattern: /---\s*(?:p[áÁaA]gina|page)\s+(\d+)\s*---/i },
];

export function analyzeStructure(
  text: string,
  lexicon: Lexicon = getDefaultLexicon(),
): StructuralIndex {
  const structure: StructuralIndex = { chapters: [], pages: [], tableOfContents: [] };
  const lines = text.split("\n");

  for (let i = 0; i < lines.length; i += 1) {
    const line = lines[i].trim();
    if (!line) {
      continue;
    }

    const hit = matchStructureLine(line);
    if (hit?.tag === "page") {
      structure.pages.push({
        number: hit.number,
        line: i,
        context: lines.slice(i, i + PAGE_CONTEXT_LINES).join("\n"),
      });
    } else if (hit?.tag === "chapter") {
      structure.chapters.push({
        number: hit.number,
        title: hit.title,
        line: i,
        context: lines.slice(i, i + CHAPTER_CONTEXT_LINES).join("\n"),
      });
    }

    const lower = line.toLowerCase();
    if (lexicon.tocKeywords.some((keyword) => lower.includes(keyword))) {
      structure.tableOfContents.push({
        line: i,
        context: lines.slice(i, i + TOC_CONTEXT_LINES).join("\n"),
      });
    }
  }

  return structure;
}

export function matchStructureLine(
  line: string,
): { tag: StructureTag; number: number; title: string } | null {
  for (const { tag, pattern } of STRUCTURE_PATTERNS) {
    const match = pattern.exec(line);
    if (!match) {
      continue;
    }
    return {
      tag,
      number: Number.parseInt(match[1], 10),
      title: (match[2] ?? "").trim(),
    };
  }
  return null;
}

/**
 * Lines from the chapter's header up to the next detected chapter header,
 * or to the end of the document for the last one.
 */
export function extractChapterText(
  text: string,
  chapterNumber: number,
  structure: StructuralIndex,
): ChapterExtraction {
  const position = structure.chapters.findIndex((chapter) => chapter.number === chapterNumber);
  if (position < 0) {
    return { status: "not_found", chapterNumber, reason: "chapter_not_detected" };
  }

  const chapter = structure.chapters[position];
  const next = structure.chapters[position + 1];
  const lines = text.split("\n");
  const end = next ? next.line : lines.length;
  const chapterText = lines.slice(chapter.line, end).join("\n");

  if (!chapterText.trim()) {
    return { status: "not_found", chapterNumber, reason: "empty_chapter" };
  }
  return { status: "found", chapter, text: chapterText };
}

export function estimatePageCount(text: string, structure: StructuralIndex): number {
  if (structure.pages.length > 0) {
    return structure.pages.reduce((highest, page) => Math.max(highest, page.number), 0);
  }
  return Math.max(1, Math.floor(text.length / CHARS_PER_PAGE));
}
