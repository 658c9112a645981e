import { getDefaultLexicon, Lexicon } from "../config/lexicon.js";
import { assertTopK } from "../domain/errors.js";
import { ChapterReference, Chunk, QueryCategory, StructuralIndex } from "../domain/types.js";
import { retrieveByKeywords } from "./keywordRetriever.js";
import { classifyQuery, resolveChapterNumber } from "./queryClassifier.js";
import { extractChapterText } from "./structure.js";

export const STRUCTURAL_SCAN_LIMIT = 50;
export const STRUCTURAL_CHUNK_LIMIT = 5;
export const CHAPTER_CONTEXT_LIMIT = 5000;

export interface RetrievalContext {
  documentText: string;
  chunks: Chunk[];
  structure: StructuralIndex;
  documentMap: string;
}

export interface StructuralRetrieval {
  category: QueryCategory;
  chapter: ChapterReference | null;
  chapterFound: boolean;
  chunks: Chunk[];
  extraContext: string;
}

/**
 * Picks chunks by query intent and returns at most `2k` of them, deduplicated
 * by chunk index. Branches that come back short are topped up from keyword
 * search over the chunks not yet selected.
 */
export function retrieveWithStructure(
  query: string,
  context: RetrievalContext,
  k: number,
  lexicon: Lexicon = getDefaultLexicon(),
): StructuralRetrieval {
  assertTopK(k);

  const category = classifyQuery(query, lexicon);
  let chapter: ChapterReference | null = null;
  let chapterFound = false;
  let extraContext = "";
  let selected: Chunk[];

  if (category === "general-structure") {
    extraContext = buildStructureContext(context.documentMap);
    selected = selectStructuralChunks(context.chunks, lexicon);
  } else if (category === "specific-chapter") {
    chapter = resolveChapterNumber(query, context.structure, lexicon);
    const extraction =
      chapter.status === "resolved"
        ? extractChapterText(context.documentText, chapter.chapterNumber, context.structure)
        : null;

    if (extraction?.status === "found") {
      chapterFound = true;
      extraContext = buildChapterContext(extraction.chapter.number, extraction.text);
      selected = selectChapterChunks(context.chunks, extraction.chapter.number, k);
    } else {
      selected = retrieveByKeywords(query, context.chunks, k * 2, lexicon);
    }
  } else {
    selected = retrieveByKeywords(query, context.chunks, k * 2, lexicon);
  }

  if (selected.length < k) {
    const taken = new Set(selected.map((chunk) => chunk.index));
    const remaining = context.chunks.filter((chunk) => !taken.has(chunk.index));
    selected = [...selected, ...retrieveByKeywords(query, remaining, k - selected.length, lexicon)];
  }

  return {
    category,
    chapter,
    chapterFound,
    chunks: dedupeChunks(selected).slice(0, k * 2),
    extraContext,
  };
}

export function selectStructuralChunks(
  chunks: Chunk[],
  lexicon: Lexicon = getDefaultLexicon(),
): Chunk[] {
  return chunks
    .slice(0, STRUCTURAL_SCAN_LIMIT)
    .filter((chunk) => {
      const text = chunk.content.toLowerCase();
      return lexicon.structuralChunkKeywords.some((keyword) => text.includes(keyword));
    })
    .slice(0, STRUCTURAL_CHUNK_LIMIT);
}

export function selectChapterChunks(chunks: Chunk[], chapterNumber: number, k: number): Chunk[] {
  const patterns = [
    new RegExp(`cap[íi]tulo ${chapterNumber}`),
    new RegExp(`chapter ${chapterNumber}`),
    new RegExp(`^${chapterNumber}[\\s.-]`),
  ];

  return chunks
    .filter((chunk) => {
      const text = chunk.content.toLowerCase();
      return patterns.some((pattern) => pattern.test(text));
    })
    .slice(0, k);
}

export function dedupeChunks(chunks: Chunk[]): Chunk[] {
  const seen = new Set<number>();
  const deduped: Chunk[] = [];

  for (const chunk of chunks) {
    if (seen.has(chunk.index)) {
      continue;
    }
    seen.add(chunk.index);
    deduped.push(chunk);
  }

  return deduped;
}

function buildStructureContext(documentMap: string): string {
  return [
    "DOCUMENT STRUCTURE:",
    documentMap,
    "",
    "Use this information to answer questions about the overall structure of the document.",
  ].join("\n");
}

function buildChapterContext(chapterNumber: number, chapterText: string): string {
  return [
    `FULL CONTENT OF CHAPTER ${chapterNumber}:`,
    chapterText.slice(0, CHAPTER_CONTEXT_LIMIT),
    "",
    `Use THIS content to answer questions about chapter ${chapterNumber}.`,
  ].join("\n");
}
