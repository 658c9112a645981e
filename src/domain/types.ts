export interface ChunkMetadata {
  source: string;
  docHash: string;
  chunkIndex: number;
  chunkCount: number;
  charCount: number;
}

export interface Chunk {
  content: string;
  index: number;
  metadata: ChunkMetadata;
}

export interface ChapterEntry {
  number: number;
  title: string;
  line: number;
  context: string;
}

export interface PageEntry {
  number: number;
  line: number;
  context: string;
}

export interface TocEntry {
  line: number;
  context: string;
}

/** Entries are kept in document order. */
export interface StructuralIndex {
  chapters: ChapterEntry[];
  pages: PageEntry[];
  tableOfContents: TocEntry[];
}

export type QueryCategory = "general-structure" | "specific-chapter" | "specific-content";

export type ChapterReference =
  | { status: "resolved"; chapterNumber: number; via: "ordinal" | "numeric" }
  | { status: "indeterminate"; reason: "no_chapter_reference" | "no_chapters_detected" };

export type ChapterExtraction =
  | { status: "found"; chapter: ChapterEntry; text: string }
  | { status: "not_found"; chapterNumber: number; reason: "chapter_not_detected" | "empty_chapter" };

export interface LoadedDocument {
  text: string;
  source: string;
  docHash: string;
  loadedAt: string;
  chunkSize: number;
  chunkOverlap: number;
  chunks: Chunk[];
  structure: StructuralIndex;
  documentMap: string;
}
