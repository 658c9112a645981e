import { AnswerMode } from "../config/env.js";
import { Lexicon } from "../config/lexicon.js";
import { assertTopK } from "../domain/errors.js";
import { ClearSessionResult, SessionStateStore } from "../domain/sessionState.js";
import { LoadedDocument, QueryCategory } from "../domain/types.js";
import { AiClient } from "../infra/ai/types.js";
import { loadDocumentText } from "../infra/parsers/documentLoader.js";
import {
  buildExtractiveAnswer,
  buildFullDocumentPrompt,
  buildRetrievalPrompt,
  Excerpt,
  toExcerpts,
} from "../pipelines/answering.js";
import { createChunkRecords, splitIntoChunks } from "../pipelines/chunking.js";
import { buildDocumentMap } from "../pipelines/documentMap.js";
import { extractQueryKeywords, retrieveByKeywords, scoreChunks } from "../pipelines/keywordRetriever.js";
import { classifyQuery, isPageCountQuery } from "../pipelines/queryClassifier.js";
import { CHAPTER_CONTEXT_LIMIT, retrieveWithStructure } from "../pipelines/structuralRetriever.js";
import { analyzeStructure, estimatePageCount, extractChapterText } from "../pipelines/structure.js";
import { buildDocumentPreview, computeContentHash, estimateTokens } from "../utils/text.js";

const NO_DOCUMENT_GUIDANCE =
  "No document loaded. Load one first using load_document (file path) or load_text (raw text).";
const PREVIEW_CHARS = 1500;

export interface DocumentQaOptions {
  chunkSize: number;
  chunkOverlap: number;
  defaultTopK: number;
  maxTopK: number;
  smallDocumentThreshold: number;
  maxDocumentBytes: number;
  lexicon: Lexicon;
}

export interface LoadDocumentResult {
  source: string;
  doc_hash: string;
  document_length: number;
  total_chunks: number;
  avg_chunk_size: number;
  chunk_size: number;
  chunk_overlap: number;
  chapters: number;
  pages: number;
  table_of_contents_found: boolean;
  estimated_pages: number;
  estimated_tokens: number;
}

export interface DocumentInfoResult {
  loaded: boolean;
  guidance?: string;
  document?: {
    source: string;
    doc_hash: string;
    loaded_at: string;
    document_length: number;
    estimated_pages: number;
    estimated_tokens: number;
    total_chunks: number;
    chunk_size: number;
    chunk_overlap: number;
    chapters: number;
    pages: number;
    table_of_contents_found: boolean;
    preview: string;
    retrieval_stats: RetrievalStats;
  };
}

export interface RetrievalStats {
  total_queries: number;
  avg_chunks_retrieved: number;
}

export interface DocumentStructureResult {
  loaded: boolean;
  guidance?: string;
  document_map: string;
  chapters: Array<{ number: number; title: string; line: number }>;
  pages: Array<{ number: number; line: number }>;
  table_of_contents: Array<{ line: number }>;
}

export interface SearchChunksResult {
  query: string;
  category: QueryCategory;
  top_k: number;
  chapter_number: number | null;
  chapter_found: boolean;
  extra_context: string;
  page_count?: number;
  guidance?: string;
  hits: Excerpt[];
}

export interface AskWithContextResult {
  answer: string;
  prompt: string;
  context_mode: "none" | "page_count" | "full_document" | "retrieved_chunks";
  category: QueryCategory;
  excerpts: Excerpt[];
  answer_generation_mode: AnswerMode;
  guidance?: string;
  latency_ms: number;
}

export interface ExtractChapterResult {
  chapter_number: number;
  found: boolean;
  title?: string;
  content?: string;
  truncated?: boolean;
  reason?: string;
  guidance?: string;
}

export interface ExplainRetrievalResult {
  query: string;
  keywords: string[];
  expanded_keywords: string[];
  zero_score_fallback: boolean;
  guidance?: string;
  scores: Array<{
    chunk_index: number;
    score: number;
    keyword_score: number;
    position_bonus: number;
    diversity_bonus: number;
    structural_bonus: number;
    length_bonus: number;
    matched_keywords: string[];
    preview: string;
  }>;
}

/**
 * One conversation's view of one document. Loading replaces the text, its
 * chunks and its structural index together; queries only read them.
 */
export class DocumentQaService {
  private totalQueries = 0;
  private totalChunksRetrieved = 0;

  constructor(
    private readonly store: SessionStateStore,
    private readonly aiClient: AiClient,
    private readonly options: DocumentQaOptions,
  ) {}

  loadText(input: { source: string; content: string }): LoadDocumentResult {
    const text = input.content;
    if (!text.trim()) {
      throw new Error("Empty content.");
    }

    const docHash = computeContentHash(text);
    const pieces = splitIntoChunks(text, {
      chunkSize: this.options.chunkSize,
      chunkOverlap: this.options.chunkOverlap,
    });
    const chunks = createChunkRecords(pieces, { source: input.source, docHash });
    const structure = analyzeStructure(text, this.options.lexicon);

    const document: LoadedDocument = {
      text,
      source: input.source,
      docHash,
      loadedAt: new Date().toISOString(),
      chunkSize: this.options.chunkSize,
      chunkOverlap: this.options.chunkOverlap,
      chunks,
      structure,
      documentMap: buildDocumentMap(text, structure),
    };
    this.store.replace(document);
    this.resetStats();

    const totalChars = pieces.reduce((sum, piece) => sum + piece.length, 0);
    return {
      source: document.source,
      doc_hash: docHash,
      document_length: text.length,
      total_chunks: chunks.length,
      avg_chunk_size: chunks.length > 0 ? Math.floor(totalChars / chunks.length) : 0,
      chunk_size: document.chunkSize,
      chunk_overlap: document.chunkOverlap,
      chapters: structure.chapters.length,
      pages: structure.pages.length,
      table_of_contents_found: structure.tableOfContents.length > 0,
      estimated_pages: estimatePageCount(text, structure),
      estimated_tokens: estimateTokens(text),
    };
  }

  async loadDocument(filePath: string): Promise<LoadDocumentResult> {
    const loaded = await loadDocumentText(filePath, this.options.maxDocumentBytes);
    return this.loadText({ source: loaded.source, content: loaded.content });
  }

  getDocumentInfo(): DocumentInfoResult {
    const document = this.store.current();
    if (!document) {
      return { loaded: false, guidance: NO_DOCUMENT_GUIDANCE };
    }

    return {
      loaded: true,
      document: {
        source: document.source,
        doc_hash: document.docHash,
        loaded_at: document.loadedAt,
        document_length: document.text.length,
        estimated_pages: estimatePageCount(document.text, document.structure),
        estimated_tokens: estimateTokens(document.text),
        total_chunks: document.chunks.length,
        chunk_size: document.chunkSize,
        chunk_overlap: document.chunkOverlap,
        chapters: document.structure.chapters.length,
        pages: document.structure.pages.length,
        table_of_contents_found: document.structure.tableOfContents.length > 0,
        preview: buildDocumentPreview(document.text, PREVIEW_CHARS),
        retrieval_stats: {
          total_queries: this.totalQueries,
          avg_chunks_retrieved:
            this.totalQueries > 0
              ? Number((this.totalChunksRetrieved / this.totalQueries).toFixed(2))
              : 0,
        },
      },
    };
  }

  describeStructure(): DocumentStructureResult {
    const document = this.store.current();
    if (!document) {
      return {
        loaded: false,
        guidance: NO_DOCUMENT_GUIDANCE,
        document_map: "",
        chapters: [],
        pages: [],
        table_of_contents: [],
      };
    }

    const { structure } = document;
    return {
      loaded: true,
      document_map: document.documentMap,
      chapters: structure.chapters.map(({ number, title, line }) => ({ number, title, line })),
      pages: structure.pages.map(({ number, line }) => ({ number, line })),
      table_of_contents: structure.tableOfContents.map(({ line }) => ({ line })),
    };
  }

  searchChunks(input: { query: string; topK?: number }): SearchChunksResult {
    const topK = this.resolveTopK(input.topK);
    const document = this.store.current();
    if (!document) {
      return {
        query: input.query,
        category: classifyQuery(input.query, this.options.lexicon),
        top_k: topK,
        chapter_number: null,
        chapter_found: false,
        extra_context: "",
        guidance: NO_DOCUMENT_GUIDANCE,
        hits: [],
      };
    }

    if (isPageCountQuery(input.query, this.options.lexicon)) {
      const pageCount = estimatePageCount(document.text, document.structure);
      return {
        query: input.query,
        category: classifyQuery(input.query, this.options.lexicon),
        top_k: topK,
        chapter_number: null,
        chapter_found: false,
        extra_context: describePageCount(document, pageCount),
        page_count: pageCount,
        hits: [],
      };
    }

    const retrieval = this.retrieve(document, input.query, topK);
    return {
      query: input.query,
      category: retrieval.category,
      top_k: topK,
      chapter_number:
        retrieval.chapter?.status === "resolved" ? retrieval.chapter.chapterNumber : null,
      chapter_found: retrieval.chapterFound,
      extra_context: retrieval.extraContext,
      hits: toExcerpts(retrieval.chunks),
    };
  }

  async askWithContext(input: { question: string; topK?: number }): Promise<AskWithContextResult> {
    const startedAt = Date.now();
    const topK = this.resolveTopK(input.topK);
    const document = this.store.current();
    if (!document) {
      return {
        answer: "No document loaded. Please load a document first.",
        prompt: "",
        context_mode: "none",
        category: classifyQuery(input.question, this.options.lexicon),
        excerpts: [],
        answer_generation_mode: "client_llm",
        guidance: NO_DOCUMENT_GUIDANCE,
        latency_ms: Date.now() - startedAt,
      };
    }

    if (isPageCountQuery(input.question, this.options.lexicon)) {
      this.recordQuery(0);
      return {
        answer: describePageCount(document, estimatePageCount(document.text, document.structure)),
        prompt: "",
        context_mode: "page_count",
        category: classifyQuery(input.question, this.options.lexicon),
        excerpts: [],
        answer_generation_mode: "client_llm",
        latency_ms: Date.now() - startedAt,
      };
    }

    const retrieval = this.retrieve(document, input.question, topK);
    this.recordQuery(retrieval.chunks.length);
    const fullDocument = document.text.length <= this.options.smallDocumentThreshold;
    const prompt = fullDocument
      ? buildFullDocumentPrompt(input.question, document.text)
      : buildRetrievalPrompt({
          question: input.question,
          chunks: retrieval.chunks,
          extraContext: retrieval.extraContext,
        });

    let answer = buildExtractiveAnswer(input.question, retrieval.category, retrieval.chunks);
    let answerGenerationMode: AnswerMode = "client_llm";

    if (this.aiClient.getAnswerMode() === "ollama") {
      try {
        const generated = await this.aiClient.generateGroundedAnswer({
          question: input.question,
          prompt,
        });
        if (generated) {
          answer = generated;
          answerGenerationMode = "ollama";
        }
      } catch (error) {
        console.error("Answer generation failed, returning extractive answer:", error);
      }
    }

    return {
      answer,
      prompt,
      context_mode: fullDocument ? "full_document" : "retrieved_chunks",
      category: retrieval.category,
      excerpts: toExcerpts(retrieval.chunks),
      answer_generation_mode: answerGenerationMode,
      latency_ms: Date.now() - startedAt,
    };
  }

  extractChapter(chapterNumber: number): ExtractChapterResult {
    const document = this.store.current();
    if (!document) {
      return { chapter_number: chapterNumber, found: false, guidance: NO_DOCUMENT_GUIDANCE };
    }

    const extraction = extractChapterText(document.text, chapterNumber, document.structure);
    if (extraction.status === "not_found") {
      return { chapter_number: chapterNumber, found: false, reason: extraction.reason };
    }

    return {
      chapter_number: chapterNumber,
      found: true,
      title: extraction.chapter.title,
      content: extraction.text.slice(0, CHAPTER_CONTEXT_LIMIT),
      truncated: extraction.text.length > CHAPTER_CONTEXT_LIMIT,
    };
  }

  explainRetrieval(input: { query: string; limit?: number }): ExplainRetrievalResult {
    const { keywords, expanded } = extractQueryKeywords(input.query, this.options.lexicon);
    const document = this.store.current();
    if (!document) {
      return {
        query: input.query,
        keywords,
        expanded_keywords: expanded,
        zero_score_fallback: false,
        guidance: NO_DOCUMENT_GUIDANCE,
        scores: [],
      };
    }

    const limit = input.limit ?? this.options.maxTopK;
    assertTopK(limit);
    const scores = scoreChunks(input.query, document.chunks, this.options.lexicon);
    const zeroScoreFallback = !scores.some((item) => item.keywordScore > 0);
    const rankedIndexes = new Set(
      retrieveByKeywords(input.query, document.chunks, limit, this.options.lexicon).map(
        (chunk) => chunk.index,
      ),
    );

    return {
      query: input.query,
      keywords,
      expanded_keywords: expanded,
      zero_score_fallback: zeroScoreFallback,
      scores: scores
        .filter((item) => rankedIndexes.has(item.chunk.index))
        .sort((a, b) => (zeroScoreFallback ? a.chunk.index - b.chunk.index : b.score - a.score))
        .map((item) => ({
          chunk_index: item.chunk.index,
          score: Number(item.score.toFixed(2)),
          keyword_score: item.keywordScore,
          position_bonus: item.positionBonus,
          diversity_bonus: item.diversityBonus,
          structural_bonus: item.structuralBonus,
          length_bonus: Number(item.lengthBonus.toFixed(2)),
          matched_keywords: item.matchedKeywords,
          preview: item.chunk.content.slice(0, 200),
        })),
    };
  }

  resetDocument(): ClearSessionResult {
    this.resetStats();
    return this.store.clear();
  }

  private recordQuery(chunksRetrieved: number) {
    this.totalQueries += 1;
    this.totalChunksRetrieved += chunksRetrieved;
  }

  private resetStats() {
    this.totalQueries = 0;
    this.totalChunksRetrieved = 0;
  }

  private retrieve(document: LoadedDocument, query: string, topK: number) {
    return retrieveWithStructure(
      query,
      {
        documentText: document.text,
        chunks: document.chunks,
        structure: document.structure,
        documentMap: document.documentMap,
      },
      topK,
      this.options.lexicon,
    );
  }

  private resolveTopK(requested: number | undefined): number {
    const topK = requested ?? this.options.defaultTopK;
    assertTopK(topK);
    return Math.min(topK, this.options.maxTopK);
  }
}

function describePageCount(document: LoadedDocument, pageCount: number): string {
  const unit = pageCount === 1 ? "page" : "pages";
  return document.structure.pages.length > 0
    ? `The document has ${pageCount} ${unit}.`
    : `The document has approximately ${pageCount} ${unit}.`;
}
