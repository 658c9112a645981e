import { getDefaultLexicon, Lexicon } from "../config/lexicon.js";
import { assertTopK } from "../domain/errors.js";
import { Chunk } from "../domain/types.js";
import { countOccurrences, extractKeywords } from "../utils/text.js";

export const POSITION_WINDOW = 300;
export const FREQUENCY_WEIGHT = 2;
export const POSITION_WEIGHT = 5;
export const DIVERSITY_BONUS = 20;
export const STRUCTURAL_BONUS = 30;
export const LENGTH_WEIGHT = 0.01;

export interface QueryKeywords {
  keywords: string[];
  expanded: string[];
}

export interface ChunkScore {
  chunk: Chunk;
  score: number;
  keywordScore: number;
  positionBonus: number;
  diversityBonus: number;
  structuralBonus: number;
  lengthBonus: number;
  matchedKeywords: string[];
}

/**
 * Keywords keep their query order and repeats. Synonym lists are appended
 * after the originals and include the original word itself, so a word with
 * synonyms is scored twice.
 */
export function extractQueryKeywords(
  query: string,
  lexicon: Lexicon = getDefaultLexicon(),
): QueryKeywords {
  const keywords = extractKeywords(query, lexicon.stopwords);
  const expanded = [...keywords];
  for (const keyword of keywords) {
    const synonyms = lexicon.synonyms.get(keyword);
    if (synonyms) {
      expanded.push(...synonyms);
    }
  }
  return { keywords, expanded };
}

export function scoreChunks(
  query: string,
  chunks: Chunk[],
  lexicon: Lexicon = getDefaultLexicon(),
): ChunkScore[] {
  const { keywords, expanded } = extractQueryKeywords(query, lexicon);
  return chunks.map((chunk) => scoreChunk(chunk, keywords, expanded, lexicon));
}

/**
 * Highest-scoring `k` chunks, ties kept in document order. When no keyword
 * occurs anywhere the first `k` chunks are returned unchanged.
 */
export function retrieveByKeywords(
  query: string,
  chunks: Chunk[],
  k: number,
  lexicon: Lexicon = getDefaultLexicon(),
): Chunk[] {
  assertTopK(k);
  if (chunks.length === 0) {
    return [];
  }

  const scores = scoreChunks(query, chunks, lexicon);
  if (!scores.some((item) => item.keywordScore > 0)) {
    return chunks.slice(0, k);
  }

  return [...scores]
    .sort((a, b) => b.score - a.score)
    .slice(0, k)
    .map((item) => item.chunk);
}

function scoreChunk(
  chunk: Chunk,
  keywords: string[],
  expanded: string[],
  lexicon: Lexicon,
): ChunkScore {
  const text = chunk.content.toLowerCase();
  const head = text.slice(0, POSITION_WINDOW);

  let keywordScore = 0;
  let positionBonus = 0;
  for (const keyword of expanded) {
    keywordScore += countOccurrences(text, keyword) * keyword.length * FREQUENCY_WEIGHT;
    if (head.includes(keyword)) {
      positionBonus += keyword.length * POSITION_WEIGHT;
    }
  }

  const matchedKeywords = keywords.filter((keyword) => text.includes(keyword));
  const diversityBonus = matchedKeywords.length * DIVERSITY_BONUS;
  const structuralBonus = lexicon.sectionIndicators.some((token) => text.includes(token))
    ? STRUCTURAL_BONUS
    : 0;
  const lengthBonus = chunk.content.length * LENGTH_WEIGHT;

  return {
    chunk,
    score: keywordScore + positionBonus + diversityBonus + structuralBonus + lengthBonus,
    keywordScore,
    positionBonus,
    diversityBonus,
    structuralBonus,
    lengthBonus,
    matchedKeywords,
  };
}
