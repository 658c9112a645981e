import { describe, expect, it } from "vitest";
import {
  buildDocumentPreview,
  computeContentHash,
  countOccurrences,
  estimateTokens,
  extractKeywords,
  findPhrase,
  foldAccents,
  foldQuery,
  formatCount,
  normalizeText,
} from "../src/utils/text.js";

describe("text utils", () => {
  it("folds accents and case", () => {
    expect(foldAccents("Capítulo SEÇÃO Índice")).toBe("capitulo secao indice");
    expect(foldQuery("  Quantos   Capítulos\n tem? ")).toBe("quantos capitulos tem?");
  });

  it("finds phrases only on word boundaries", () => {
    expect(findPhrase("the index of terms", "index")).toBe(4);
    expect(findPhrase("reindex everything", "index")).toBe(-1);
    expect(findPhrase("anything", "")).toBe(-1);
  });

  it("counts non-overlapping occurrences", () => {
    expect(countOccurrences("aaaa", "aa")).toBe(2);
    expect(countOccurrences("abc", "")).toBe(0);
  });

  it("extracts keywords without punctuation, stopwords or short words", () => {
    expect(extractKeywords("What is the rate, in Q3?", new Set(["what", "the"]))).toEqual([
      "rate",
    ]);
    expect(extractKeywords("Relatório de vendas!", new Set(["de"]))).toEqual([
      "relatório",
      "vendas",
    ]);
  });

  it("estimates tokens and hashes content", () => {
    expect(estimateTokens("abcdefghi")).toBe(2);
    expect(computeContentHash("abc")).toBe("900150983cd24fb0d6963f7d28e17f72");
  });

  it("formats counts with thousands separators", () => {
    expect(formatCount(999)).toBe("999");
    expect(formatCount(1000)).toBe("1,000");
    expect(formatCount(1234567)).toBe("1,234,567");
  });

  it("previews head, middle and tail of long text", () => {
    const text = "a".repeat(10) + "b".repeat(10) + "c".repeat(10);
    expect(buildDocumentPreview(text, 8)).toBe("aaaa\n\n[...]\n\nbb\n\n[...]\n\ncc");
    expect(buildDocumentPreview("short", 8)).toBe("short");
  });

  it("normalizes line endings and tabs", () => {
    expect(normalizeText("\r\nline\tone\r\nline two \r\n")).toBe("line one\nline two");
  });
});
