import { describe, expect, it } from "vitest";
import {
  buildExtractiveAnswer,
  buildFullDocumentPrompt,
  buildRetrievalPrompt,
  toExcerpts,
} from "../src/pipelines/answering.js";
import { createChunkRecords } from "../src/pipelines/chunking.js";

const chunks = createChunkRecords(["Alpha", "Beta"], { source: "notes.md", docHash: "hash" });

describe("answering", () => {
  it("numbers excerpts in the retrieval prompt", () => {
    expect(buildRetrievalPrompt({ question: "q?", chunks, extraContext: "  EXTRA  " })).toBe(
      [
        "EXTRA",
        "RELEVANT DOCUMENT EXCERPTS FOR THIS QUESTION:\n\n[Excerpt 1 - ID: 0]\nAlpha\n\n---\n\n[Excerpt 2 - ID: 1]\nBeta",
        "Use ONLY the information above to answer the question below. If the answer is not in these excerpts, say clearly that the specific information was not found.",
        "USER QUESTION: q?",
      ].join("\n\n"),
    );
  });

  it("omits extra context when there is none", () => {
    const prompt = buildRetrievalPrompt({ question: "q?", chunks: [], extraContext: "" });
    expect(prompt.startsWith("RELEVANT DOCUMENT EXCERPTS FOR THIS QUESTION:")).toBe(true);
  });

  it("wraps the whole document for small inputs", () => {
    expect(buildFullDocumentPrompt("q?", "body")).toBe(
      "====== FULL DOCUMENT ======\nbody\n====== END OF DOCUMENT ======\n\nUSER QUESTION: q?",
    );
  });

  it("summarizes the top chunks", () => {
    const many = createChunkRecords(["one\n  two", "x".repeat(200), "three", "four"], {
      source: "notes.md",
      docHash: "hash",
    });
    expect(buildExtractiveAnswer("What?", "specific-content", many)).toBe(
      [
        "Question: What?",
        "Intent: specific-content",
        "Relevant excerpts:",
        "1. one two (chunk #0)",
        `2. ${"x".repeat(177)}... (chunk #1)`,
        "3. three (chunk #2)",
      ].join("\n"),
    );
  });

  it("says so when nothing was retrieved", () => {
    expect(buildExtractiveAnswer("What?", "specific-content", [])).toBe(
      "No relevant excerpts were found in the loaded document. Try a more specific question.",
    );
  });

  it("maps chunks to excerpts", () => {
    expect(toExcerpts(chunks, 3)).toEqual([
      { chunk_index: 0, source: "notes.md", char_count: 5, snippet: "Alp" },
      { chunk_index: 1, source: "notes.md", char_count: 4, snippet: "Bet" },
    ]);
  });
});
