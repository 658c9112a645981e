import { Chunk, QueryCategory } from "../domain/types.js";

export interface Excerpt {
  chunk_index: number;
  source: string;
  char_count: number;
  snippet: string;
}

export interface PromptInput {
  question: string;
  chunks: Chunk[];
  extraContext: string;
}

export function toExcerpts(chunks: Chunk[], snippetChars = 280): Excerpt[] {
  return chunks.map((chunk) => ({
    chunk_index: chunk.index,
    source: chunk.metadata.source,
    char_count: chunk.content.length,
    snippet: chunk.content.slice(0, snippetChars),
  }));
}

/**
 * Model input for a large document: extra context from the retriever, the
 * numbered excerpts and the user question.
 */
export function buildRetrievalPrompt(input: PromptInput): string {
  const excerpts = input.chunks
    .map((chunk, i) => `[Excerpt ${i + 1} - ID: ${chunk.index}]\n${chunk.content}`)
    .join("\n\n---\n\n");

  const sections: string[] = [];
  if (input.extraContext) {
    sections.push(input.extraContext.trim());
  }
  sections.push(
    `RELEVANT DOCUMENT EXCERPTS FOR THIS QUESTION:\n\n${excerpts}`,
    "Use ONLY the information above to answer the question below. If the answer is not in these excerpts, say clearly that the specific information was not found.",
    `USER QUESTION: ${input.question}`,
  );
  return sections.join("\n\n");
}

export function buildFullDocumentPrompt(question: string, documentText: string): string {
  return [
    "====== FULL DOCUMENT ======",
    documentText,
    "====== END OF DOCUMENT ======",
    "",
    `USER QUESTION: ${question}`,
  ].join("\n");
}

export function buildExtractiveAnswer(
  question: string,
  category: QueryCategory,
  chunks: Chunk[],
): string {
  if (chunks.length === 0) {
    return "No relevant excerpts were found in the loaded document. Try a more specific question.";
  }

  const lines = [`Question: ${question}`, `Intent: ${category}`, "Relevant excerpts:"];
  const lineLimit = Math.min(chunks.length, category === "general-structure" ? 6 : 3);
  for (let i = 0; i < lineLimit; i += 1) {
    const chunk = chunks[i];
    lines.push(`${i + 1}. ${summarizeChunk(chunk.content)} (chunk #${chunk.index})`);
  }
  return lines.join("\n");
}

function summarizeChunk(text: string): string {
  const normalized = text.replace(/\s+/g, " ").trim();
  if (normalized.length <= 180) {
    return normalized;
  }
  return `${normalized.slice(0, 177)}...`;
}
