import { describe, expect, it } from "vitest";
import { LoadedDocument } from "../src/domain/types.js";
import { InMemorySessionStore } from "../src/infra/store/inMemorySessionStore.js";
import { createChunkRecords } from "../src/pipelines/chunking.js";

function documentWithChunks(count: number, source: string): LoadedDocument {
  const pieces = Array.from({ length: count }, (_, i) => `piece ${i}`);
  return {
    text: pieces.join(" "),
    source,
    docHash: `hash-${source}`,
    loadedAt: "2026-01-01T00:00:00.000Z",
    chunkSize: 100,
    chunkOverlap: 10,
    chunks: createChunkRecords(pieces, { source, docHash: `hash-${source}` }),
    structure: { chapters: [], pages: [], tableOfContents: [] },
    documentMap: "",
  };
}

describe("InMemorySessionStore", () => {
  it("starts empty", () => {
    expect(new InMemorySessionStore().current()).toBeNull();
  });

  it("replaces the previous document", () => {
    const store = new InMemorySessionStore();
    store.replace(documentWithChunks(2, "a.txt"));
    store.replace(documentWithChunks(3, "b.txt"));
    expect(store.current()?.source).toBe("b.txt");
  });

  it("reports what was cleared", () => {
    const store = new InMemorySessionStore();
    store.replace(documentWithChunks(3, "a.txt"));

    expect(store.clear()).toEqual({ cleared_documents: 1, cleared_chunks: 3 });
    expect(store.current()).toBeNull();
    expect(store.clear()).toEqual({ cleared_documents: 0, cleared_chunks: 0 });
  });
});
