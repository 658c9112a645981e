import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env.js";
import { getDefaultLexicon, loadLexicon, parseLexicon } from "../src/config/lexicon.js";
import { ConfigurationError } from "../src/domain/errors.js";

function configErrorCode(action: () => unknown): string | null {
  try {
    action();
    return null;
  } catch (error) {
    return error instanceof ConfigurationError ? error.code : "not a ConfigurationError";
  }
}

describe("environment config", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      chunkSize: 4000,
      chunkOverlap: 400,
      defaultTopK: 2,
      maxTopK: 5,
      smallDocumentThreshold: 25_000,
      maxDocumentBytes: 50 * 1024 * 1024,
      lexiconPath: null,
      answerMode: "client_llm",
      ollamaBaseUrl: "http://127.0.0.1:11434",
      ollamaChatModel: "qwen2.5:7b-instruct",
      transport: "stdio",
      host: "0.0.0.0",
      port: 3000,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({ CHUNK_SIZE: "1000", CHUNK_OVERLAP: "0", ANSWER_MODE: "ollama" });
    expect(config.chunkSize).toBe(1000);
    expect(config.chunkOverlap).toBe(0);
    expect(config.answerMode).toBe("ollama");
  });

  it("fails fast on invalid settings", () => {
    expect(configErrorCode(() => loadConfig({ CHUNK_SIZE: "abc" }))).toBe("INVALID_ENVIRONMENT");
    expect(configErrorCode(() => loadConfig({ CHUNK_OVERLAP: "4000" }))).toBe(
      "INVALID_CHUNK_OVERLAP",
    );
    expect(configErrorCode(() => loadConfig({ DEFAULT_TOP_K: "6" }))).toBe("INVALID_TOP_K");
  });
});

describe("lexicon", () => {
  it("loads the bundled word lists", () => {
    const lexicon = getDefaultLexicon();
    expect(lexicon.stopwords.has("the")).toBe(true);
    expect(lexicon.synonyms.get("fala")).toEqual(["fala", "trata", "aborda", "discute", "explica"]);
    expect(lexicon.ordinals.get("segundo")).toBe(2);
    expect(lexicon.ordinals.get("último")).toBe("last");
    expect(lexicon.synonyms.get("constructor")).toBeUndefined();
  });

  it("lowercases custom entries", () => {
    const lexicon = parseLexicon({
      stopwords: ["THE"],
      synonyms: { Topic: ["Topic", "Subject"] },
      structurePhrases: ["Outline"],
      chapterWords: ["Chapter"],
      ordinals: { First: 1, Last: "last" },
      structuralChunkKeywords: [],
      sectionIndicators: [],
      tocKeywords: ["Contents"],
    });
    expect([...lexicon.stopwords]).toEqual(["the"]);
    expect(lexicon.synonyms.get("topic")).toEqual(["topic", "subject"]);
    expect(lexicon.chapterWords).toEqual(["chapter"]);
    expect(lexicon.ordinals.get("last")).toBe("last");
    expect(lexicon.pageCountPhrases).toEqual([]);
  });

  it("rejects malformed lexicons", async () => {
    expect(configErrorCode(() => parseLexicon({ stopwords: [] }))).toBe("INVALID_LEXICON");

    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "lexicon-"));
    const file = path.join(dir, "broken.json");
    await fs.writeFile(file, "{ not json", "utf-8");
    try {
      expect(configErrorCode(() => loadLexicon(file))).toBe("INVALID_LEXICON");
      expect(configErrorCode(() => loadLexicon(path.join(dir, "missing.json")))).toBe(
        "INVALID_LEXICON",
      );
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
