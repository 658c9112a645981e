import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigurationError } from "../domain/errors.js";

export type OrdinalValue = number | "last";

const lexiconSchema = z.object({
  stopwords: z.array(z.string().min(1)),
  synonyms: z.record(z.array(z.string().min(1))),
  structurePhrases: z.array(z.string().min(1)),
  chapterWords: z.array(z.string().min(1)).min(1),
  ordinals: z.record(z.union([z.number().int().positive(), z.literal("last")])),
  structuralChunkKeywords: z.array(z.string().min(1)),
  sectionIndicators: z.array(z.string().min(1)),
  tocKeywords: z.array(z.string().min(1)),
  pageCountPhrases: z.array(z.string().min(1)).default([]),
});

/**
 * Word lists behind classification and scoring. Keys are stored lowercase;
 * lookups go through Maps so query words never hit prototype properties.
 */
export interface Lexicon {
  stopwords: Set<string>;
  synonyms: Map<string, string[]>;
  structurePhrases: string[];
  chapterWords: string[];
  ordinals: Map<string, OrdinalValue>;
  structuralChunkKeywords: string[];
  sectionIndicators: string[];
  tocKeywords: string[];
  /** Questions answered straight from the page estimate. */
  pageCountPhrases: string[];
}

export const DEFAULT_LEXICON_PATH = fileURLToPath(
  new URL("../../config/lexicon.json", import.meta.url),
);

let defaultLexicon: Lexicon | null = null;

export function getDefaultLexicon(): Lexicon {
  if (!defaultLexicon) {
    defaultLexicon = loadLexicon(DEFAULT_LEXICON_PATH);
  }
  return defaultLexicon;
}

export function loadLexicon(filePath: string): Lexicon {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(
      "INVALID_LEXICON",
      `Cannot read lexicon at ${filePath}: ${error instanceof Error ? error.message : "unknown error"}`,
    );
  }
  return parseLexicon(raw);
}

export function parseLexicon(raw: unknown): Lexicon {
  const result = lexiconSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      "INVALID_LEXICON",
      `Invalid lexicon: ${result.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`).join("; ")}`,
    );
  }

  const parsed = result.data;
  const lower = (values: string[]) => values.map((value) => value.toLowerCase());

  return {
    stopwords: new Set(lower(parsed.stopwords)),
    synonyms: new Map(
      Object.entries(parsed.synonyms).map(([key, values]) => [key.toLowerCase(), lower(values)]),
    ),
    structurePhrases: lower(parsed.structurePhrases),
    chapterWords: lower(parsed.chapterWords),
    ordinals: new Map(
      Object.entries(parsed.ordinals).map(([key, value]) => [key.toLowerCase(), value]),
    ),
    structuralChunkKeywords: lower(parsed.structuralChunkKeywords),
    sectionIndicators: lower(parsed.sectionIndicators),
    tocKeywords: lower(parsed.tocKeywords),
    pageCountPhrases: lower(parsed.pageCountPhrases),
  };
}
