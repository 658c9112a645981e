import { z } from "zod";
import { ConfigurationError } from "../domain/errors.js";

const envSchema = z.object({
  CHUNK_SIZE: z.coerce.number().int().positive().default(4000),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(400),
  DEFAULT_TOP_K: z.coerce.number().int().positive().default(2),
  MAX_TOP_K: z.coerce.number().int().positive().default(5),
  SMALL_DOCUMENT_THRESHOLD: z.coerce.number().int().min(0).default(25_000),
  MAX_DOCUMENT_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  LEXICON_PATH: z.string().optional(),
  ANSWER_MODE: z.enum(["client_llm", "ollama"]).default("client_llm"),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
});

export type AnswerMode = "client_llm" | "ollama";

export interface AppConfig {
  chunkSize: number;
  chunkOverlap: number;
  defaultTopK: number;
  maxTopK: number;
  smallDocumentThreshold: number;
  maxDocumentBytes: number;
  lexiconPath: string | null;
  answerMode: AnswerMode;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  transport: "stdio" | "http";
  host: string;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(
      "INVALID_ENVIRONMENT",
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
    );
  }
  const parsed = result.data;

  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new ConfigurationError(
      "INVALID_CHUNK_OVERLAP",
      `CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE}).`,
    );
  }
  if (parsed.DEFAULT_TOP_K > parsed.MAX_TOP_K) {
    throw new ConfigurationError(
      "INVALID_TOP_K",
      `DEFAULT_TOP_K (${parsed.DEFAULT_TOP_K}) must not exceed MAX_TOP_K (${parsed.MAX_TOP_K}).`,
    );
  }

  return {
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    defaultTopK: parsed.DEFAULT_TOP_K,
    maxTopK: parsed.MAX_TOP_K,
    smallDocumentThreshold: parsed.SMALL_DOCUMENT_THRESHOLD,
    maxDocumentBytes: parsed.MAX_DOCUMENT_BYTES,
    lexiconPath: parsed.LEXICON_PATH?.trim() || null,
    answerMode: parsed.ANSWER_MODE,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
  };
}
