import { fileURLToPath } from "node:url";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";
import { createAppServer, createDocumentQaService } from "../src/app.js";
import { loadConfig } from "../src/config/env.js";
import { getDefaultLexicon } from "../src/config/lexicon.js";

const FIXTURE_PATH = fileURLToPath(new URL("./fixtures/relatorio.txt", import.meta.url));

async function callTool(client: Client, name: string, args: Record<string, unknown> = {}) {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const [first] = result.content;
  if (!first || first.type !== "text") {
    throw new Error(`Tool ${name} did not return text content`);
  }
  return { isError: result.isError ?? false, text: first.text };
}

async function callJsonTool(client: Client, name: string, args: Record<string, unknown> = {}) {
  const { isError, text } = await callTool(client, name, args);
  const body: unknown = JSON.parse(text);
  return { isError, body };
}

describe("MCP tools", () => {
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    const config = loadConfig({
      CHUNK_SIZE: "200",
      CHUNK_OVERLAP: "20",
      SMALL_DOCUMENT_THRESHOLD: "100",
    });
    server = createAppServer(createDocumentQaService(config, getDefaultLexicon()), config.maxTopK);
    client = new Client({ name: "test-client", version: "0.0.0" });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it("lists every tool", async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "ask_with_context",
      "document_info",
      "document_structure",
      "explain_retrieval",
      "extract_chapter",
      "health_check",
      "load_document",
      "load_text",
      "reset_document",
      "search_chunks",
    ]);
  });

  it("answers health checks", async () => {
    expect(await callTool(client, "health_check", { name: "tester" })).toEqual({
      isError: false,
      text: "docmap-qa-mcp is running. hello tester",
    });
  });

  it("loads a document and reports its structure", async () => {
    const loaded = await callJsonTool(client, "load_document", { path: FIXTURE_PATH });
    expect(loaded.isError).toBe(false);
    expect(
      z.object({ total_chunks: z.number(), chapters: z.number() }).parse(loaded.body),
    ).toEqual({ total_chunks: 3, chapters: 3 });

    const structure = await callJsonTool(client, "document_structure");
    const chapters = z
      .object({ chapters: z.array(z.object({ number: z.number(), title: z.string() })) })
      .parse(structure.body).chapters;
    expect(chapters.map((chapter) => chapter.title)).toEqual(["Introdução", "Finanças", "Conclusão"]);
  });

  it("returns tool errors for unsupported files", async () => {
    const result = await callJsonTool(client, "load_document", { path: "/tmp/manual.pdf" });
    expect(result).toEqual({
      isError: true,
      body: { error: "Unsupported extension: .pdf. Allowed: .md, .txt, .csv" },
    });
  });

  it("searches and asks about loaded text", async () => {
    await callJsonTool(client, "load_document", { path: FIXTURE_PATH });

    const search = await callJsonTool(client, "search_chunks", { query: "taxa de juros", top_k: 1 });
    const hits = z
      .object({ hits: z.array(z.object({ chunk_index: z.number() })) })
      .parse(search.body).hits;
    expect(hits.map((hit) => hit.chunk_index)).toEqual([1, 0]);

    const ask = await callJsonTool(client, "ask_with_context", { question: "o que fala o segundo capítulo?" });
    expect(
      z
        .object({ context_mode: z.string(), category: z.string(), answer_generation_mode: z.string() })
        .parse(ask.body),
    ).toEqual({
      context_mode: "retrieved_chunks",
      category: "specific-chapter",
      answer_generation_mode: "client_llm",
    });
  });

  it("extracts chapters and resets the session", async () => {
    await callJsonTool(client, "load_text", { content: "Chapter 1: Start\nHello there.", source: "inline" });

    const chapter = await callJsonTool(client, "extract_chapter", { chapter_number: 1 });
    expect(z.object({ found: z.boolean(), content: z.string() }).parse(chapter.body)).toEqual({
      found: true,
      content: "Chapter 1: Start\nHello there.",
    });

    const reset = await callJsonTool(client, "reset_document");
    expect(reset.body).toEqual({ cleared_documents: 1, cleared_chunks: 1 });

    const info = await callJsonTool(client, "document_info");
    expect(z.object({ loaded: z.boolean() }).parse(info.body)).toEqual({ loaded: false });
  });
});
