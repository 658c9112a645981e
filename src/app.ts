import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { AppConfig } from "./config/env.js";
import { Lexicon } from "./config/lexicon.js";
import { DefaultAiClient } from "./infra/ai/defaultAiClient.js";
import { AiClient } from "./infra/ai/types.js";
import { InMemorySessionStore } from "./infra/store/inMemorySessionStore.js";
import { DocumentQaService } from "./services/documentQaService.js";
import { registerAskWithContextTool } from "./tools/askWithContext.js";
import { registerDocumentInfoTool } from "./tools/documentInfo.js";
import { registerDocumentStructureTool } from "./tools/documentStructure.js";
import { registerExplainRetrievalTool } from "./tools/explainRetrieval.js";
import { registerExtractChapterTool } from "./tools/extractChapter.js";
import { registerLoadDocumentTool } from "./tools/loadDocument.js";
import { registerLoadTextTool } from "./tools/loadText.js";
import { registerResetDocumentTool } from "./tools/resetDocument.js";
import { registerSearchChunksTool } from "./tools/searchChunks.js";

export const SERVER_NAME = "docmap-qa-mcp";
export const SERVER_VERSION = "0.1.0";

/** Each call yields a fresh session: its own store and no loaded document. */
export function createDocumentQaService(
  config: AppConfig,
  lexicon: Lexicon,
  aiClient: AiClient = new DefaultAiClient(config),
): DocumentQaService {
  return new DocumentQaService(new InMemorySessionStore(), aiClient, {
    chunkSize: config.chunkSize,
    chunkOverlap: config.chunkOverlap,
    defaultTopK: config.defaultTopK,
    maxTopK: config.maxTopK,
    smallDocumentThreshold: config.smallDocumentThreshold,
    maxDocumentBytes: config.maxDocumentBytes,
    lexicon,
  });
}

export function createAppServer(service: DocumentQaService, maxTopK: number): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return {
        content: [
          {
            type: "text",
            text: `${SERVER_NAME} is running. hello ${who}`,
          },
        ],
      };
    },
  );

  registerLoadDocumentTool(server, service);
  registerLoadTextTool(server, service);
  registerDocumentInfoTool(server, service);
  registerDocumentStructureTool(server, service);
  registerSearchChunksTool(server, service, maxTopK);
  registerAskWithContextTool(server, service, maxTopK);
  registerExtractChapterTool(server, service);
  registerExplainRetrievalTool(server, service, maxTopK);
  registerResetDocumentTool(server, service);

  return server;
}
