import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentQaService } from "../services/documentQaService.js";
import { runTool } from "./toolResult.js";

export function registerSearchChunksTool(
  server: McpServer,
  service: DocumentQaService,
  maxTopK: number,
) {
  server.registerTool(
    "search_chunks",
    {
      title: "Search Chunks",
      description: "Retrieves chunks of the loaded document by query intent and keyword score.",
      inputSchema: {
        query: z.string().min(2).describe("Search query"),
        top_k: z.number().int().min(1).max(maxTopK).optional().describe("Retrieval size"),
      },
    },
    async ({ query, top_k }) => runTool(() => service.searchChunks({ query, topK: top_k })),
  );
}
