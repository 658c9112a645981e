import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentQaService } from "../services/documentQaService.js";
import { runTool } from "./toolResult.js";

export function registerExplainRetrievalTool(
  server: McpServer,
  service: DocumentQaService,
  maxTopK: number,
) {
  server.registerTool(
    "explain_retrieval",
    {
      title: "Explain Retrieval",
      description: "Shows the extracted keywords and the score breakdown of the top-ranked chunks.",
      inputSchema: {
        query: z.string().min(2).describe("Search query"),
        limit: z.number().int().min(1).max(maxTopK).optional().describe("Chunks to explain"),
      },
    },
    async ({ query, limit }) => runTool(() => service.explainRetrieval({ query, limit })),
  );
}
