import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentQaService } from "../services/documentQaService.js";
import { runTool } from "./toolResult.js";

export function registerAskWithContextTool(
  server: McpServer,
  service: DocumentQaService,
  maxTopK: number,
) {
  server.registerTool(
    "ask_with_context",
    {
      title: "Ask With Context",
      description:
        "Builds a grounded prompt for a question about the loaded document and returns an answer with its excerpts.",
      inputSchema: {
        question: z.string().min(2).describe("Question about the loaded document"),
        top_k: z.number().int().min(1).max(maxTopK).optional().describe("Retrieval size"),
      },
    },
    async ({ question, top_k }) =>
      runTool(() => service.askWithContext({ question, topK: top_k })),
  );
}
