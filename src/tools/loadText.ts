import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentQaService } from "../services/documentQaService.js";
import { runTool } from "./toolResult.js";

export function registerLoadTextTool(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "load_text",
    {
      title: "Load Text",
      description: "Loads raw text into the session, replacing any previous document.",
      inputSchema: {
        content: z.string().min(1).describe("Document text"),
        source: z.string().min(1).optional().describe("Label reported in chunk metadata"),
      },
    },
    async ({ content, source }) =>
      runTool(() => service.loadText({ content, source: source ?? "text" })),
  );
}
