import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { getSupportedDocumentExtensions } from "../infra/parsers/documentLoader.js";
import { DocumentQaService } from "../services/documentQaService.js";
import { runTool } from "./toolResult.js";

export function registerLoadDocumentTool(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "load_document",
    {
      title: "Load Document",
      description: `Loads a local document (${getSupportedDocumentExtensions().join(", ")}) into the session, replacing any previous one.`,
      inputSchema: {
        path: z.string().min(1).describe("File path to load"),
      },
    },
    async ({ path }) => runTool(() => service.loadDocument(path)),
  );
}
