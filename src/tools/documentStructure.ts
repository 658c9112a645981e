import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { DocumentQaService } from "../services/documentQaService.js";
import { runTool } from "./toolResult.js";

export function registerDocumentStructureTool(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "document_structure",
    {
      title: "Document Structure",
      description: "Returns the document map with detected chapters, page markers and table of contents.",
      inputSchema: {},
    },
    async () => runTool(() => service.describeStructure()),
  );
}
