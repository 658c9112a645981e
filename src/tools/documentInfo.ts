import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { DocumentQaService } from "../services/documentQaService.js";
import { runTool } from "./toolResult.js";

export function registerDocumentInfoTool(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "document_info",
    {
      title: "Document Info",
      description: "Returns statistics and a head/middle/tail preview of the loaded document.",
      inputSchema: {},
    },
    async () => runTool(() => service.getDocumentInfo()),
  );
}
