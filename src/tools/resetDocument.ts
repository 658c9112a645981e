import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { DocumentQaService } from "../services/documentQaService.js";
import { runTool } from "./toolResult.js";

export function registerResetDocumentTool(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "reset_document",
    {
      title: "Reset Document",
      description: "Drops the loaded document from the session.",
      inputSchema: {},
    },
    async () => runTool(() => service.resetDocument()),
  );
}
