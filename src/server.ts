#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { createAppServer, createDocumentQaService } from "./app.js";
import { loadConfig } from "./config/env.js";
import { getDefaultLexicon, loadLexicon } from "./config/lexicon.js";
import { startMcpHttpServer } from "./infra/http/mcpHttpServer.js";

async function main() {
  const config = loadConfig();
  const lexicon = config.lexiconPath ? loadLexicon(config.lexiconPath) : getDefaultLexicon();
  const serverFactory = () =>
    createAppServer(createDocumentQaService(config, lexicon), config.maxTopK);

  const shutdownTasks: Array<() => Promise<void>> = [];

  if (config.transport === "http") {
    const httpServer = await startMcpHttpServer({
      host: config.host,
      port: config.port,
      createSessionServer: serverFactory,
    });
    shutdownTasks.push(() => httpServer.close());
    console.error(`MCP HTTP server listening on ${httpServer.url.href}`);
  } else {
    await runStdioServer(serverFactory());
  }
  console.error(
    `Answer mode: ${config.answerMode}; chunk size ${config.chunkSize}, overlap ${config.chunkOverlap}`,
  );

  const shutdown = async () => {
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

async function runStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("Failed to start MCP server:", error);
  process.exit(1);
});
