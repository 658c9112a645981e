import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DocumentQaService } from "../services/documentQaService.js";
import { runTool } from "./toolResult.js";

export function registerExtractChapterTool(server: McpServer, service: DocumentQaService) {
  server.registerTool(
    "extract_chapter",
    {
      title: "Extract Chapter",
      description: "Returns the text of a detected chapter, up to the next chapter heading.",
      inputSchema: {
        chapter_number: z.number().int().min(0).describe("Chapter number as written in its heading"),
      },
    },
    async ({ chapter_number }) => runTool(() => service.extractChapter(chapter_number)),
  );
}
