import { AnswerMode, AppConfig } from "../../config/env.js";
import { OllamaClient } from "./ollamaClient.js";
import { AiClient, GroundedAnswerRequest } from "./types.js";

/**
 * `client_llm` leaves answering to the MCP client, which receives the
 * assembled prompt; `ollama` answers with a local chat model.
 */
export class DefaultAiClient implements AiClient {
  private readonly ollama: OllamaClient;

  private readonly answerMode: AnswerMode;

  constructor(config: Pick<AppConfig, "answerMode" | "ollamaBaseUrl" | "ollamaChatModel">) {
    this.ollama = new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
    });
    this.answerMode = config.answerMode;
  }

  getAnswerMode(): AnswerMode {
    return this.answerMode;
  }

  async generateGroundedAnswer(request: GroundedAnswerRequest): Promise<string | null> {
    if (this.answerMode !== "ollama") {
      return null;
    }
    return this.ollama.generateGroundedAnswer(request);
  }
}
