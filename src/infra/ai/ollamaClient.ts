import { z } from "zod";
import { GroundedAnswerRequest } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
}

const chatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().optional(),
    })
    .optional(),
});

export class OllamaClient {
  constructor(private readonly options: OllamaClientOptions) {}

  async generateGroundedAnswer(request: GroundedAnswerRequest): Promise<string | null> {
    const response = await fetch(`${this.options.baseUrl}/api/chat`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify(this.buildChatRequest(request)),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama chat failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = chatResponseSchema.parse(await response.json());
    return data.message?.content?.trim() || null;
  }

  private buildChatRequest(request: GroundedAnswerRequest) {
    const language = detectPreferredLanguage(request.question);

    return {
      model: this.options.chatModel,
      stream: false,
      keep_alive: "30m",
      options: {
        temperature: 0.2,
        top_p: 0.9,
      },
      messages: [
        {
          role: "system",
          content: [
            "You are an assistant specialized in document analysis.",
            "Answer only from the document content provided in the user message.",
            "If the information is not there, say so clearly.",
            "Cite page numbers when available.",
            `Respond in ${language}.`,
          ].join(" "),
        },
        {
          role: "user",
          content: request.prompt,
        },
      ],
    };
  }
}

export function detectPreferredLanguage(question: string): string {
  if (/[ãõçâêôà]/i.test(question) || /\b(qual|quais|quantos|quantas|capítulo|sobre|fala)\b/i.test(question)) {
    return "Portuguese";
  }
  if (/[¿¡ñ]/i.test(question)) {
    return "Spanish";
  }
  return "English";
}
