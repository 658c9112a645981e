import { afterEach, describe, expect, it, vi } from "vitest";
import { z } from "zod";
import { DefaultAiClient } from "../src/infra/ai/defaultAiClient.js";
import { detectPreferredLanguage, OllamaClient } from "../src/infra/ai/ollamaClient.js";

const chatRequestSchema = z.object({
  model: z.string(),
  stream: z.boolean(),
  messages: z.array(z.object({ role: z.string(), content: z.string() })),
});

describe("OllamaClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts the grounded prompt and returns the trimmed reply", async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) =>
        new Response(JSON.stringify({ message: { content: "  Doze por cento.  " } }), { status: 200 }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const client = new OllamaClient({ baseUrl: "http://ollama.test", chatModel: "test-model" });
    const answer = await client.generateGroundedAnswer({
      question: "qual a taxa de juros?",
      prompt: "PROMPT",
    });

    expect(answer).toBe("Doze por cento.");
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("http://ollama.test/api/chat");

    const body = chatRequestSchema.parse(JSON.parse(String(init?.body)));
    expect(body.model).toBe("test-model");
    expect(body.stream).toBe(false);
    expect(body.messages[0].content.endsWith("Respond in Portuguese.")).toBe(true);
    expect(body.messages[1]).toEqual({ role: "user", content: "PROMPT" });
  });

  it("throws on a failed response", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("model not found", { status: 404 })),
    );

    const client = new OllamaClient({ baseUrl: "http://ollama.test", chatModel: "test-model" });
    await expect(client.generateGroundedAnswer({ question: "q", prompt: "p" })).rejects.toThrow(
      "Ollama chat failed (404): model not found",
    );
  });

  it("returns null for an empty reply", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(JSON.stringify({ message: { content: "   " } }), { status: 200 })),
    );

    const client = new OllamaClient({ baseUrl: "http://ollama.test", chatModel: "test-model" });
    expect(await client.generateGroundedAnswer({ question: "q", prompt: "p" })).toBeNull();
  });

  it("detects the question language", () => {
    expect(detectPreferredLanguage("quantos capítulos existem?")).toBe("Portuguese");
    expect(detectPreferredLanguage("¿Cuál es el tema?")).toBe("Spanish");
    expect(detectPreferredLanguage("What is chapter 2 about?")).toBe("English");
  });
});

describe("DefaultAiClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("does not call a model in client_llm mode", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    const client = new DefaultAiClient({
      answerMode: "client_llm",
      ollamaBaseUrl: "http://ollama.test",
      ollamaChatModel: "test-model",
    });

    expect(client.getAnswerMode()).toBe("client_llm");
    expect(await client.generateGroundedAnswer({ question: "q", prompt: "p" })).toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
