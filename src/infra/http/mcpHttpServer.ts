import { randomUUID } from "node:crypto";
import { createServer, IncomingMessage, ServerResponse } from "node:http";
import { AddressInfo } from "node:net";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { getErrorMessage } from "../../domain/errors.js";

export const MCP_PATH = "/mcp";
const HEALTH_PATH = "/healthz";

export interface McpHttpServerOptions {
  host: string;
  port: number;
  /** Called once per initialized MCP session. */
  createSessionServer: () => McpServer;
}

export interface RunningMcpHttpServer {
  url: URL;
  sessionCount(): number;
  close(): Promise<void>;
}

interface McpSession {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

/**
 * Streamable-HTTP MCP endpoint. Every `initialize` request opens a session
 * with its own server instance; later requests are routed by the
 * `mcp-session-id` header.
 */
export async function startMcpHttpServer(
  options: McpHttpServerOptions,
): Promise<RunningMcpHttpServer> {
  const sessions = new Map<string, McpSession>();

  const routeRequest = async (req: IncomingMessage, res: ServerResponse) => {
    const { pathname } = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    if (pathname === HEALTH_PATH) {
      sendJson(res, 200, { ok: true, sessions: sessions.size });
      return;
    }
    if (pathname !== MCP_PATH) {
      sendJson(res, 404, { error: "Not found" });
      return;
    }

    const sessionId = readSessionId(req);
    const session = sessionId ? sessions.get(sessionId) : undefined;

    switch (req.method) {
      case "POST": {
        const body = await readJsonBody(req);
        if (session) {
          await session.transport.handleRequest(req, res, body);
        } else if (sessionId) {
          sendJsonRpcError(res, 404, -32001, "Session not found");
        } else if (isInitializeRequest(body)) {
          await openSession(req, res, body);
        } else {
          sendJsonRpcError(res, 400, -32000, "Initialize request is required when session is not established");
        }
        return;
      }
      case "GET":
      case "DELETE":
        if (!session) {
          sendJson(res, 400, { error: "Missing or invalid mcp-session-id" });
          return;
        }
        await session.transport.handleRequest(req, res);
        return;
      default:
        sendJson(res, 405, { error: "Method not allowed" });
    }
  };

  const openSession = async (req: IncomingMessage, res: ServerResponse, body: unknown) => {
    const server = options.createSessionServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (id) => {
        sessions.set(id, { server, transport });
        console.error(`MCP session opened: ${id}`);
      },
    });

    transport.onclose = () => {
      const id = transport.sessionId;
      if (!id || !sessions.delete(id)) {
        return;
      }
      console.error(`MCP session closed: ${id}`);
      server.close().catch((error: unknown) => {
        console.error(`Failed to close MCP session ${id}:`, error);
      });
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  };

  const httpServer = createServer((req, res) => {
    routeRequest(req, res).catch((error: unknown) => {
      console.error("MCP HTTP request failed:", error);
      if (!res.headersSent) {
        sendJson(res, 500, { error: getErrorMessage(error) });
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  const address = httpServer.address();
  const port = isAddressInfo(address) ? address.port : options.port;

  return {
    url: new URL(`http://${options.host}:${port}${MCP_PATH}`),
    sessionCount: () => sessions.size,
    close: async () => {
      const open = [...sessions.values()];
      sessions.clear();
      for (const session of open) {
        // closes the session transport too
        await session.server.close();
      }
      httpServer.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
    },
  };
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === "object" && address !== null;
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const parts: Buffer[] = [];
  for await (const part of req) {
    parts.push(Buffer.isBuffer(part) ? part : Buffer.from(part));
  }

  const raw = Buffer.concat(parts).toString("utf-8").trim();
  if (!raw) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new Error("Invalid JSON body");
  }
}

function readSessionId(req: IncomingMessage): string | null {
  const header = req.headers["mcp-session-id"];
  const value = Array.isArray(header) ? header[0] : header;
  return value || null;
}

function sendJson(res: ServerResponse, status: number, payload: unknown) {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}

function sendJsonRpcError(res: ServerResponse, status: number, code: number, message: string) {
  sendJson(res, status, { jsonrpc: "2.0", error: { code, message }, id: null });
}
